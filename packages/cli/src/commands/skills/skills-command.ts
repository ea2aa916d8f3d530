import { Command } from 'commander';
import type { Skills } from '@taskloom/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export type SkillsCommandOptions = BaseCommandOptions;

function describeParameter(name: string, info: Skills.SkillParameterInfo): string {
  const traits: string[] = [info.type, info.required ? 'required' : 'optional'];
  if (!info.required && info.default !== null) {
    traits.push(`default: ${JSON.stringify(info.default)}`);
  }
  const line = `  • ${name} (${traits.join(', ')})`;
  return info.description ? `${line} - ${info.description}` : line;
}

/**
 * SkillsCommand - lists the registered skills and shows their parameters.
 */
export class SkillsCommand extends BaseCommand<SkillsCommandOptions> {

  register(program: Command): void {
    const skills = program
      .command('skills')
      .description('Inspect registered skills');

    skills
      .command('list')
      .description('List every registered skill')
      .option('--json', 'Output results in JSON format')
      .action(async (options: SkillsCommandOptions) => {
        await this.executeSubCommand('list', [], options);
      });

    skills
      .command('info <name>')
      .description('Show a skill and its parameters')
      .option('--json', 'Output results in JSON format')
      .action(async (name: string, options: SkillsCommandOptions) => {
        await this.executeSubCommand('info', [name], options);
      });
  }

  async executeSubCommand(subcommand: string, args: string[], options: SkillsCommandOptions): Promise<void> {
    try {
      switch (subcommand) {
        case 'list':
          await this.executeList(options);
          break;
        case 'info': {
          const [name] = args;
          if (!name) {
            this.handleError('Skill name is required for skills info', options);
            return;
          }
          await this.executeInfo(name, options);
          break;
        }
        default:
          this.handleError(`Unknown subcommand: ${subcommand}. Use: list, info`, options);
      }
    } catch (error) {
      const { message, error: cause } = this.errorFrom(error);
      this.handleError(message, options, cause);
    }
  }

  private async executeList(options: SkillsCommandOptions): Promise<void> {
    const registry = await this.dependencyService.getSkillRegistry();
    const skills = registry.listSkills();

    if (options.json) {
      this.handleSuccess(skills, options);
      return;
    }
    if (skills.length === 0) {
      console.log('⚠️ No skills registered');
      return;
    }

    console.log(`🧩 ${skills.length} skill(s) available:`);
    for (const skill of skills) {
      console.log(`  • ${skill.name} v${skill.version} - ${skill.description} (${skill.author})`);
    }
  }

  private async executeInfo(name: string, options: SkillsCommandOptions): Promise<void> {
    const registry = await this.dependencyService.getSkillRegistry();
    const skill = registry.listSkills().find((candidate) => candidate.name === name);
    if (!skill) {
      this.handleError(`Skill not found: ${name}`, options);
      return;
    }

    if (options.json) {
      this.handleSuccess(skill, options);
      return;
    }

    console.log(`🧩 ${skill.name} v${skill.version}`);
    console.log(skill.description);
    console.log(`Author: ${skill.author}`);

    const parameters = Object.entries(skill.parameters);
    if (parameters.length === 0) {
      console.log('No parameters');
      return;
    }
    console.log('Parameters:');
    for (const [parameterName, info] of parameters) {
      console.log(describeParameter(parameterName, info));
    }
  }
}

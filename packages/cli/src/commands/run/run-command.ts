import { Command } from 'commander';
import { Engine, Types } from '@taskloom/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { formatResult, resultError } from './result-format';

export interface RunCommandOptions extends BaseCommandOptions {
  /** JSON object of task parameters (run) */
  params?: string;
  /** Seconds, as typed (shell) */
  timeout?: string;
  /** Process count, as typed (processes) */
  top?: string;
  cwd?: string;
  /** github-close-issues */
  label?: string[];
  token?: string;
}

/**
 * RunCommand - submits one skill action as a task and prints its result.
 *
 * `run` is the generic form; `shell`, `system-info`, `processes` and
 * `github-close-issues` are shortcuts for common built-in actions.
 */
export class RunCommand extends BaseCommand<RunCommandOptions> {

  register(program: Command): void {
    program
      .command('run <skill> <action>')
      .description('Run a skill action as a task')
      .option('-p, --params <json>', 'JSON object of parameters')
      .option('--json', 'Output results in JSON format')
      .option('-v, --verbose', 'Show technical details on failure')
      .action(async (skill: string, action: string, options: RunCommandOptions) => {
        await this.executeSubCommand('run', [skill, action], options);
      });

    program
      .command('shell <command>')
      .description('Run a shell command through the local_shell safety rules')
      .option('-t, --timeout <seconds>', 'Command timeout in seconds', '30')
      .option('-c, --cwd <dir>', 'Working directory')
      .option('--json', 'Output results in JSON format')
      .action(async (command: string, options: RunCommandOptions) => {
        await this.executeSubCommand('shell', [command], options);
      });

    program
      .command('system-info')
      .description('Show platform, cpu and memory information')
      .option('--json', 'Output results in JSON format')
      .action(async (options: RunCommandOptions) => {
        await this.executeSubCommand('system-info', [], options);
      });

    program
      .command('processes')
      .description('List running processes, busiest first')
      .option('-t, --top <n>', 'Number of processes to show', '20')
      .option('--json', 'Output results in JSON format')
      .action(async (options: RunCommandOptions) => {
        await this.executeSubCommand('processes', [], options);
      });

    program
      .command('github-close-issues <repo>')
      .description('Close open issues carrying any of the given labels')
      .option('-l, --label <labels...>', 'Labels that select issues to close')
      .option('-t, --token <token>', 'GitHub token (default: github_token credential)')
      .option('--json', 'Output results in JSON format')
      .action(async (repo: string, options: RunCommandOptions) => {
        await this.executeSubCommand('github-close-issues', [repo], options);
      });
  }

  async executeSubCommand(subcommand: string, args: string[], options: RunCommandOptions): Promise<void> {
    switch (subcommand) {
      case 'run': {
        const [skill, action] = args;
        if (!skill || !action) {
          this.handleError('Skill and action are required for run command', options);
          return;
        }
        const parameters = this.parseParams(options);
        if (!parameters) return;
        await this.runTask(skill, action, parameters, options);
        break;
      }
      case 'shell': {
        const [command] = args;
        if (!command) {
          this.handleError('Command is required for shell command', options);
          return;
        }
        const timeout = Number(options.timeout ?? '30');
        if (!Number.isFinite(timeout) || timeout <= 0) {
          this.handleError(`Invalid timeout: ${options.timeout}`, options);
          return;
        }
        await this.runTask('local_shell', 'run', {
          command,
          timeout,
          ...(options.cwd ? { cwd: options.cwd } : {}),
        }, options);
        break;
      }
      case 'system-info':
        await this.runTask('local_shell', 'system_info', {}, options);
        break;
      case 'processes': {
        const top = Number(options.top ?? '20');
        if (!Number.isInteger(top) || top <= 0) {
          this.handleError(`Invalid process count: ${options.top}`, options);
          return;
        }
        await this.runTask('local_shell', 'list_processes', { top }, options);
        break;
      }
      case 'github-close-issues': {
        const [repo] = args;
        if (!repo) {
          this.handleError('Repository is required for github-close-issues command', options);
          return;
        }
        await this.runTask('github_agent', 'close_issues', {
          repo,
          ...(options.label && options.label.length > 0 ? { labels: options.label } : {}),
          ...(options.token ? { token: options.token } : {}),
        }, options);
        break;
      }
      default:
        this.handleError(`Unknown subcommand: ${subcommand}. Use: run, shell, system-info, processes, github-close-issues`, options);
    }
  }

  private parseParams(options: RunCommandOptions): Types.JsonObject | null {
    if (!options.params) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(options.params);
    } catch {
      parsed = undefined;
    }
    if (!Types.isJsonObject(parsed)) {
      this.handleError('Invalid JSON parameters: expected a JSON object', options);
      return null;
    }
    return parsed;
  }

  private async runTask(
    skill: string,
    action: string,
    parameters: Types.JsonObject,
    options: RunCommandOptions,
  ): Promise<void> {
    try {
      const engine = await this.dependencyService.getTaskEngine();
      const task = Engine.createTask({ skill, action, parameters });
      const result = await engine.executeTask(task);

      const error = resultError(result);
      if (error !== null) {
        this.handleError(error, options);
        return;
      }

      this.handleSuccess(result, options, `${task.name} completed`);
      if (!options.json && !options.quiet) {
        for (const line of formatResult(result)) {
          console.log(line);
        }
      }

      // a shell command's own exit status becomes ours
      if (Types.isJsonObject(result) && result['success'] === false) {
        const code = result['returncode'];
        process.exitCode = typeof code === 'number' && code !== 0 ? code : 1;
      }
    } catch (error) {
      const { message, error: cause } = this.errorFrom(error);
      this.handleError(`Task failed: ${message}`, options, cause);
    }
  }
}

import { Command } from 'commander';
import { SkillsCommand } from './skills-command';

/**
 * Registers skills list and skills info
 */
export function registerSkillsCommands(program: Command): void {
  new SkillsCommand().register(program);
}

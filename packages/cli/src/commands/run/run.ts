import { Command } from 'commander';
import { RunCommand } from './run-command';

/**
 * Registers run and its shortcuts (shell, system-info, processes, github-close-issues)
 */
export function registerRunCommands(program: Command): void {
  new RunCommand().register(program);
}

import { Command } from 'commander';
import { ContextCommand } from './context-command';

/**
 * Registers context get, set and show
 */
export function registerContextCommands(program: Command): void {
  new ContextCommand().register(program);
}

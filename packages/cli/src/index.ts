#!/usr/bin/env node

import { Command } from 'commander';
import { registerContextCommands } from './commands/context/context';
import { registerRunCommands } from './commands/run/run';
import { registerSkillsCommands } from './commands/skills/skills';
import { DependencyInjectionService, isStoreBackend } from './services/dependency-injection';

type GlobalOptions = {
  memory?: string;
  debug?: boolean;
};

const program = new Command();

program
  .name('taskloom')
  .description('Run pluggable skills as tracked tasks with persisted context')
  .version('0.1.0')
  .option('-m, --memory <backend>', 'Memory backend: yaml, json or memory (default: from taskloom.config.json)')
  .option('-d, --debug', 'Enable debug logging');

// Global flags reach the runtime before any command builds it
program.hook('preAction', () => {
  const { memory, debug } = program.opts<GlobalOptions>();
  if (memory !== undefined && !isStoreBackend(memory)) {
    console.error(`❌ Unknown memory backend '${memory}': expected yaml, json or memory`);
    process.exit(1);
  }
  DependencyInjectionService.getInstance().configure({
    ...(memory !== undefined && isStoreBackend(memory) ? { memoryBackend: memory } : {}),
    debug: debug ?? false,
  });
});

registerSkillsCommands(program);
registerRunCommands(program);
registerContextCommands(program);

program
  .parseAsync(process.argv)
  .then(() => DependencyInjectionService.getInstance().shutdown())
  .catch((error: unknown) => {
    console.error('❌ Fatal error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });

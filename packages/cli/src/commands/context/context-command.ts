import { Command } from 'commander';
import { Types } from '@taskloom/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ContextCommandOptions extends BaseCommandOptions {
  scope?: string;
}

const DEFAULT_SCOPE = 'global';

function formatValue(value: Types.JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Values typed on the command line are JSON when they parse as JSON,
 * plain strings otherwise: `42` is a number, `hello` a string.
 */
export function parseContextValue(raw: string): Types.JsonValue {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Types.isJsonValue(parsed) ? parsed : raw;
  } catch {
    return raw;
  }
}

/**
 * ContextCommand - reads and writes persisted context values.
 *
 * Each CLI run opens a fresh session, so session-scoped values only live
 * for that run; the default scope is global.
 */
export class ContextCommand extends BaseCommand<ContextCommandOptions> {

  register(program: Command): void {
    const context = program
      .command('context')
      .description('Read and write persisted context values');

    context
      .command('get <key>')
      .description('Print one context value')
      .option('-s, --scope <scope>', 'global or session', DEFAULT_SCOPE)
      .option('--json', 'Output results in JSON format')
      .action(async (key: string, options: ContextCommandOptions) => {
        await this.executeSubCommand('get', [key], options);
      });

    context
      .command('set <key> <value>')
      .description('Store a context value (parsed as JSON when possible)')
      .option('-s, --scope <scope>', 'global or session', DEFAULT_SCOPE)
      .option('--json', 'Output results in JSON format')
      .option('-q, --quiet', 'Suppress the confirmation line')
      .action(async (key: string, value: string, options: ContextCommandOptions) => {
        await this.executeSubCommand('set', [key, value], options);
      });

    context
      .command('show')
      .description('Print global context merged with the current session')
      .option('--json', 'Output results in JSON format')
      .action(async (options: ContextCommandOptions) => {
        await this.executeSubCommand('show', [], options);
      });
  }

  async executeSubCommand(subcommand: string, args: string[], options: ContextCommandOptions): Promise<void> {
    try {
      switch (subcommand) {
        case 'get': {
          const [key] = args;
          if (!key) {
            this.handleError('Key is required for context get', options);
            return;
          }
          await this.executeGet(key, options);
          break;
        }
        case 'set': {
          const [key, value] = args;
          if (!key || value === undefined) {
            this.handleError('Key and value are required for context set', options);
            return;
          }
          await this.executeSet(key, value, options);
          break;
        }
        case 'show':
          await this.executeShow(options);
          break;
        default:
          this.handleError(`Unknown subcommand: ${subcommand}. Use: get, set, show`, options);
      }
    } catch (error) {
      const { message, error: cause } = this.errorFrom(error);
      this.handleError(message, options, cause);
    }
  }

  private async executeGet(key: string, options: ContextCommandOptions): Promise<void> {
    const scope = options.scope ?? DEFAULT_SCOPE;
    const contextManager = await this.dependencyService.getContextManager();
    const value = contextManager.getContext(key, scope);

    if (options.json) {
      this.handleSuccess({ key, scope, value: value ?? null }, options);
      return;
    }
    console.log(value === undefined ? `${key}: (not set)` : `${key}: ${formatValue(value)}`);
  }

  private async executeSet(key: string, raw: string, options: ContextCommandOptions): Promise<void> {
    const scope = options.scope ?? DEFAULT_SCOPE;
    const value = parseContextValue(raw);
    const contextManager = await this.dependencyService.getContextManager();
    const { persisted } = await contextManager.updateContext(key, value, scope);

    if (!persisted) {
      this.handleError(`Failed to persist context key '${key}'`, options);
      return;
    }
    this.handleSuccess({ key, scope, value }, options, `Set ${scope} context '${key}'`);
  }

  private async executeShow(options: ContextCommandOptions): Promise<void> {
    const contextManager = await this.dependencyService.getContextManager();
    const context = contextManager.getFullContext();

    if (options.json) {
      this.handleSuccess(context, options);
      return;
    }

    const entries = Object.entries(context);
    if (entries.length === 0) {
      console.log('No context values set');
      return;
    }
    console.log('📋 Context:');
    for (const [key, value] of entries) {
      console.log(`  ${key}: ${formatValue(value)}`);
    }
  }
}

/**
 * local_shell - shell command execution and file inspection on this host.
 *
 * Actions: run, check_command, list_processes, system_info,
 * file_operations. Failures are
 * reported in the result as `{ error }` rather than thrown.
 */

import type { Skill, SkillContext, SkillDefinition, SkillParams } from '../../skill_registry';
import type { JsonObject, JsonValue } from '../../types';
import type { ExecOptions, ExecResult } from '../../utils/exec_command';
import { CommandExecutionError, CommandTimeoutError, execCommand } from '../../utils/exec_command';
import { errorMessage, readBoolean, readNumber, readString, readStringArray, readStringRecord } from '../param_readers';
import type { ShellSafetyRules } from './shell_safety';
import { DEFAULT_ALLOWED_COMMANDS, DEFAULT_BLOCKED_PATTERNS, checkCommand } from './shell_safety';
import { fileInfo, findFiles, isFileOperation, listDirectory, readFile } from './file_operations';
import { collectSystemInfo } from './system_info';
import { DEFAULT_PROCESS_LIMIT, listProcesses } from './process_list';

export const DEFAULT_COMMAND_TIMEOUT = 30;

/** Global context key that lifts the allowed-command list */
export const UNRESTRICTED_CONTEXT_KEY = 'shell_unrestricted';

const COMMAND_NAME = /^[\w.+-]+$/;

export type CommandRunner = (command: string, options?: ExecOptions) => Promise<ExecResult>;

export type LocalShellSkillOptions = {
  rules?: Partial<ShellSafetyRules>;
  exec?: CommandRunner;
  platform?: NodeJS.Platform;
};

type ResolvedOptions = {
  rules: ShellSafetyRules;
  exec: CommandRunner;
  platform: NodeJS.Platform;
};

class LocalShellSkill implements Skill {
  private readonly context: SkillContext;
  private readonly options: ResolvedOptions;

  constructor(context: SkillContext, options: ResolvedOptions) {
    this.context = context;
    this.options = options;
  }

  async execute(params: SkillParams): Promise<JsonValue> {
    const action = readString(params, 'action') ?? '';

    try {
      switch (action) {
        case 'run':
          return await this.runCommand(params);
        case 'check_command':
          return await this.checkCommands(params);
        case 'list_processes':
          return await listProcesses(
            this.options.exec,
            this.options.platform,
            readNumber(params, 'top') ?? DEFAULT_PROCESS_LIMIT,
          );
        case 'system_info':
          return collectSystemInfo();
        case 'file_operations':
          return await this.fileOperations(params);
        default:
          return { error: `Unknown action: ${action}` };
      }
    } catch (error) {
      const message = errorMessage(error);
      this.context.logger.error(`Action ${action} failed: ${message}`);
      return { error: message };
    }
  }

  private async runCommand(params: SkillParams): Promise<JsonObject> {
    const command = readString(params, 'command')?.trim();
    if (!command) {
      return { error: 'No command provided' };
    }

    const unrestricted = this.context.getContext(UNRESTRICTED_CONTEXT_KEY, 'global') === true;
    const verdict = checkCommand(command, this.options.rules, unrestricted);
    if (!verdict.allowed) {
      this.context.logger.warn(`Blocked command '${command}': ${verdict.reason}`);
      return {
        error: 'Command blocked by safety rules',
        reason: verdict.reason,
        allowedCommands: [...this.options.rules.allowedCommands],
      };
    }

    const timeout = readNumber(params, 'timeout') ?? DEFAULT_COMMAND_TIMEOUT;
    const execOptions: ExecOptions = { timeout };
    const cwd = readString(params, 'cwd');
    if (cwd) execOptions.cwd = cwd;
    const env = readStringRecord(params, 'env');
    if (env) execOptions.env = env;

    try {
      const result = await this.options.exec(command, execOptions);
      return {
        success: result.exitCode === 0,
        returncode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        command,
      };
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        return { error: error.message, timedOut: true, partialOutput: '' };
      }
      if (error instanceof CommandExecutionError) {
        return { error: error.message };
      }
      throw error;
    }
  }

  private async checkCommands(params: SkillParams): Promise<JsonObject> {
    const names = readStringArray(params, 'commands') ?? [];
    if (names.length === 0) {
      return { error: 'No commands provided' };
    }

    const locator = this.options.platform === 'win32' ? 'where' : 'which';
    const commands: JsonObject = {};
    for (const name of names) {
      if (!COMMAND_NAME.test(name)) {
        commands[name] = { available: false, path: null };
        continue;
      }
      try {
        const result = await this.options.exec(`${locator} ${name}`, { timeout: 10 });
        const found = result.exitCode === 0;
        const firstLine = result.stdout.split(/\r?\n/)[0]?.trim() ?? '';
        commands[name] = { available: found, path: found && firstLine ? firstLine : null };
      } catch (error) {
        this.context.logger.debug(`Lookup of ${name} failed: ${errorMessage(error)}`);
        commands[name] = { available: false, path: null };
      }
    }
    return { commands };
  }

  private async fileOperations(params: SkillParams): Promise<JsonObject> {
    const operation = readString(params, 'operation') ?? '';
    const target = readString(params, 'path');
    if (!isFileOperation(operation)) {
      return { error: `Unknown file operation: ${operation}` };
    }
    if (!target) {
      return { error: 'No path provided' };
    }

    switch (operation) {
      case 'list':
        return listDirectory(target);
      case 'read': {
        const lines = readNumber(params, 'lines');
        const encoding = readString(params, 'encoding');
        return readFile(target, {
          ...(lines !== undefined ? { lines } : {}),
          ...(encoding !== undefined ? { encoding } : {}),
        });
      }
      case 'info':
        return fileInfo(target);
      case 'find': {
        const pattern = readString(params, 'pattern');
        const recursive = readBoolean(params, 'recursive');
        return findFiles(target, {
          ...(pattern !== undefined ? { pattern } : {}),
          ...(recursive !== undefined ? { recursive } : {}),
        });
      }
    }
  }
}

export function createLocalShellSkill(options: LocalShellSkillOptions = {}): SkillDefinition {
  const resolved: ResolvedOptions = {
    rules: {
      allowedCommands: options.rules?.allowedCommands ?? DEFAULT_ALLOWED_COMMANDS,
      blockedPatterns: options.rules?.blockedPatterns ?? DEFAULT_BLOCKED_PATTERNS,
    },
    exec: options.exec ?? execCommand,
    platform: options.platform ?? process.platform,
  };

  return {
    name: 'local_shell',
    description: 'Local shell command execution and system automation',
    parameters: {
      action: { type: 'string', description: 'run | check_command | list_processes | system_info | file_operations' },
      command: { type: 'string', required: false, description: 'Shell command for run' },
      timeout: { type: 'number', default: DEFAULT_COMMAND_TIMEOUT, description: 'Seconds before run is killed' },
      cwd: { type: 'string', required: false },
      env: { type: 'object', required: false, description: 'Extra environment variables for run' },
      commands: { type: 'array', required: false, description: 'Program names for check_command' },
      top: { type: 'number', default: DEFAULT_PROCESS_LIMIT, description: 'Processes returned by list_processes' },
      operation: { type: 'string', required: false, description: 'list | read | info | find' },
      path: { type: 'string', required: false },
      lines: { type: 'number', required: false, description: 'Read at most this many lines' },
      encoding: { type: 'string', required: false },
      pattern: { type: 'string', required: false, description: 'Glob for find' },
      recursive: { type: 'boolean', required: false },
    },
    create: (context) => new LocalShellSkill(context, resolved),
  };
}

export const localShellSkill = createLocalShellSkill();

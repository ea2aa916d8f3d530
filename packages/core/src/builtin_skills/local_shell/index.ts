export {
  DEFAULT_COMMAND_TIMEOUT,
  UNRESTRICTED_CONTEXT_KEY,
  createLocalShellSkill,
  localShellSkill,
} from './local_shell_skill';
export type { CommandRunner, LocalShellSkillOptions } from './local_shell_skill';
export { DEFAULT_ALLOWED_COMMANDS, DEFAULT_BLOCKED_PATTERNS, checkCommand } from './shell_safety';
export type { SafetyVerdict, ShellSafetyRules } from './shell_safety';
export { MAX_FIND_MATCHES, MAX_READ_BYTES } from './file_operations';
export { DEFAULT_PROCESS_LIMIT, listProcesses, parsePsOutput, parseTasklistOutput } from './process_list';
export type { ProcessEntry } from './process_list';

export { CommandError, CommandExecutionError, CommandTimeoutError, execCommand } from './exec_command';
export type { ExecOptions, ExecResult } from './exec_command';
export { Semaphore } from './semaphore';
export {
  generateSessionId,
  generateTaskId,
  sanitizeForId,
} from './id_generator';

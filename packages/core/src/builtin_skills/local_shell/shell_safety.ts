import * as path from 'path';

export const DEFAULT_ALLOWED_COMMANDS: readonly string[] = [
  'ls', 'dir', 'pwd', 'cd', 'echo', 'cat', 'type', 'grep', 'find', 'wc', 'head', 'tail', 'sort',
  'git', 'python', 'pip', 'node', 'npm', 'curl', 'ps', 'top', 'df', 'du', 'whoami', 'date',
];

export const DEFAULT_BLOCKED_PATTERNS: readonly string[] = [
  'rm -rf', 'del /f', 'format', 'fdisk', 'sudo', 'su', 'chmod 777', 'mkfs',
];

export type ShellSafetyRules = {
  allowedCommands: readonly string[];
  blockedPatterns: readonly string[];
};

export type SafetyVerdict =
  | { allowed: true }
  | { allowed: false; reason: string };

// `&` alone backgrounds and chains; `>&`, `&>` and `2>&1` are redirections
const SEGMENT_SEPARATOR = /&&|\|\||(?<![<>&])&(?![>&])|[;|\n]/;

const COMMAND_SUBSTITUTION = /\$\(|`/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `pattern` occurs in `command` as whole words, so "su" blocks
 * `su root` but not `echo result`.
 */
export function containsBlockedPattern(command: string, pattern: string): boolean {
  const matcher = new RegExp(`(^|[^a-z0-9_])${escapeRegExp(pattern.toLowerCase())}($|[^a-z0-9_])`);
  return matcher.test(command.toLowerCase());
}

/**
 * Program name of one command segment, without directory. Leading
 * `VAR=value` assignments are skipped.
 */
export function baseCommandOf(segment: string): string {
  const words = segment.trim().split(/\s+/).filter((word) => word.length > 0);
  const program = words.find((word) => !/^[A-Za-z_][A-Za-z0-9_]*=/.test(word)) ?? '';
  return path.basename(program);
}

/**
 * Allowed names also admit a version suffix: `python` covers `python3`.
 */
function isAllowedProgram(program: string, allowed: readonly string[]): boolean {
  return allowed.some((name) => new RegExp(`^${escapeRegExp(name)}[0-9.]*$`).test(program));
}

/**
 * Blocked patterns always win. Otherwise, unless `unrestricted`, command
 * substitution is refused and every segment of a `;`, `&`, `&&`, `||` or
 * `|` chain must start with an allowed program.
 */
export function checkCommand(
  command: string,
  rules: ShellSafetyRules,
  unrestricted = false,
): SafetyVerdict {
  const blocked = rules.blockedPatterns.find((pattern) => containsBlockedPattern(command, pattern));
  if (blocked !== undefined) {
    return { allowed: false, reason: `matches blocked pattern '${blocked}'` };
  }
  if (unrestricted) {
    return { allowed: true };
  }
  if (COMMAND_SUBSTITUTION.test(command)) {
    return { allowed: false, reason: 'command substitution is not allowed' };
  }

  const segments = command.split(SEGMENT_SEPARATOR).filter((segment) => segment.trim().length > 0);
  if (segments.length === 0) {
    return { allowed: false, reason: 'empty command' };
  }
  for (const segment of segments) {
    const program = baseCommandOf(segment);
    if (!isAllowedProgram(program, rules.allowedCommands)) {
      return { allowed: false, reason: `'${program}' is not an allowed command` };
    }
  }
  return { allowed: true };
}

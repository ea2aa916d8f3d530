import * as os from 'os';
import * as path from 'path';
import type { JsonObject } from '../../types';
import type { CommandRunner } from './local_shell_skill';

export const DEFAULT_PROCESS_LIMIT = 50;

export type ProcessEntry = {
  pid: number;
  name: string;
  /** null where the platform tool reports no cpu figure (tasklist) */
  cpuPercent: number | null;
  memoryPercent: number;
};

const PS_COMMAND = 'ps -A -o pid=,pcpu=,pmem=,comm=';
const TASKLIST_COMMAND = 'tasklist /fo csv /nh';

const PS_LINE = /^\s*(\d+)\s+([\d.]+)\s+([\d.]+)\s+(.+?)\s*$/;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Parses `ps -o pid=,pcpu=,pmem=,comm=` output. Lines that do not fit are
 * skipped.
 */
export function parsePsOutput(stdout: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = PS_LINE.exec(line);
    if (!match) continue;
    const [, pid, cpu, mem, command] = match;
    if (pid === undefined || cpu === undefined || mem === undefined || command === undefined) continue;
    entries.push({
      pid: Number(pid),
      name: path.basename(command),
      cpuPercent: Number(cpu),
      memoryPercent: round2(Number(mem)),
    });
  }
  return entries;
}

/**
 * Parses `tasklist /fo csv /nh` output. Memory arrives as "12,345 K" and is
 * turned into a share of `totalMemory` bytes.
 */
export function parseTasklistOutput(stdout: string, totalMemory: number): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const fields = Array.from(line.matchAll(/"([^"]*)"/g), (match) => match[1] ?? '');
    const [name, pid, , , memory] = fields;
    if (name === undefined || pid === undefined || memory === undefined || !/^\d+$/.test(pid)) continue;
    const kilobytes = Number(memory.replace(/[^\d]/g, ''));
    entries.push({
      pid: Number(pid),
      name,
      cpuPercent: null,
      memoryPercent: totalMemory > 0 ? round2((kilobytes * 1024 * 100) / totalMemory) : 0,
    });
  }
  return entries;
}

/**
 * Running processes, busiest cpu first, at most `limit` of them.
 */
export async function listProcesses(
  exec: CommandRunner,
  platform: NodeJS.Platform,
  limit: number = DEFAULT_PROCESS_LIMIT,
): Promise<JsonObject> {
  const windows = platform === 'win32';
  const result = await exec(windows ? TASKLIST_COMMAND : PS_COMMAND, { timeout: 10 });
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
    return { error: `Process listing failed: ${detail}` };
  }

  const processes = windows
    ? parseTasklistOutput(result.stdout, os.totalmem())
    : parsePsOutput(result.stdout);
  processes.sort((a, b) => (b.cpuPercent ?? 0) - (a.cpuPercent ?? 0));

  const cap = Math.max(1, Math.floor(limit));
  return {
    processCount: processes.length,
    processes: processes.slice(0, cap),
  };
}

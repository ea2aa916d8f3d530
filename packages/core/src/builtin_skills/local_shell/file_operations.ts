import fg from 'fast-glob';
import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import type { JsonObject } from '../../types';

export const FILE_OPERATIONS = ['list', 'read', 'info', 'find'] as const;
export type FileOperation = (typeof FILE_OPERATIONS)[number];

export const MAX_READ_BYTES = 10 * 1024 * 1024;
export const MAX_FIND_MATCHES = 100;

export type ReadOptions = {
  lines?: number;
  encoding?: string;
};

export type FindOptions = {
  pattern?: string;
  recursive?: boolean;
};

export function isFileOperation(value: string): value is FileOperation {
  return FILE_OPERATIONS.some((operation) => operation === value);
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

export async function listDirectory(target: string): Promise<JsonObject> {
  const stats = await statOrNull(target);
  if (!stats) return { error: `Path does not exist: ${target}` };
  if (!stats.isDirectory()) return { error: `Path is not a directory: ${target}` };

  const entries = await fs.readdir(target, { withFileTypes: true });
  const items: JsonObject[] = [];
  for (const entry of entries) {
    const entryStats = await fs.stat(path.join(target, entry.name));
    const isDirectory = entryStats.isDirectory();
    items.push({
      name: entry.name,
      type: isDirectory ? 'directory' : 'file',
      size: entryStats.isFile() ? entryStats.size : null,
      modified: entryStats.mtime.toISOString(),
    });
  }

  // directories first, then by name
  items.sort((a, b) => {
    const rankA = a['type'] === 'directory' ? 0 : 1;
    const rankB = b['type'] === 'directory' ? 0 : 1;
    if (rankA !== rankB) return rankA - rankB;
    return String(a['name']).localeCompare(String(b['name']));
  });

  return { path: target, itemCount: items.length, items };
}

export async function readFile(target: string, options: ReadOptions = {}): Promise<JsonObject> {
  const stats = await statOrNull(target);
  if (!stats) return { error: `File does not exist: ${target}` };
  if (!stats.isFile()) return { error: `Path is not a file: ${target}` };
  if (stats.size > MAX_READ_BYTES) return { error: 'File too large (>10MB)' };

  const encoding = options.encoding ?? 'utf-8';
  if (!Buffer.isEncoding(encoding)) {
    return { error: `Unknown encoding: ${encoding}` };
  }

  const text = await fs.readFile(target, { encoding });
  const content = options.lines === undefined
    ? text
    : text.split(/(?<=\n)/).slice(0, Math.max(0, options.lines)).join('');

  return {
    path: target,
    size: stats.size,
    encoding,
    content,
    truncated: options.lines !== undefined,
  };
}

export async function fileInfo(target: string): Promise<JsonObject> {
  const stats = await statOrNull(target);
  if (!stats) return { error: `Path does not exist: ${target}` };

  return {
    path: target,
    name: path.basename(target),
    type: stats.isDirectory() ? 'directory' : 'file',
    size: stats.size,
    created: stats.birthtime.toISOString(),
    modified: stats.mtime.toISOString(),
    accessed: stats.atime.toISOString(),
    permissions: (stats.mode & 0o777).toString(8).padStart(3, '0'),
    ownerUid: stats.uid,
    groupGid: stats.gid,
  };
}

export async function findFiles(target: string, options: FindOptions = {}): Promise<JsonObject> {
  const stats = await statOrNull(target);
  if (!stats) return { error: `Path does not exist: ${target}` };

  const pattern = options.pattern ?? '*';
  const recursive = options.recursive ?? true;
  const found = await fg(recursive ? `**/${pattern}` : pattern, {
    cwd: target,
    onlyFiles: false,
    dot: false,
  });
  const matches = found.sort().map((match) => path.join(target, match));

  return {
    basePath: target,
    pattern,
    recursive,
    matchCount: matches.length,
    matches: matches.slice(0, MAX_FIND_MATCHES),
  };
}

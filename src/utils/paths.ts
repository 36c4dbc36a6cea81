import { access } from 'node:fs/promises';
import { dirname, relative, sep } from 'node:path';
import type { FilesSyncConfig } from '../config.js';

export function getHistoryDbPath(config: FilesSyncConfig): string {
  return config.history.path;
}

export function getHistoryDir(config: FilesSyncConfig): string {
  return dirname(config.history.path);
}

/** Path of `absolutePath` below `root`, with forward slashes. */
export function relativePath(root: string, absolutePath: string): string {
  return relative(root, absolutePath).split(sep).join('/');
}

export function pathDepth(root: string, absolutePath: string): number {
  const rel = relativePath(root, absolutePath);
  return rel === '' ? 0 : rel.split('/').length - 1;
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

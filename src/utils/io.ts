/**
 * File I/O utilities
 */

import { mkdir, writeFile, readFile } from 'fs/promises';
import { dirname } from 'path';

export async function ensureDir(dir_path: string): Promise<void> {
  await mkdir(dir_path, { recursive: true });
}

export async function writeJson(file_path: string, data: unknown): Promise<void> {
  await ensureDir(dirname(file_path));
  await writeFile(file_path, JSON.stringify(data, null, 2), 'utf-8');
}

/**
 * Read and parse a JSON file. The caller validates the shape.
 */
export async function readJson(file_path: string): Promise<unknown> {
  const content = await readFile(file_path, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

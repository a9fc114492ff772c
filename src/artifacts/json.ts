import { readFile, writeFile, access } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ensureDir } from './paths.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function writeJson<T>(path: string, data: T): Promise<void> {
  await ensureDir(dirname(path));
  const content = JSON.stringify(data, null, 2);
  await writeFile(path, content, 'utf-8');
}

/**
 * Read and parse a JSON file. Returns null when the file does not exist;
 * callers validate the shape.
 */
export async function readJson(path: string): Promise<unknown> {
  const content = await readText(path);
  if (content === null) {
    return null;
  }
  return JSON.parse(content);
}

export async function writeText(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, content, 'utf-8');
}

export async function readText(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

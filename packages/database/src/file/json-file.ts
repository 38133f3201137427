import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

const TEMP_SUFFIX = '.tmp';

/**
 * Write `data` as JSON so that readers see either the previous document or
 * the new one: write `<path>.<uuid>.tmp`, then rename over `<path>`. Each
 * call owns its temp file, so concurrent writers never touch each other's.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  const tempPath = `${path}.${randomUUID()}${TEMP_SUFFIX}`;
  await mkdir(dirname(path), { recursive: true });
  try {
    await writeFile(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Read and parse a JSON file. Returns null when the file does not exist;
 * parse errors propagate.
 */
export async function readJson(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
  return JSON.parse(text);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Serializes async work per key. Each task starts after the previous task for
 * the same key has settled.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task, task);
    const tail = next.catch(() => undefined);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return next;
  }
}

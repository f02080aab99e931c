import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { isNodeError } from '../errors.js';

export const STORE_DIR_NAME = '.turnlog';

/**
 * Read and parse a JSON file. Returns null if the file doesn't exist;
 * invalid JSON throws. Callers validate the shape.
 */
export async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return null;
    throw err;
  }
  return JSON.parse(raw);
}

/**
 * Atomically write a JSON file using temp-file + rename.
 * Creates parent directories if they don't exist.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tempPath = join(dir, `.tmp-${randomUUID()}.json`);
  const content = JSON.stringify(data, null, 2) + '\n';

  await writeFile(tempPath, content, 'utf-8');
  await rename(tempPath, filePath);
}

/**
 * Initialize the .turnlog directory of a workspace with a .gitignore.
 * Returns the path to the .turnlog directory.
 */
export async function initStoreDir(workspacePath: string): Promise<string> {
  const storeDir = join(workspacePath, STORE_DIR_NAME);
  await mkdir(join(storeDir, 'transitions'), { recursive: true });

  const gitignorePath = join(storeDir, '.gitignore');
  try {
    await writeFile(gitignorePath, '*\n', { encoding: 'utf-8', flag: 'wx' });
  } catch (err) {
    if (!isNodeError(err) || err.code !== 'EEXIST') throw err;
  }

  return storeDir;
}

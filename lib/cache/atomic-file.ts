import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Write JSON next to the target, then rename over it
 *
 * Readers see either the old file or the new one, never a partial write.
 * The temporary name is unique per call so concurrent writers of the same
 * path never share a temp file.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<number> {
  const payload = serializeJson(data);
  const tempPath = `${path}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;

  await mkdir(dirname(path), { recursive: true });
  try {
    await writeFile(tempPath, payload, 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }

  return Buffer.byteLength(payload, 'utf8');
}

function serializeJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Bytes {@link writeJsonAtomic} will write for `data`
 */
export function jsonByteLength(data: unknown): number {
  return Buffer.byteLength(serializeJson(data), 'utf8');
}

/**
 * Read and JSON-parse a file
 *
 * @returns `null` when the file does not exist; parse errors are thrown
 */
export async function readJsonFile(path: string): Promise<unknown> {
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
 * Remove a file, treating "already gone" as success
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

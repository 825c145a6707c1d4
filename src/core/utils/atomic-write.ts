/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so an output document is either the previous
 * version or the complete new one, never a truncated file the app would
 * fail to decode.
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file, creating parent directories
 *
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    // temp file may never have been created
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 *
 * Non-ASCII text (Arabic names, phrases) is written as-is, not escaped.
 *
 * @example
 * ```typescript
 * await atomicWriteJSON('content/site_content.json', document);
 * ```
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = JSON.stringify(data, null, space);
  await atomicWriteFile(filePath, `${json}\n`, 'utf-8');
}

export interface StagedFile {
  readonly path: string;
  readonly data: string;
}

/**
 * Write several files as one unit
 *
 * Every temp file is written before any is renamed into place, so a
 * failure while staging (unwritable directory, full disk) leaves all
 * targets untouched and removes the temp files already written.
 *
 * @throws Error from the first write or rename that fails
 */
export async function atomicWriteFiles(
  files: readonly StagedFile[],
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  const staged: { readonly tempPath: string; readonly path: string }[] = [];

  try {
    for (const [index, file] of files.entries()) {
      await mkdir(dirname(file.path), { recursive: true });
      const tempPath = `${file.path}.${process.pid}.${Date.now()}.${index}.tmp`;
      staged.push({ tempPath, path: file.path });
      await writeFile(tempPath, file.data, encoding);
    }
  } catch (error) {
    await Promise.all(staged.map(({ tempPath }) => unlink(tempPath).catch(() => undefined)));
    throw error;
  }

  for (const { tempPath, path } of staged) {
    await rename(tempPath, path);
  }
}

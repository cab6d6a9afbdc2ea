/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write and copy operations using the temp file + rename
 * pattern, plus complementary read operations. A rename within one directory
 * replaces the target in a single step, so readers see either the old or the
 * new content, never a partial file.
 *
 * Note: If the process crashes between temp file creation and rename,
 * orphaned *.tmp.* files may remain in the target directory.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Build a temp path beside `filePath`, so that the final rename never
 * crosses a file system boundary.
 */
function tempPathFor(filePath: string): string {
  return `${filePath}.tmp.${process.pid}.${Date.now()}`;
}

/**
 * Remove a temp file left behind by a failed operation.
 * A missing file is fine; anything else is reported.
 */
async function removeTempFile(tempPath: string): Promise<void> {
  await fs.rm(tempPath, { force: true });
}

/**
 * Run `writeTemp` against a fresh temp path and rename the result over
 * `filePath`. The temp file is removed again if anything fails.
 */
async function replaceAtomically(
  filePath: string,
  writeTemp: (tempPath: string) => Promise<void>
): Promise<void> {
  const tempPath = tempPathFor(filePath);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await writeTemp(tempPath);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await removeTempFile(tempPath);
    throw error;
  }
}

/**
 * Atomically write JSON data to a file
 *
 * @param filePath - Target file path
 * @param data - Data to write (will be JSON.stringify'd with 2-space indentation)
 *
 * @example
 * await atomicWriteJson('/path/to/config.json', { schemaVersion: 1 });
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const json = JSON.stringify(data, null, 2);
  await replaceAtomically(filePath, (tempPath) => fs.writeFile(tempPath, json, 'utf-8'));
}

/**
 * Atomically replace `destinationPath` with a byte copy of `sourcePath`.
 *
 * Either the destination ends up as an exact copy of the source, or it is
 * left exactly as it was before the call.
 *
 * @throws The underlying file system error if the copy fails
 */
export async function atomicCopyFile(sourcePath: string, destinationPath: string): Promise<void> {
  await replaceAtomically(destinationPath, (tempPath) => fs.copyFile(sourcePath, tempPath));
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`, { cause: error });
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
  }
}

/**
 * Check if a file exists (not a directory)
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Narrow an unknown error to a Node.js system error carrying a `code`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

import { promises as fs } from 'fs';
import * as path from 'path';

let tempCounter = 0;

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse a JSON document. Returns `undefined` when the file does not exist;
 * any other read or parse failure is thrown to the caller.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }

  const data: unknown = JSON.parse(raw);
  return data;
}

/**
 * Overwrite a JSON document atomically: the data is written to a temp file beside the
 * target, then renamed over it, so readers see either the old or the new document.
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.${tempCounter++}.tmp`;
  try {
    await fs.writeFile(tempPath, `${JSON.stringify(data, null, 4)}\n`, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

import { readFile, stat } from 'node:fs/promises';
import { ExtractionError, errorMessage } from '../../errors.js';

export async function readInputFile(path: string): Promise<Buffer> {
  let size: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) throw new ExtractionError(`Not a regular file: ${path}`);
    size = info.size;
  } catch (error) {
    if (error instanceof ExtractionError) throw error;
    throw new ExtractionError(`File not found or unreadable: ${path} (${errorMessage(error)})`, { cause: error });
  }

  if (size === 0) throw new ExtractionError(`File is empty (0 bytes): ${path}`);
  return readFile(path);
}

/**
 * Reading source PDFs
 *
 * A file that disappears or cannot be opened after discovery is an input
 * problem, not a backend failure, so it is never retried.
 *
 * @module services/ocr/source-file
 */

import fs from 'fs';
import path from 'path';
import { InputError } from '../../pipeline/errors.js';

const INPUT_ERROR_CODES: ReadonlySet<string> = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * @throws InputError when the file is missing or cannot be read; other errors
 * (an aborted read among them) propagate unchanged
 */
export async function readSourceFile(filePath: string, signal?: AbortSignal): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath, { signal });
  } catch (error) {
    const code = errorCode(error);
    if (code !== undefined && INPUT_ERROR_CODES.has(code)) {
      const document = path.basename(filePath);
      throw new InputError(`Cannot open ${document} (${code})`, { document, path: filePath });
    }
    throw error;
  }
}

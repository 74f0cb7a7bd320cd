/**
 * Locate a company's source PDFs
 *
 * @module services/ocr/pdf-discovery
 */

import { existsSync, lstatSync, readdirSync, statSync } from 'fs';
import { extname, resolve } from 'path';
import { InputError } from '../../pipeline/errors.js';

export interface SourcePdf {
  filename: string;
  path: string;
}

/**
 * PDF files directly inside `folderPath`, sorted by filename. Symlinks and
 * subdirectories are ignored.
 *
 * @throws InputError when the folder is missing or holds no PDF
 */
export function discoverPdfs(folderPath: string, company: string): SourcePdf[] {
  if (!existsSync(folderPath) || !statSync(folderPath).isDirectory()) {
    throw new InputError(`Company folder not found: ${folderPath}`, { company });
  }

  const pdfs: SourcePdf[] = [];
  for (const entry of readdirSync(folderPath, { withFileTypes: true })) {
    const fullPath = resolve(folderPath, entry.name);
    if (lstatSync(fullPath).isSymbolicLink()) {
      console.error(`[OCR] Skipping symlink: ${fullPath}`);
      continue;
    }
    if (entry.isFile() && extname(entry.name).toLowerCase() === '.pdf') {
      pdfs.push({ filename: entry.name, path: fullPath });
    }
  }

  if (pdfs.length === 0) {
    throw new InputError(`No PDF files in ${folderPath}`, { company });
  }
  return pdfs.sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));
}

/**
 * OCR backend over the PDF text layer (pdf-parse)
 *
 * Scanned PDFs without a text layer yield an empty string and are reported as
 * InputError, so the run stops with the offending filename instead of
 * versioning a blank document.
 *
 * @module services/ocr/pdf-text
 */

import path from 'path';
import { PDFParse } from 'pdf-parse';
import type { OcrCapability, OcrText } from '../../pipeline/capabilities.js';
import { InputError, errorMessage } from '../../pipeline/errors.js';
import { readSourceFile } from './source-file.js';

export class PdfTextOcr implements OcrCapability {
  readonly name = 'pdf-parse';

  async extractText(filePath: string, signal: AbortSignal): Promise<OcrText> {
    const document = path.basename(filePath);
    const data = await readSourceFile(filePath, signal);
    const parser = new PDFParse({ data });
    let text: string;
    let pageCount: number;
    try {
      const parsed = await parser.getText();
      text = parsed.text ?? '';
      pageCount = parsed.total;
    } catch (error) {
      throw new InputError(`Cannot read PDF ${document}: ${errorMessage(error)}`, { document });
    } finally {
      await parser.destroy().catch((error: unknown) => {
        console.error(`[OCR] Could not release parser for ${document}: ${errorMessage(error)}`);
      });
    }

    if (text.trim().length === 0) {
      throw new InputError(`PDF ${document} has no text layer`, { document });
    }
    return { text, pageCount };
  }
}

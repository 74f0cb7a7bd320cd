/**
 * OCR stage: one text per PDF in the company folder
 *
 * Each file is hashed first; an unchanged file takes its text from the OCR
 * cache instead of the backend.
 *
 * @module pipeline/stages/ocr
 */

import { discoverPdfs } from '../../services/ocr/pdf-discovery.js';
import { readSourceFile } from '../../services/ocr/source-file.js';
import { computeHash } from '../../utils/hash.js';
import { DocumentArena, type NewDocument } from '../arena.js';
import type { OcrText } from '../capabilities.js';
import { callExternal } from '../external-call.js';
import type { StageDefinition } from './types.js';

export const ocrStage: StageDefinition<'ocr'> = {
  name: 'ocr',

  async run(state, { capabilities, policy, ocrCache }) {
    const pdfs = discoverPdfs(state.folderPath, state.companyId);
    const engine = capabilities.ocr.name;
    const sources: NewDocument[] = [];
    const cachedDocuments: number[] = [];

    for (const pdf of pdfs) {
      const data = await readSourceFile(pdf.path);
      const contentHash = computeHash(data);

      let ocr: OcrText | null = ocrCache?.get(contentHash, engine) ?? null;
      const fromCache = ocr !== null;
      if (ocr === null) {
        ocr = await callExternal(
          'ocr',
          (signal) => capabilities.ocr.extractText(pdf.path, signal),
          policy,
          { document: pdf.filename }
        );
        ocrCache?.put(contentHash, engine, ocr);
      } else {
        cachedDocuments.push(sources.length);
      }

      console.error(
        `[OCR] ${pdf.filename}: ${ocr.text.length} chars, ${ocr.pageCount} page(s) (${fromCache ? 'cache' : engine})`
      );
      sources.push({
        filename: pdf.filename,
        sourcePath: pdf.path,
        rawText: ocr.text,
        metadata: { contentHash, byteSize: data.length, pageCount: ocr.pageCount, fromCache },
      });
    }

    const documents = DocumentArena.fromSources(sources);
    return {
      documents,
      output: {
        documents: documents.all().map((entry) => entry.index),
        totalCharacters: sources.reduce((sum, source) => sum + source.rawText.length, 0),
        cachedDocuments,
      },
    };
  },
};

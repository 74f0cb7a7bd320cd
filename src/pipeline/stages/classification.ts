/**
 * Classification stage
 *
 * Labels every document (keyword rules first, extraction backend when no rule
 * matches), flags amendments, and extracts structured fields for documents
 * that take part in versioning. The arena is frozen after this stage.
 *
 * @module pipeline/stages/classification
 */

import {
  isClassification,
  type DocumentEntry,
  type StructuredFields,
} from '../../models/document.js';
import type { ClassificationLabel, PipelineWarning } from '../../models/pipeline.js';
import {
  CLASSIFICATION_SPEC,
  KeywordClassifier,
} from '../../services/classification/keyword-classifier.js';
import { STRUCTURED_FIELDS_SPEC } from '../../services/extraction/field-catalog.js';
import { PipelineError } from '../errors.js';
import { callExternal } from '../external-call.js';
import type { StageContext, StageDefinition } from './types.js';

function isParseFailure(error: unknown): error is PipelineError {
  return error instanceof PipelineError && error.category === 'PARSE_ERROR';
}

async function labelDocument(
  entry: DocumentEntry,
  classifier: KeywordClassifier,
  { capabilities, policy }: StageContext,
  warnings: PipelineWarning[]
): Promise<Pick<ClassificationLabel, 'label' | 'method'>> {
  const byKeywords = classifier.classify(entry.rawText);
  if (byKeywords !== null) return { label: byKeywords, method: 'keywords' };

  try {
    const answer = await callExternal(
      'classification',
      (signal) => capabilities.extractor.extractStructured(entry.rawText, CLASSIFICATION_SPEC, signal),
      policy,
      { document: entry.filename }
    );
    return { label: answer.clasificacion, method: 'model' };
  } catch (error) {
    if (!isParseFailure(error)) throw error;
    warnings.push({
      stage: 'classification',
      category: 'PARSE_ERROR',
      message: `Could not classify ${entry.filename}: ${error.message}`,
      document: entry.filename,
    });
    return { label: 'otros', method: 'model' };
  }
}

async function extractFields(
  entry: DocumentEntry,
  { capabilities, policy }: StageContext,
  warnings: PipelineWarning[]
): Promise<StructuredFields | null> {
  try {
    return await callExternal(
      'structured_fields',
      (signal) => capabilities.extractor.extractStructured(entry.rawText, STRUCTURED_FIELDS_SPEC, signal),
      policy,
      { document: entry.filename }
    );
  } catch (error) {
    if (!isParseFailure(error)) throw error;
    console.error(`[Classification] Field extraction failed for ${entry.filename}: ${error.message}`);
    warnings.push({
      stage: 'classification',
      category: 'PARSE_ERROR',
      message: `Structured fields unavailable for ${entry.filename}: ${error.message}`,
      document: entry.filename,
    });
    return null;
  }
}

export const classificationStage: StageDefinition<'classification'> = {
  name: 'classification',

  async run(state, context) {
    const classifier = new KeywordClassifier(context.classificationRules);
    const warnings: PipelineWarning[] = [];
    const labels: ClassificationLabel[] = [];
    const extractionFailures: number[] = [];
    let documents = state.documents;

    for (const entry of state.documents.all()) {
      const { label, method } = await labelDocument(entry, classifier, context, warnings);
      const isModification = classifier.isModification(entry.rawText);
      labels.push({ docIndex: entry.index, label, isModification, method });

      let structuredFields: StructuredFields | null = null;
      if (isClassification(label)) {
        structuredFields = await extractFields(entry, context, warnings);
        if (structuredFields === null) extractionFailures.push(entry.index);
      } else {
        warnings.push({
          stage: 'classification',
          category: 'VALIDATION_ERROR',
          message: `${entry.filename} is not a versioned document type and is left out of versioning`,
          document: entry.filename,
        });
      }

      console.error(
        `[Classification] ${entry.filename}: ${label} (${method}${isModification ? ', modificación' : ''})`
      );
      documents = documents.update(entry.index, {
        classification: label,
        isModification,
        structuredFields,
      });
    }

    return { documents, warnings, output: { labels, extractionFailures } };
  },
};

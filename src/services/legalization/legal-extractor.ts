/**
 * Detection of legal powers (facultades) and their restrictions
 *
 * For every versioned document and every catalog entry:
 *  1. retrieve candidate fragments (vector search or plain chunks)
 *  2. keep fragments with a keyword and all mandatory anchors
 *  3. ask the model whether the fragment actually grants the power
 *  4. keep the best verified answer, stopping at the first `alta`
 *
 * Restrictions stated by a verified answer become restriction findings on the
 * same document.
 *
 * @module services/legalization/legal-extractor
 */

import { z } from 'zod';
import type {
  Confidence,
  FacultadDefinition,
  FacultadHallazgo,
  LegalizationResult,
  RestriccionHallazgo,
} from '../../models/legalization.js';
import type { VersionedDocument } from '../../models/versioning.js';
import type { ExtractionSpec } from '../../pipeline/capabilities.js';
import { containsAllAnchors, containsAnyKeyword } from './text-chunks.js';

// ═══════════════════════════════════════════════════════════════════════════════
// VERIFICATION ANSWER
// ═══════════════════════════════════════════════════════════════════════════════

const CONFIDENCE_ORDER: readonly Confidence[] = ['alta', 'media', 'baja'];

const optionalText = z
  .union([z.string(), z.null()])
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? '';
    return trimmed.length > 0 ? trimmed : null;
  });

const booleanish = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const folded = value.trim().toLowerCase();
  if (['true', 'si', 'sí', 'yes'].includes(folded)) return true;
  if (['false', 'no'].includes(folded)) return false;
  return value;
}, z.boolean());

export const VerificationAnswerSchema = z.object({
  otorgado: booleanish,
  actor: optionalText,
  limites: optionalText,
  restricciones: optionalText,
  evidencia: optionalText,
  confianza: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['alta', 'media', 'baja']).catch('baja')
  ),
  motivo_no_otorgado: optionalText,
});

export type VerificationAnswer = z.infer<typeof VerificationAnswerSchema>;

export function verificationSpec(definition: FacultadDefinition): ExtractionSpec<VerificationAnswer> {
  return {
    name: `facultad_${definition.codigo}`,
    instructions: [
      'Determina si el fragmento de un documento legal chileno OTORGA la siguiente facultad a los administradores o apoderados de la sociedad.',
      `Facultad: ${definition.nombre}`,
      `Descripción: ${definition.descripcion}`,
      'Responde otorgado=false si el fragmento solo menciona el tema sin conferir la facultad.',
      'En "evidencia" copia literalmente la frase que la otorga. En "restricciones" indica límites de monto, firmas conjuntas o autorizaciones previas; usa null si no hay.',
    ].join('\n'),
    example: {
      otorgado: true,
      actor: 'el gerente general',
      limites: null,
      restricciones: null,
      evidencia: '...',
      confianza: 'alta',
      motivo_no_otorgado: null,
    },
    schema: VerificationAnswerSchema,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export interface LegalSource {
  versioned: VersionedDocument;
  text: string;
}

export interface LegalDetectionHooks {
  /** Candidate fragments of one document for one facultad, before the anchor filter */
  retrieve(definition: FacultadDefinition, source: LegalSource): Promise<string[]>;
  /** Model verdict on a fragment; null when no usable answer came back */
  verify(definition: FacultadDefinition, fragment: string, source: LegalSource): Promise<VerificationAnswer | null>;
}

function confidenceRank(confidence: Confidence): number {
  return CONFIDENCE_ORDER.indexOf(confidence);
}

/**
 * Fragments worth sending to the model
 */
export function anchoredFragments(definition: FacultadDefinition, fragments: readonly string[]): string[] {
  return fragments.filter(
    (fragment) =>
      containsAnyKeyword(fragment, definition.palabras_claves) &&
      containsAllAnchors(fragment, definition.anclas_obligatorias)
  );
}

export async function detectFacultades(
  sources: readonly LegalSource[],
  catalog: readonly FacultadDefinition[],
  hooks: LegalDetectionHooks
): Promise<LegalizationResult> {
  const facultades: FacultadHallazgo[] = [];
  const restricciones: RestriccionHallazgo[] = [];
  let verified = 0;

  for (const source of sources) {
    const origin = {
      documento: source.versioned.filename,
      version: source.versioned.versionNumber,
      clasificacion: source.versioned.classificationGroup,
    };

    for (const definition of catalog) {
      const candidates = anchoredFragments(definition, await hooks.retrieve(definition, source));

      let best: { answer: VerificationAnswer; fragment: string } | null = null;
      for (const fragment of candidates) {
        verified++;
        const answer = await hooks.verify(definition, fragment, source);
        if (!answer?.otorgado) continue;
        if (best === null || confidenceRank(answer.confianza) < confidenceRank(best.answer.confianza)) {
          best = { answer, fragment };
        }
        if (answer.confianza === 'alta') break;
      }
      if (best === null) continue;

      facultades.push({
        ...origin,
        codigo: definition.codigo,
        nombre: definition.nombre,
        grupo: definition.grupo,
        actor: best.answer.actor,
        limites: best.answer.limites,
        evidencia: best.answer.evidencia ?? best.fragment.slice(0, 300),
        confianza: best.answer.confianza,
      });
      if (best.answer.restricciones !== null) {
        restricciones.push({ ...origin, codigo: definition.codigo, descripcion: best.answer.restricciones });
      }
    }
  }

  const base = sources.find(
    (source) => source.versioned.classificationGroup === 'escritura_publica' && source.versioned.isBase
  );

  console.error(
    `[Legalization] ${facultades.length} facultad(es), ${restricciones.length} restriction(s) from ${sources.length} document(s), ${verified} fragment(s) verified`
  );

  return {
    documento_base: base?.versioned.filename ?? null,
    facultades,
    restricciones,
    fragmentos_verificados: verified,
  };
}

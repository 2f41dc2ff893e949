/**
 * Annotation extraction from document rows.
 *
 * Annotation payloads come from several pipeline versions and are frequently
 * malformed: broken JSON, a bare object where a list is expected, numbers in
 * string slots. Every decode step returns a tagged result instead of throwing
 * so one bad field never costs the rest of the document.
 *
 * @module fragment-extraction
 */

import type { AnnotationSchemaVariant, NarrativeAnnotation } from '@/types/narratives'
import { AnnotationEntrySchema, AnnotationListSchema, PAYLOAD_KEYS } from './schemas'

// ============================================
// TYPES
// ============================================

/** Column prefix of per-model payloads: `annotation_parsed_<model>`. */
export const PER_MODEL_FIELD_PREFIX = 'annotation_parsed_'

export const DEFAULT_ANNOTATION_FIELD = 'annotations'
export const DEFAULT_CONSOLIDATED_MODEL = 'consolidated'

export type FieldSkipReason = 'empty' | 'invalid-json' | 'not-a-list'
export type EntrySkipReason = 'not-an-object' | 'missing-fragment' | 'incomplete-entry'

export type FieldParseResult =
  | { kind: 'ok'; entries: unknown[] }
  | { kind: 'skip'; reason: FieldSkipReason }

export type EntryParseResult =
  | { kind: 'ok'; annotation: NarrativeAnnotation }
  | { kind: 'skip'; reason: EntrySkipReason }

export interface ExtractionOptions {
  variant: AnnotationSchemaVariant
  /** Field holding the consolidated payload (default: `annotations`) */
  annotationField?: string
  /** Model name for consolidated entries without a `model` key */
  defaultModel?: string
}

export interface ModelField {
  field: string
  model: string
}

// ============================================
// FIELD DECODING
// ============================================

/**
 * Decode one serialized annotation field into its list of raw entries.
 * Accepts JSON strings and already-decoded arrays.
 *
 * @example
 * decodeAnnotationField('[{"text fragment": "a"}]') // { kind: 'ok', entries: [...] }
 * decodeAnnotationField('{oops')                    // { kind: 'skip', reason: 'invalid-json' }
 */
export function decodeAnnotationField(value: unknown): FieldParseResult {
  if (value == null || value === '') {
    return { kind: 'skip', reason: 'empty' }
  }

  let decoded: unknown = value
  if (typeof value === 'string') {
    try {
      decoded = JSON.parse(value)
    } catch {
      return { kind: 'skip', reason: 'invalid-json' }
    }
  }

  const list = AnnotationListSchema.safeParse(decoded)
  if (!list.success) {
    return { kind: 'skip', reason: 'not-a-list' }
  }

  return { kind: 'ok', entries: list.data }
}

/**
 * List the per-model payload columns of a row, in row key order.
 */
export function listModelFields(row: Record<string, unknown>): ModelField[] {
  return Object.keys(row)
    .filter((field) => field.startsWith(PER_MODEL_FIELD_PREFIX))
    .map((field) => ({ field, model: field.slice(PER_MODEL_FIELD_PREFIX.length) }))
    .filter(({ model }) => model.length > 0)
}

// ============================================
// ENTRY PARSING
// ============================================

/**
 * Parse a per-model entry.
 *
 * A usable fragment is enough; theme and meso are optional. Entries without a
 * fragment are still kept as display-only metadata when they carry both theme
 * and meso, so the metadata table can show them.
 */
export function parsePerModelEntry(entry: unknown, model: string): EntryParseResult {
  const parsed = AnnotationEntrySchema.safeParse(entry)
  if (!parsed.success) {
    return { kind: 'skip', reason: 'not-an-object' }
  }

  const fragment = parsed.data[PAYLOAD_KEYS.fragment]
  const theme = parsed.data[PAYLOAD_KEYS.theme]
  const mesoNarrative = parsed.data[PAYLOAD_KEYS.mesoNarrative]

  if (!fragment && !(theme && mesoNarrative)) {
    return { kind: 'skip', reason: 'missing-fragment' }
  }

  return {
    kind: 'ok',
    annotation: { fragment, theme, mesoNarrative, model, hasFragment: fragment !== undefined },
  }
}

/**
 * Parse a consolidated entry. Fragment, theme and meso are all required.
 */
export function parseConsolidatedEntry(entry: unknown, defaultModel: string): EntryParseResult {
  const parsed = AnnotationEntrySchema.safeParse(entry)
  if (!parsed.success) {
    return { kind: 'skip', reason: 'not-an-object' }
  }

  const fragment = parsed.data[PAYLOAD_KEYS.fragment]
  const theme = parsed.data[PAYLOAD_KEYS.theme]
  const mesoNarrative = parsed.data[PAYLOAD_KEYS.mesoNarrative]

  if (!fragment || !theme || !mesoNarrative) {
    return { kind: 'skip', reason: 'incomplete-entry' }
  }

  return {
    kind: 'ok',
    annotation: {
      fragment,
      theme,
      mesoNarrative,
      model: parsed.data[PAYLOAD_KEYS.model] ?? defaultModel,
      hasFragment: true,
    },
  }
}

// ============================================
// CORE FUNCTION
// ============================================

/**
 * Extract every annotation of a document row under the configured schema
 * variant. Never throws; skipped fields and entries simply contribute nothing.
 *
 * @param row - Document row (annotation fields as JSON strings or arrays)
 * @param options - Schema variant and consolidated-field settings
 * @returns Annotations in field order, then entry order
 *
 * @example
 * ```typescript
 * extractAnnotations(
 *   { annotation_parsed_alpha: '[{"text fragment": "prices rose"}]' },
 *   { variant: 'per-model' }
 * )
 * // [{ fragment: 'prices rose', model: 'alpha', hasFragment: true, ... }]
 * ```
 */
export function extractAnnotations(
  row: Record<string, unknown>,
  options: ExtractionOptions
): NarrativeAnnotation[] {
  if (options.variant === 'consolidated') {
    const field = options.annotationField ?? DEFAULT_ANNOTATION_FIELD
    const defaultModel = options.defaultModel ?? DEFAULT_CONSOLIDATED_MODEL
    return collectEntries(row[field], (entry) => parseConsolidatedEntry(entry, defaultModel))
  }

  return listModelFields(row).flatMap(({ field, model }) =>
    collectEntries(row[field], (entry) => parsePerModelEntry(entry, model))
  )
}

function collectEntries(
  value: unknown,
  parseEntry: (entry: unknown) => EntryParseResult
): NarrativeAnnotation[] {
  const field = decodeAnnotationField(value)
  if (field.kind === 'skip') {
    return []
  }

  const annotations: NarrativeAnnotation[] = []
  for (const entry of field.entries) {
    const result = parseEntry(entry)
    if (result.kind === 'ok') {
      annotations.push(result.annotation)
    }
  }
  return annotations
}

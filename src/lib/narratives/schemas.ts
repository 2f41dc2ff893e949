/**
 * Zod schemas for annotation payloads and exported document rows.
 * Provides runtime validation for data produced by upstream annotation
 * pipelines, where any key may be missing or mistyped.
 */

import { z } from 'zod'

/** Payload keys written by the annotation pipelines. */
export const PAYLOAD_KEYS = {
  fragment: 'text fragment',
  theme: 'narrative theme',
  mesoNarrative: 'meso narrative',
  model: 'model',
} as const

/**
 * Trimmed non-blank string, or undefined for anything else.
 * A mistyped key is dropped on its own without rejecting the entry.
 */
const usableText = z
  .unknown()
  .transform((value) => (typeof value === 'string' && value.trim() ? value.trim() : undefined))

/**
 * One object inside a serialized annotation list.
 */
export const AnnotationEntrySchema = z.object({
  [PAYLOAD_KEYS.fragment]: usableText,
  [PAYLOAD_KEYS.theme]: usableText,
  [PAYLOAD_KEYS.mesoNarrative]: usableText,
  [PAYLOAD_KEYS.model]: usableText,
})

export type AnnotationEntry = z.infer<typeof AnnotationEntrySchema>

/** A serialized annotation field must decode to a list. */
export const AnnotationListSchema = z.array(z.unknown())

// `null` cells come out of the export as null; the dashboard treats them as ''
const cellText = z.preprocess((value) => (value == null ? '' : String(value)), z.string())

const optionalCellText = z.preprocess(
  (value) => (value == null ? undefined : String(value)),
  z.string().optional()
)

/**
 * Exported document row. Unknown columns (annotation fields, sample labels)
 * pass through untouched.
 */
export const NarrativeDocumentSchema = z
  .object({
    title: cellText,
    body: cellText,
    url: optionalCellText,
    pub_date: optionalCellText,
    source_table: optionalCellText,
  })
  .passthrough()

export type NarrativeDocumentRow = z.infer<typeof NarrativeDocumentSchema>

/**
 * Document filtering for the narratives browser: source table, sample theme
 * and meso-narrative (as claimed by any model).
 */

import type { NarrativeDocument } from '@/types/narratives'
import {
  DEFAULT_ANNOTATION_FIELD,
  decodeAnnotationField,
  listModelFields,
  type ExtractionOptions,
} from './fragment-extraction'
import { AnnotationEntrySchema, PAYLOAD_KEYS } from './schemas'

// ============================================
// TYPES
// ============================================

export interface SampleColumns {
  /** `theme`, else `dominant_theme` */
  themeColumn?: string
  /** `meso`, else `meso_narrative` */
  mesoColumn?: string
}

export interface DocumentFilters {
  sourceTable?: string | null
  /** Sample theme column value */
  theme?: string | null
  /** Meso-narrative claimed by any model */
  mesoNarrative?: string | null
}

export interface FilterOptions {
  sourceTables: string[]
  themes: string[]
  mesoNarratives: string[]
}

type PayloadOptions = Pick<ExtractionOptions, 'variant' | 'annotationField'>

const DEFAULT_PAYLOAD_OPTIONS: PayloadOptions = { variant: 'per-model' }

// ============================================
// COLUMNS
// ============================================

/**
 * Detect which sample label columns the export carries.
 */
export function resolveSampleColumns(rows: Array<Record<string, unknown>>): SampleColumns {
  const has = (column: string) => rows.some((row) => column in row)

  return {
    themeColumn: has('theme') ? 'theme' : has('dominant_theme') ? 'dominant_theme' : undefined,
    mesoColumn: has('meso') ? 'meso' : has('meso_narrative') ? 'meso_narrative' : undefined,
  }
}

// ============================================
// MESO SETS
// ============================================

/**
 * Every meso-narrative any model attached to the document, trimmed.
 * Entries count even without a fragment or theme.
 */
export function gatherMesoNarratives(
  row: Record<string, unknown>,
  options: PayloadOptions = DEFAULT_PAYLOAD_OPTIONS
): Set<string> {
  const fields =
    options.variant === 'consolidated'
      ? [options.annotationField ?? DEFAULT_ANNOTATION_FIELD]
      : listModelFields(row).map(({ field }) => field)

  const mesoNarratives = new Set<string>()
  for (const field of fields) {
    const decoded = decodeAnnotationField(row[field])
    if (decoded.kind === 'skip') continue

    for (const entry of decoded.entries) {
      const parsed = AnnotationEntrySchema.safeParse(entry)
      const meso = parsed.success ? parsed.data[PAYLOAD_KEYS.mesoNarrative] : undefined
      if (meso) {
        mesoNarratives.add(meso)
      }
    }
  }
  return mesoNarratives
}

// ============================================
// FILTERING
// ============================================

/**
 * Apply the sidebar filters. Unset (null, undefined or '') filters match all.
 */
export function filterDocuments(
  rows: NarrativeDocument[],
  filters: DocumentFilters,
  options: PayloadOptions = DEFAULT_PAYLOAD_OPTIONS
): NarrativeDocument[] {
  const { themeColumn } = resolveSampleColumns(rows)

  return rows.filter((row) => {
    if (filters.sourceTable && row.source_table !== filters.sourceTable) {
      return false
    }
    if (filters.theme && themeColumn && row[themeColumn] !== filters.theme) {
      return false
    }
    if (filters.mesoNarrative && !gatherMesoNarratives(row, options).has(filters.mesoNarrative)) {
      return false
    }
    return true
  })
}

/**
 * Sorted distinct values for each filter select.
 */
export function listFilterOptions(
  rows: NarrativeDocument[],
  options: PayloadOptions = DEFAULT_PAYLOAD_OPTIONS
): FilterOptions {
  const { themeColumn } = resolveSampleColumns(rows)
  const sourceTables = new Set<string>()
  const themes = new Set<string>()
  const mesoNarratives = new Set<string>()

  for (const row of rows) {
    if (row.source_table) {
      sourceTables.add(row.source_table)
    }
    const theme = themeColumn ? row[themeColumn] : undefined
    if (typeof theme === 'string' && theme.trim()) {
      themes.add(theme)
    }
    for (const meso of gatherMesoNarratives(row, options)) {
      mesoNarratives.add(meso)
    }
  }

  const sorted = (values: Set<string>) => Array.from(values).sort()
  return {
    sourceTables: sorted(sourceTables),
    themes: sorted(themes),
    mesoNarratives: sorted(mesoNarratives),
  }
}

/**
 * First document with the given title, or the first document when no title
 * is given.
 */
export function findRecord(rows: NarrativeDocument[], title?: string | null): NarrativeDocument | undefined {
  if (!title) return rows[0]
  return rows.find((row) => row.title === title)
}

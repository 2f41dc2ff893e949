/**
 * Narrative highlight type definitions.
 *
 * Shared by the extraction, location, merge and render stages. All values are
 * per-render: they are rebuilt from the document body and its annotation
 * payloads on every view and never persisted.
 */

// ============================================
// ANNOTATIONS
// ============================================

/**
 * Label attached to every located span and merged segment.
 * Identity is the full (theme, mesoNarrative, model) triple.
 */
export interface NarrativeLabel {
  theme?: string
  mesoNarrative?: string
  /** Producing model, e.g. the `<model>` suffix of `annotation_parsed_<model>` */
  model: string
}

/**
 * One narrative claim about a document.
 * Annotations without a fragment are display-only and never located.
 */
export interface NarrativeAnnotation extends NarrativeLabel {
  fragment?: string
  hasFragment: boolean
}

/**
 * Annotation payload layouts.
 * - `per-model`: one `annotation_parsed_<model>` field per model, any usable fragment counts
 * - `consolidated`: one field, fragment + theme + meso all required
 */
export type AnnotationSchemaVariant = 'per-model' | 'consolidated'

// ============================================
// LOCATION
// ============================================

/** Cascade step that produced a span, in the order they are tried. */
export type LocateStrategy = 'exact' | 'normalized' | 'gapped-regex' | 'fuzzy-anchor'

/**
 * Half-open span into the original, unnormalized body.
 * Invariant: 0 <= start < end <= body.length
 */
export interface LocatedSpan {
  start: number
  end: number
  label: NarrativeLabel
  strategy: LocateStrategy
  /** Levenshtein similarity, only set for fuzzy-anchor matches */
  similarity?: number
}

/**
 * Per-annotation location result. `span` is null when the fragment could not
 * be found (or the annotation carries no fragment).
 */
export interface LocationOutcome {
  annotation: NarrativeAnnotation
  span: LocatedSpan | null
}

// ============================================
// MERGE + RENDER
// ============================================

/**
 * Maximal run of the body covered by a constant, non-empty label set.
 */
export interface MergedSegment {
  start: number
  end: number
  labels: NarrativeLabel[]
}

/**
 * One row of the narratives metadata table. Every extracted annotation gets a
 * row, located or not.
 */
export interface NarrativeMetadataRow {
  index: number
  model: string
  theme: string | null
  mesoNarrative: string | null
  /** Fragment text, or NO_FRAGMENT_MARKER */
  textFragment: string
  fragmentPresent: boolean
  located: boolean
  strategy: LocateStrategy | null
  selectedMesoMatch: boolean
}

export interface HighlightStats {
  totalAnnotations: number
  withoutFragment: number
  located: Record<LocateStrategy, number>
  unlocated: number
  totalTimeMs: number
}

export interface HighlightResult {
  html: string
  segments: MergedSegment[]
  outcomes: LocationOutcome[]
  metadata: NarrativeMetadataRow[]
  stats: HighlightStats
}

// ============================================
// DOCUMENTS
// ============================================

/**
 * Document row as exported from the samples table. Annotation fields are
 * either JSON strings or already-parsed arrays; anything else is tolerated and
 * ignored by the extractor.
 */
export interface NarrativeDocument {
  title: string
  body: string
  url?: string
  pub_date?: string
  source_table?: string
  [column: string]: unknown
}

/**
 * Per-document highlight pipeline: extract → locate → merge → render.
 *
 * Synchronous and stateless. Everything it returns is derived from the row and
 * options passed in, so callers may cache results (see HighlightCache).
 *
 * @module narrative-highlighter
 */

import type {
  HighlightResult,
  HighlightStats,
  LocateStrategy,
  LocatedSpan,
  LocationOutcome,
  NarrativeMetadataRow,
} from '@/types/narratives'
import { extractAnnotations, type ExtractionOptions } from './fragment-extraction'
import { renderHighlights } from './highlight-renderer'
import { mergeSpans } from './overlap-merger'
import { locateAnnotations } from './span-locator'

/** Metadata table value for annotations that carry no fragment. */
export const NO_FRAGMENT_MARKER = '[no fragment]'

export interface HighlightDocumentOptions extends ExtractionOptions {
  selectedMeso?: string | null
  /** Log a one-line location summary per document */
  verbose?: boolean
}

/**
 * Build the metadata table: one row per annotation, located or not.
 */
export function buildMetadataRows(
  outcomes: LocationOutcome[],
  selectedMeso?: string | null
): NarrativeMetadataRow[] {
  return outcomes.map(({ annotation, span }, index) => ({
    index,
    model: annotation.model,
    theme: annotation.theme ?? null,
    mesoNarrative: annotation.mesoNarrative ?? null,
    textFragment: annotation.hasFragment && annotation.fragment ? annotation.fragment : NO_FRAGMENT_MARKER,
    fragmentPresent: annotation.hasFragment,
    located: span !== null,
    strategy: span?.strategy ?? null,
    selectedMesoMatch: selectedMeso ? annotation.mesoNarrative === selectedMeso : false,
  }))
}

function summarize(outcomes: LocationOutcome[], totalTimeMs: number): HighlightStats {
  const located: Record<LocateStrategy, number> = {
    exact: 0,
    normalized: 0,
    'gapped-regex': 0,
    'fuzzy-anchor': 0,
  }
  let withoutFragment = 0
  let unlocated = 0

  for (const { annotation, span } of outcomes) {
    if (!annotation.hasFragment) {
      withoutFragment++
    } else if (span) {
      located[span.strategy]++
    } else {
      unlocated++
    }
  }

  return { totalAnnotations: outcomes.length, withoutFragment, located, unlocated, totalTimeMs }
}

/**
 * Highlight one document row.
 *
 * @param row - Document row with a `body` and annotation payload fields
 * @param options - Schema variant, selected meso and logging
 * @returns Rendered HTML plus segments, per-annotation outcomes, metadata and stats
 *
 * @example
 * ```typescript
 * const result = highlightDocument(row, { variant: 'per-model', selectedMeso: 'Housing shortage' })
 * console.log(`${result.stats.unlocated} fragments could not be located`)
 * ```
 */
export function highlightDocument(
  row: Record<string, unknown>,
  options: HighlightDocumentOptions
): HighlightResult {
  const startTime = Date.now()
  const body = typeof row.body === 'string' ? row.body : ''

  const annotations = extractAnnotations(row, options)
  const outcomes = locateAnnotations(body, annotations)
  const spans = outcomes
    .map((outcome) => outcome.span)
    .filter((span): span is LocatedSpan => span !== null)
  const segments = mergeSpans(spans)
  const html = renderHighlights(body, segments, { selectedMeso: options.selectedMeso })

  const stats = summarize(outcomes, Date.now() - startTime)

  if (options.verbose) {
    const title = typeof row.title === 'string' ? row.title : '(untitled)'
    console.log(
      `[narratives] "${title.substring(0, 60)}": located ${spans.length}/${stats.totalAnnotations - stats.withoutFragment} fragments ` +
      `(exact: ${stats.located.exact}, normalized: ${stats.located.normalized}, ` +
      `gapped: ${stats.located['gapped-regex']}, fuzzy: ${stats.located['fuzzy-anchor']}) ` +
      `into ${segments.length} segments in ${stats.totalTimeMs}ms`
    )
  }

  return {
    html,
    segments,
    outcomes,
    metadata: buildMetadataRows(outcomes, options.selectedMeso),
    stats,
  }
}

/**
 * Fragment localization for narrative annotations.
 *
 * Finds where an LLM-quoted fragment sits in the original document body using
 * a 4-step cascade, returning the first step that succeeds:
 *
 * 1. **exact**: literal substring, then case-insensitive literal
 * 2. **normalized**: same searches with the normalized fragment
 * 3. **gapped-regex**: elision-aware pattern tolerating punctuation drift
 * 4. **fuzzy-anchor**: Levenshtein similarity around occurrences of the
 *    fragment's first characters
 *
 * The body is never normalized, so every offset is valid against the text the
 * reader actually sees.
 *
 * @module span-locator
 */

import { distance } from 'fastest-levenshtein'
import type {
  LocatedSpan,
  LocateStrategy,
  LocationOutcome,
  NarrativeAnnotation,
} from '@/types/narratives'
import {
  ELLIPSIS_MARKER,
  PERCENT_PLACEHOLDER,
  collapseWhitespace,
  escapeRegExp,
  normalizeFragment,
  normalizeText,
} from './text-normalization'

// ============================================
// CONSTANTS
// ============================================

/**
 * Longest run of body text an elision (`...`) may stand for. Also bounds how
 * many occurrences of the next part are tried after each matched part.
 */
export const MAX_ELISION_GAP = 280

/** Minimum Levenshtein similarity for a fuzzy-anchor match. */
export const FUZZY_SIMILARITY_THRESHOLD = 0.8

/** Characters of the fragment used to pick fuzzy candidate positions. */
export const FUZZY_ANCHOR_LENGTH = 8

/** Body window length relative to the fragment length. */
export const FUZZY_WINDOW_RATIO = 1.4

// Word boundaries in the quote may come back as commas, semicolons or dashes
const BOUNDARY_DRIFT = '[\\s,;:–—-]+'
const PERCENT_PATTERN = '(?:\\d+\\s*(?:%|percent|per\\s*cent))'

interface PartOccurrence {
  start: number
  end: number
}

interface SpanMatch {
  start: number
  end: number
  similarity?: number
}

// ============================================
// STRATEGIES
// ============================================

/**
 * Leftmost literal occurrence, falling back to a case-insensitive search.
 * The case-insensitive span covers the body text actually matched.
 */
export function findLiteral(body: string, needle: string): SpanMatch | null {
  if (!needle) return null

  const index = body.indexOf(needle)
  if (index !== -1) {
    return { start: index, end: index + needle.length }
  }

  const match = new RegExp(escapeRegExp(needle), 'i').exec(body)
  if (match) {
    return { start: match.index, end: match.index + match[0].length }
  }

  return null
}

/**
 * Build one search pattern per elided part of a normalized fragment.
 *
 * `"the economy ... grew"` gives `the[\s,;:–—-]+economy` and `grew`.
 * Returns null when the fragment has no searchable parts or a pattern does
 * not compile.
 */
export function buildGappedParts(normalizedFragment: string): RegExp[] | null {
  const parts = normalizedFragment
    .split(ELLIPSIS_MARKER)
    .map(normalizeText)
    .filter((part) => part.length > 0)

  if (parts.length === 0) return null

  const escapedPlaceholder = escapeRegExp(PERCENT_PLACEHOLDER)
  try {
    return parts.map(
      (part) =>
        new RegExp(
          escapeRegExp(part)
            .replace(/\s+/g, BOUNDARY_DRIFT)
            .split(escapedPlaceholder)
            .join(PERCENT_PATTERN),
          'gi'
        )
    )
  } catch (error) {
    console.warn('[span-locator] Skipping gapped-regex search, pattern did not compile:', {
      fragmentPreview: normalizedFragment.substring(0, 100),
      error: error instanceof Error ? error.message : String(error),
    })
    return null
  }
}

/**
 * Every start position where the pattern matches, overlapping ones included.
 */
function findOccurrences(body: string, pattern: RegExp): PartOccurrence[] {
  const occurrences: PartOccurrence[] = []
  pattern.lastIndex = 0

  let match: RegExpExecArray | null
  while ((match = pattern.exec(body)) !== null) {
    occurrences.push({ start: match.index, end: match.index + match[0].length })
    pattern.lastIndex = match.index + 1
  }
  return occurrences
}

/** Index of the first occurrence starting at or after `position`. */
function firstAtOrAfter(occurrences: PartOccurrence[], position: number): number {
  let low = 0
  let high = occurrences.length
  while (low < high) {
    const mid = (low + high) >>> 1
    if (occurrences[mid].start < position) {
      low = mid + 1
    } else {
      high = mid
    }
  }
  return low
}

/**
 * First elision-aware match in the body: the leftmost start, then for each
 * following part the nearest occurrence starting within
 * {@link MAX_ELISION_GAP} characters of the previous part's end.
 *
 * Parts are matched one at a time over their precomputed occurrences. An
 * occurrence that cannot complete the match is remembered and never retried,
 * so the work is bounded by parts × occurrences × gap instead of growing with
 * every extra elision.
 */
export function findGapped(body: string, normalizedFragment: string): SpanMatch | null {
  const patterns = buildGappedParts(normalizedFragment)
  if (!patterns) return null

  const occurrences = patterns.map((pattern) => findOccurrences(body, pattern))
  const deadEnds = occurrences.map(() => new Set<number>())
  const lastPart = occurrences.length - 1

  // End of the whole match when parts `index..` complete from `occurrence`
  const complete = (index: number, occurrence: PartOccurrence): number | null => {
    if (index === lastPart) return occurrence.end
    if (deadEnds[index].has(occurrence.start)) return null

    const next = occurrences[index + 1]
    const limit = occurrence.end + MAX_ELISION_GAP
    for (let i = firstAtOrAfter(next, occurrence.end); i < next.length && next[i].start <= limit; i++) {
      const end = complete(index + 1, next[i])
      if (end !== null) return end
    }

    deadEnds[index].add(occurrence.start)
    return null
  }

  for (const occurrence of occurrences[0]) {
    const end = complete(0, occurrence)
    if (end !== null && end > occurrence.start) {
      return { start: occurrence.start, end }
    }
  }
  return null
}

/**
 * Calculate similarity ratio from Levenshtein distance.
 * Returns 0.0-1.0 where 1.0 is identical.
 */
export function calculateSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length)
  if (maxLen === 0) return 1.0

  return 1.0 - distance(a, b) / maxLen
}

/**
 * Fuzzy search restricted to positions where the fragment's anchor occurs.
 *
 * Each candidate window is scored against the fragment; the best score wins
 * (earliest on ties) and must reach {@link FUZZY_SIMILARITY_THRESHOLD}.
 */
export function findFuzzyAnchor(body: string, normalizedFragment: string): SpanMatch | null {
  const anchor = normalizedFragment
    .replace(/^[^A-Za-z0-9]+/, '')
    .slice(0, FUZZY_ANCHOR_LENGTH)
    .toLowerCase()
  if (!anchor) return null

  const target = collapseWhitespace(normalizedFragment.toLowerCase())
  const windowLength = Math.floor(normalizedFragment.length * FUZZY_WINDOW_RATIO)
  const anchorPattern = new RegExp(escapeRegExp(anchor), 'gi')

  let best: { position: number; similarity: number } | null = null
  let match: RegExpExecArray | null
  while ((match = anchorPattern.exec(body)) !== null) {
    const position = match.index
    const window = collapseWhitespace(body.slice(position, position + windowLength).toLowerCase())
    const similarity = calculateSimilarity(target, window.slice(0, target.length))

    if (!best || similarity > best.similarity) {
      best = { position, similarity }
    }
  }

  if (!best || best.similarity < FUZZY_SIMILARITY_THRESHOLD) {
    return null
  }

  return {
    start: best.position,
    end: Math.min(best.position + normalizedFragment.length, body.length),
    similarity: best.similarity,
  }
}

// ============================================
// CORE FUNCTION
// ============================================

/**
 * Locate one annotation's fragment in the document body.
 *
 * @param body - Original, unnormalized document body
 * @param annotation - Annotation to locate; display-only annotations return null
 * @returns The span from the earliest successful strategy, or null when no
 *   strategy finds the fragment
 *
 * @example
 * ```typescript
 * locateFragment('Prices rose 30 per cent in May.', {
 *   fragment: 'prices rose 30%',
 *   model: 'alpha',
 *   hasFragment: true,
 * })
 * // { start: 0, end: 23, strategy: 'gapped-regex', label: { model: 'alpha', ... } }
 * ```
 */
export function locateFragment(body: string, annotation: NarrativeAnnotation): LocatedSpan | null {
  const fragment = annotation.fragment
  if (!annotation.hasFragment || !fragment || !body) return null

  const normalized = normalizeFragment(fragment)

  const attempts: Array<[LocateStrategy, () => SpanMatch | null]> = [
    ['exact', () => findLiteral(body, fragment)],
    ['normalized', () => findLiteral(body, normalized)],
    ['gapped-regex', () => findGapped(body, normalized)],
    ['fuzzy-anchor', () => findFuzzyAnchor(body, normalized)],
  ]

  for (const [strategy, attempt] of attempts) {
    const found = attempt()
    if (found && found.start < found.end) {
      return toLocatedSpan(found, strategy, annotation)
    }
  }

  return null
}

/**
 * Locate every annotation of a document. Each annotation gets an outcome, so
 * unlocated ones stay visible to the metadata table.
 */
export function locateAnnotations(
  body: string,
  annotations: NarrativeAnnotation[]
): LocationOutcome[] {
  return annotations.map((annotation) => ({
    annotation,
    span: locateFragment(body, annotation),
  }))
}

function toLocatedSpan(
  found: SpanMatch,
  strategy: LocateStrategy,
  annotation: NarrativeAnnotation
): LocatedSpan {
  const span: LocatedSpan = {
    start: found.start,
    end: found.end,
    strategy,
    label: {
      theme: annotation.theme,
      mesoNarrative: annotation.mesoNarrative,
      model: annotation.model,
    },
  }
  if (found.similarity !== undefined) {
    span.similarity = found.similarity
  }
  return span
}

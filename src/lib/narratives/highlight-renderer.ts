/**
 * Highlight rendering for merged narrative segments.
 *
 * Produces an HTML string: plain body text with each merged segment wrapped in
 * a `<span>` whose tooltip lists every contributing label. Offsets are taken
 * as-is; no matching happens here.
 *
 * @module highlight-renderer
 */

import type { MergedSegment, NarrativeLabel } from '@/types/narratives'
import { compareLabels } from './overlap-merger'

// ============================================
// TYPES
// ============================================

export type HighlightClass = 'highlight' | 'highlight-selected'

export interface RenderHighlightsOptions {
  /** Meso-narrative picked in the filters; matching segments use the selected style */
  selectedMeso?: string | null
}

/** Shown in tooltips for a missing theme or meso-narrative. */
export const MISSING_LABEL_TEXT = 'n/a'

export const TOOLTIP_SEPARATOR = ' | '

// ============================================
// HELPERS
// ============================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

/**
 * Escape text for use in HTML content and attribute values.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char)
}

/**
 * Tooltip line for one label: `model — theme — meso`.
 */
export function formatLabel(label: NarrativeLabel): string {
  return [label.model, label.theme ?? MISSING_LABEL_TEXT, label.mesoNarrative ?? MISSING_LABEL_TEXT].join(' — ')
}

/**
 * Tooltip for a segment: its labels sorted by model, theme, meso.
 */
export function buildTooltip(labels: NarrativeLabel[]): string {
  return [...labels].sort(compareLabels).map(formatLabel).join(TOOLTIP_SEPARATOR)
}

/**
 * Style class for a segment. Selected when any label carries the selected meso.
 */
export function segmentClass(segment: MergedSegment, selectedMeso?: string | null): HighlightClass {
  if (selectedMeso && segment.labels.some((label) => label.mesoNarrative === selectedMeso)) {
    return 'highlight-selected'
  }
  return 'highlight'
}

// ============================================
// CORE FUNCTION
// ============================================

/**
 * Render the body with highlight spans around each merged segment.
 *
 * Stripping the tags and decoding the entities of the result gives back the
 * body exactly.
 *
 * @param body - Original document body
 * @param segments - Output of mergeSpans
 * @param options - Optional selected meso-narrative
 * @returns HTML markup for embedding in a page
 *
 * @example
 * ```typescript
 * renderHighlights('Hello world', [
 *   { start: 0, end: 5, labels: [{ model: 'alpha', theme: 'Economy', mesoNarrative: 'Growth' }] },
 * ])
 * // '<span class="highlight" title="alpha — Economy — Growth">Hello</span> world'
 * ```
 */
export function renderHighlights(
  body: string,
  segments: MergedSegment[],
  options: RenderHighlightsOptions = {}
): string {
  const sorted = [...segments].sort((a, b) => a.start - b.start)
  const out: string[] = []
  let last = 0

  for (const segment of sorted) {
    // Segments from mergeSpans never overlap; clamp anything else so text is never duplicated
    const start = Math.min(Math.max(segment.start, last), body.length)
    const end = Math.min(Math.max(segment.end, start), body.length)
    if (start === end) continue

    out.push(escapeHtml(body.slice(last, start)))

    const cls = segmentClass(segment, options.selectedMeso)
    const tooltip = escapeHtml(buildTooltip(segment.labels))
    out.push(`<span class="${cls}" title="${tooltip}">${escapeHtml(body.slice(start, end))}</span>`)

    last = end
  }

  out.push(escapeHtml(body.slice(last)))
  return out.join('')
}

/**
 * CSS for both highlight classes.
 */
export function buildHighlightStyles(): string {
  return [
    '.highlight { background:#fff59d; padding:2px 3px; border-radius:3px; cursor:help; }',
    '.highlight:hover { background:#ffeb3b; }',
    '.highlight-selected { background:#80deea; padding:2px 3px; border-radius:3px; cursor:help; }',
    '.highlight-selected:hover { background:#4dd0e1; }',
  ].join('\n')
}

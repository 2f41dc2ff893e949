/**
 * Sweep-line merge of located spans into labelled display segments.
 *
 * Several models annotate the same document independently, so their spans
 * overlap freely. The merge cuts the body at every span boundary and tags each
 * piece with the set of labels active over it.
 *
 * @module overlap-merger
 */

import type { LocatedSpan, MergedSegment, NarrativeLabel } from '@/types/narratives'

interface SweepEvent {
  position: number
  /** +1 opens a span, -1 closes it */
  delta: 1 | -1
  key: string
  label: NarrativeLabel
}

interface ActiveLabel {
  label: NarrativeLabel
  count: number
}

/**
 * Identity of a label: the full (theme, meso, model) triple.
 */
export function labelKey(label: NarrativeLabel): string {
  return JSON.stringify([label.theme ?? null, label.mesoNarrative ?? null, label.model])
}

function compareText(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Display order for labels: model, then theme, then meso-narrative.
 * Code-unit order, so the result does not depend on the runtime locale.
 */
export function compareLabels(a: NarrativeLabel, b: NarrativeLabel): number {
  return (
    compareText(a.model, b.model) ||
    compareText(a.theme ?? '', b.theme ?? '') ||
    compareText(a.mesoNarrative ?? '', b.mesoNarrative ?? '') ||
    compareText(labelKey(a), labelKey(b))
  )
}

/**
 * Merge located spans into sorted, non-overlapping, maximal segments.
 *
 * Events are ordered by `(position, -delta)`: at a shared coordinate every
 * start is applied before any end, so touching spans `[0,5)` and `[5,10)` are
 * contiguous and never leave a zero-width gap. Pieces with no active label are
 * not emitted, and a piece continuing the previous segment with the same label
 * set extends it.
 *
 * @param spans - Located spans in any order
 * @returns Segments sorted by start; identical for any permutation of `spans`
 *
 * @example
 * ```typescript
 * mergeSpans([
 *   { start: 0, end: 10, label: L1, strategy: 'exact' },
 *   { start: 5, end: 15, label: L2, strategy: 'exact' },
 * ])
 * // [{ start: 0, end: 5, labels: [L1] },
 * //  { start: 5, end: 10, labels: [L1, L2] },
 * //  { start: 10, end: 15, labels: [L2] }]
 * ```
 */
export function mergeSpans(spans: LocatedSpan[]): MergedSegment[] {
  const events: SweepEvent[] = []
  for (const span of spans) {
    if (!(span.start < span.end)) continue

    const label: NarrativeLabel = {
      theme: span.label.theme,
      mesoNarrative: span.label.mesoNarrative,
      model: span.label.model,
    }
    const key = labelKey(label)
    events.push({ position: span.start, delta: 1, key, label })
    events.push({ position: span.end, delta: -1, key, label })
  }

  events.sort((a, b) => a.position - b.position || b.delta - a.delta)

  const active = new Map<string, ActiveLabel>()
  const segments: MergedSegment[] = []
  const signatures: string[] = []
  let last: number | null = null

  for (const event of events) {
    if (last !== null && event.position > last && active.size > 0) {
      const labels = Array.from(active.values(), (entry) => ({ ...entry.label })).sort(compareLabels)
      const signature = labels.map(labelKey).join('\n')
      const previous = segments[segments.length - 1]

      if (previous && previous.end === last && signatures[signatures.length - 1] === signature) {
        previous.end = event.position
      } else {
        segments.push({ start: last, end: event.position, labels })
        signatures.push(signature)
      }
    }

    const entry = active.get(event.key)
    if (event.delta === 1) {
      active.set(event.key, { label: entry?.label ?? event.label, count: (entry?.count ?? 0) + 1 })
    } else if (entry) {
      entry.count -= 1
      if (entry.count <= 0) {
        active.delete(event.key)
      }
    }

    last = event.position
  }

  return segments
}

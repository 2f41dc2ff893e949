/**
 * Character canonicalization for LLM-quoted fragments.
 *
 * Quoted fragments drift from the source in predictable ways: typographic
 * quotes and dashes, reflowed whitespace, elisions marked with an ellipsis and
 * percentages rewritten as words. These helpers undo that drift on the
 * fragment side. Case is left alone; comparison sites decide on case.
 *
 * @module text-normalization
 */

/** Elision marker every ellipsis variant collapses to. */
export const ELLIPSIS_MARKER = '...'

/** Stand-in for `<number> %|percent|per cent`, expanded again by the gapped-regex search. */
export const PERCENT_PLACEHOLDER = '<<NUMPCT>>'

const SINGLE_QUOTES = /[‘’]/g
const DOUBLE_QUOTES = /[“”]/g
const DASHES = /[–—]/g
const ELLIPSIS_RUN = /(?:…|\.{3,})/g
const TRAILING_ELLIPSIS = /\.{3}$/
// The word forms need a trailing boundary ("30 percentage" is not a percentage),
// `%` does not ("a 30% rise")
const PERCENT_EXPRESSION = /\b\d+\s*(?:%|percent\b|per\s*cent\b)/gi

/**
 * Collapse every whitespace run (newlines included) to a single space.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ')
}

/**
 * Canonicalize quotes, dashes and whitespace.
 *
 * @example
 * normalizeText('  “Hello” —\n world ') // '"Hello" - world'
 */
export function normalizeText(text: string): string {
  return collapseWhitespace(
    text
      .replace(SINGLE_QUOTES, "'")
      .replace(DOUBLE_QUOTES, '"')
      .replace(DASHES, '-')
  ).trim()
}

/**
 * Normalize a claimed fragment for searching.
 *
 * On top of {@link normalizeText}:
 * - `…` and runs of 3+ dots become `...`
 * - a dangling trailing `...` is dropped
 * - percentages become {@link PERCENT_PLACEHOLDER}
 *
 * @example
 * normalizeFragment('prices rose 30 per cent…') // 'prices rose <<NUMPCT>>'
 */
export function normalizeFragment(fragment: string): string {
  const unified = normalizeText(fragment).replace(ELLIPSIS_RUN, ELLIPSIS_MARKER)
  const trimmed = unified.replace(TRAILING_ELLIPSIS, '').trim()
  return trimmed.replace(PERCENT_EXPRESSION, PERCENT_PLACEHOLDER)
}

/**
 * Escape a string for literal use inside a RegExp.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

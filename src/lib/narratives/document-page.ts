/**
 * Standalone HTML page for one highlighted document: header, highlighted body
 * and the narratives metadata table.
 */

import type { HighlightResult, NarrativeDocument, NarrativeMetadataRow } from '@/types/narratives'
import { buildHighlightStyles, escapeHtml } from './highlight-renderer'

const METADATA_COLUMNS: Array<[string, (row: NarrativeMetadataRow) => string]> = [
  ['#', (row) => String(row.index)],
  ['selected_meso_filter', (row) => String(row.selectedMesoMatch)],
  ['model', (row) => row.model],
  ['narrative theme', (row) => row.theme ?? ''],
  ['meso narrative', (row) => row.mesoNarrative ?? ''],
  ['text fragment', (row) => row.textFragment],
  ['fragment_present', (row) => String(row.fragmentPresent)],
  ['located', (row) => (row.strategy ? `${row.located} (${row.strategy})` : String(row.located))],
]

/**
 * Metadata table markup, one row per annotation.
 */
export function renderMetadataTable(rows: NarrativeMetadataRow[]): string {
  const header = METADATA_COLUMNS.map(([name]) => `<th>${escapeHtml(name)}</th>`).join('')
  const body = rows
    .map((row) => `<tr>${METADATA_COLUMNS.map(([, cell]) => `<td>${escapeHtml(cell(row))}</td>`).join('')}</tr>`)
    .join('\n')

  return `<table class="narratives-metadata">\n<thead><tr>${header}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`
}

/**
 * Full HTML page for a document and its highlight result.
 */
export function renderDocumentPage(document: NarrativeDocument, result: HighlightResult): string {
  const title = escapeHtml(document.title || '(untitled)')
  const link = document.url
    ? `<p><a href="${escapeHtml(document.url)}">Open Source Link</a></p>`
    : ''
  const caption = `Source: ${escapeHtml(document.source_table ?? '')} | Date: ${escapeHtml(document.pub_date ?? '')}`

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    `<style>\n${buildHighlightStyles()}\n.document-body { white-space: pre-wrap; }\n</style>`,
    '</head>',
    '<body>',
    `<h1>${title}</h1>`,
    link,
    `<p class="caption">${caption}</p>`,
    `<div class="document-body">${result.html}</div>`,
    '<details>',
    '<summary>Narratives Metadata</summary>',
    renderMetadataTable(result.metadata),
    '</details>',
    '</body>',
    '</html>',
  ]
    .filter((line) => line.length > 0)
    .join('\n')
}

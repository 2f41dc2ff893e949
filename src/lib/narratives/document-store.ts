/**
 * Loading of the exported meso samples table.
 *
 * The dashboard's columnar export is produced elsewhere; this reads its JSON
 * form (an array of rows) and applies the same cleanup the browser expects:
 * null text cells become '' and sample label columns are strings.
 */

import { readFile } from 'fs/promises'
import type { NarrativeDocument } from '@/types/narratives'
import { resolveSampleColumns } from './document-filters'
import { NarrativeStoreError } from './errors'
import { NarrativeDocumentSchema } from './schemas'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Parse the JSON samples export.
 *
 * @param raw - File contents
 * @param path - Source path, for error messages
 * @throws NarrativeStoreError (SAMPLES_INVALID) for invalid JSON or a non-array
 */
export function parseNarrativeSamples(raw: string, path = '<inline>'): NarrativeDocument[] {
  let decoded: unknown
  try {
    decoded = JSON.parse(raw)
  } catch (error) {
    throw new NarrativeStoreError('SAMPLES_INVALID', path, 'samples file is not valid JSON', { cause: error })
  }

  if (!Array.isArray(decoded)) {
    throw new NarrativeStoreError('SAMPLES_INVALID', path, 'expected a JSON array of rows')
  }

  const documents: NarrativeDocument[] = []
  let skipped = 0
  for (const row of decoded) {
    const parsed = NarrativeDocumentSchema.safeParse(row)
    if (parsed.success) {
      documents.push({ ...parsed.data })
    } else {
      skipped++
    }
  }

  if (skipped > 0) {
    console.warn(`[narrative-store] Skipped ${skipped} malformed rows in ${path}`)
  }

  const { themeColumn, mesoColumn } = resolveSampleColumns(documents)
  for (const document of documents) {
    for (const column of [themeColumn, mesoColumn]) {
      if (column) {
        const value = document[column]
        document[column] = value == null ? '' : String(value)
      }
    }
  }

  return documents
}

/**
 * Load the samples export from disk. A missing file is an empty store.
 *
 * @throws NarrativeStoreError when the file exists but cannot be read or parsed
 */
export async function loadNarrativeSamples(path: string): Promise<NarrativeDocument[]> {
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      console.warn(`[narrative-store] No samples found at ${path}`)
      return []
    }
    throw new NarrativeStoreError('SAMPLES_UNREADABLE', path, `could not read ${path}`, { cause: error })
  }

  const documents = parseNarrativeSamples(raw, path)
  console.log(`[narrative-store] Loaded ${documents.length} documents from ${path}`)
  return documents
}

#!/usr/bin/env tsx
/**
 * Render one document of the meso samples export with its narrative highlights.
 *
 * Usage: npx tsx scripts/render-narratives.ts [--source <table>] [--theme <theme>]
 *          [--meso <meso narrative>] [--record <title>] [--out <file.html>] [--verbose]
 *
 * Filters narrow the documents the same way the browser sidebar does; the first
 * remaining document (or the one titled --record) is rendered to --out
 * (default: narratives.html) and its metadata table printed.
 */

import { config } from 'dotenv'
import { writeFile } from 'fs/promises'
import { resolve } from 'path'
import {
  HighlightCache,
  NarrativeError,
  filterDocuments,
  findRecord,
  getUserFriendlyError,
  highlightDocument,
  listFilterOptions,
  loadNarrativeConfig,
  loadNarrativeSamples,
  renderDocumentPage,
} from '../src/lib/narratives'

config({ path: resolve(process.cwd(), '.env.local') })

interface CliArgs {
  source?: string
  theme?: string
  meso?: string
  record?: string
  out: string
  verbose: boolean
}

const USAGE =
  'Usage: npx tsx scripts/render-narratives.ts [--source <table>] [--theme <theme>] [--meso <meso>] [--record <title>] [--out <file>] [--verbose]'

function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { out: 'narratives.html', verbose: false }

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i]
    if (flag === '--verbose') {
      args.verbose = true
      continue
    }

    const value = argv[i + 1]
    if (value === undefined) {
      console.error(`❌ Missing value for ${flag}`)
      console.error(USAGE)
      process.exit(1)
    }

    switch (flag) {
      case '--source':
        args.source = value
        break
      case '--theme':
        args.theme = value
        break
      case '--meso':
        args.meso = value
        break
      case '--record':
        args.record = value
        break
      case '--out':
        args.out = value
        break
      default:
        console.error(`❌ Unknown argument: ${flag}`)
        console.error(USAGE)
        process.exit(1)
    }
    i++
  }

  return args
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2))
  const settings = loadNarrativeConfig()
  const payload = { variant: settings.schemaVariant, annotationField: settings.annotationField }

  console.log(`📄 Samples: ${settings.samplesPath} (${settings.schemaVariant} annotations)`)
  const documents = await loadNarrativeSamples(settings.samplesPath)
  if (documents.length === 0) {
    console.error(`❌ No data found: ${settings.samplesPath}`)
    process.exit(1)
  }

  const options = listFilterOptions(documents, payload)
  console.log(
    `   ${options.sourceTables.length} source tables, ${options.themes.length} themes, ` +
    `${options.mesoNarratives.length} meso narratives`
  )

  const filtered = filterDocuments(
    documents,
    { sourceTable: args.source, theme: args.theme, mesoNarrative: args.meso },
    payload
  )
  if (filtered.length === 0) {
    console.warn('⚠️  No rows match filters.')
    process.exit(1)
  }

  const record = findRecord(filtered, args.record)
  if (!record) {
    throw new NarrativeError('RECORD_NOT_FOUND', `no record titled "${args.record}" among ${filtered.length} matches`)
  }

  const cache = new HighlightCache()
  const cacheKey = {
    documentId: record.url || record.title,
    schemaRevision: settings.schemaRevision,
    variant: settings.schemaVariant,
    annotationField: settings.annotationField,
    defaultModel: settings.defaultModel,
    selectedMeso: args.meso,
  }
  const result = cache.getOrCompute(cacheKey, () =>
    highlightDocument(record, {
      ...payload,
      defaultModel: settings.defaultModel,
      selectedMeso: args.meso,
      verbose: args.verbose,
    })
  )

  await writeFile(args.out, renderDocumentPage(record, result), 'utf-8')
  console.log(`✅ Wrote ${args.out}: ${result.segments.length} highlighted segments, ${result.stats.unlocated} unlocated fragments\n`)

  console.table(
    result.metadata.map((row) => ({
      model: row.model,
      theme: row.theme ?? '',
      meso: row.mesoNarrative ?? '',
      fragment: row.textFragment.substring(0, 60),
      located: row.strategy ?? (row.fragmentPresent ? 'not found' : '-'),
      selected: row.selectedMesoMatch,
    }))
  )
}

main().catch((error: unknown) => {
  console.error(`❌ ${getUserFriendlyError(error)}`)
  process.exit(1)
})

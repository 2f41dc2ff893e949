/**
 * Tests for the sidebar filters over exported documents.
 */

import type { NarrativeDocument } from '@/types/narratives'
import {
  filterDocuments,
  findRecord,
  gatherMesoNarratives,
  listFilterOptions,
  resolveSampleColumns,
} from '../document-filters'

const RENTS: NarrativeDocument = {
  title: 'Rents',
  body: 'Rents rose.',
  source_table: 'news',
  theme: 'Housing',
  annotation_parsed_alpha: JSON.stringify([
    { 'meso narrative': ' Affordability ' },
    { 'meso narrative': '' },
  ]),
  annotation_parsed_beta: JSON.stringify([{ 'text fragment': 'Rents rose', 'meso narrative': 'Speculation' }]),
}

const BUDGET: NarrativeDocument = {
  title: 'Budget',
  body: 'The budget passed.',
  source_table: 'blogs',
  theme: 'Economy',
  annotation_parsed_alpha: 'not json',
}

const WAGES: NarrativeDocument = {
  title: 'Wages',
  body: 'Wages grew.',
  source_table: 'news',
  theme: 'Economy',
  annotation_parsed_alpha: [{ 'meso narrative': 'Growth' }],
}

const ROWS = [RENTS, BUDGET, WAGES]

describe('resolveSampleColumns', () => {
  it('prefers theme and meso', () => {
    expect(resolveSampleColumns([{ theme: 'a', dominant_theme: 'b', meso: 'c', meso_narrative: 'd' }])).toEqual({
      themeColumn: 'theme',
      mesoColumn: 'meso',
    })
  })

  it('falls back to dominant_theme and meso_narrative', () => {
    expect(resolveSampleColumns([{ dominant_theme: 'b', meso_narrative: 'd' }])).toEqual({
      themeColumn: 'dominant_theme',
      mesoColumn: 'meso_narrative',
    })
  })

  it('leaves missing columns unset', () => {
    const columns = resolveSampleColumns([])

    expect(columns.themeColumn).toBeUndefined()
    expect(columns.mesoColumn).toBeUndefined()
  })
})

describe('gatherMesoNarratives', () => {
  it('collects trimmed meso-narratives across models', () => {
    expect(Array.from(gatherMesoNarratives(RENTS)).sort()).toEqual(['Affordability', 'Speculation'])
  })

  it('skips broken fields', () => {
    expect(gatherMesoNarratives(BUDGET).size).toBe(0)
  })

  it('reads the consolidated field under the consolidated variant', () => {
    const row = { annotations: [{ 'meso narrative': 'Inflation' }], annotation_parsed_alpha: RENTS.annotation_parsed_alpha }

    expect(Array.from(gatherMesoNarratives(row, { variant: 'consolidated' }))).toEqual(['Inflation'])
  })
})

describe('filterDocuments', () => {
  it('returns every row without filters', () => {
    expect(filterDocuments(ROWS, {})).toEqual(ROWS)
    expect(filterDocuments(ROWS, { sourceTable: null, theme: '', mesoNarrative: undefined })).toEqual(ROWS)
  })

  it('filters by source table', () => {
    expect(filterDocuments(ROWS, { sourceTable: 'news' })).toEqual([RENTS, WAGES])
  })

  it('filters by sample theme', () => {
    expect(filterDocuments(ROWS, { theme: 'Economy' })).toEqual([BUDGET, WAGES])
  })

  it('filters by a meso-narrative claimed by any model', () => {
    expect(filterDocuments(ROWS, { mesoNarrative: 'Growth' })).toEqual([WAGES])
    expect(filterDocuments(ROWS, { mesoNarrative: 'Speculation' })).toEqual([RENTS])
  })

  it('combines filters', () => {
    expect(filterDocuments(ROWS, { sourceTable: 'news', theme: 'Economy' })).toEqual([WAGES])
    expect(filterDocuments(ROWS, { sourceTable: 'blogs', mesoNarrative: 'Growth' })).toEqual([])
  })
})

describe('listFilterOptions', () => {
  it('lists sorted distinct values', () => {
    expect(listFilterOptions(ROWS)).toEqual({
      sourceTables: ['blogs', 'news'],
      themes: ['Economy', 'Housing'],
      mesoNarratives: ['Affordability', 'Growth', 'Speculation'],
    })
  })
})

describe('findRecord', () => {
  it('returns the first row without a title', () => {
    expect(findRecord(ROWS)).toBe(RENTS)
  })

  it('finds a row by title', () => {
    expect(findRecord(ROWS, 'Wages')).toBe(WAGES)
    expect(findRecord(ROWS, 'Missing')).toBeUndefined()
  })
})

/**
 * Tests for environment configuration.
 */

import { join } from 'path'
import { loadNarrativeConfig } from '../config'
import { NarrativeConfigError } from '../errors'

describe('loadNarrativeConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadNarrativeConfig({})).toEqual({
      samplesPath: join('./data', 'meso_samples.json'),
      exportDir: './data',
      schemaVariant: 'per-model',
      annotationField: 'annotations',
      defaultModel: 'consolidated',
      schemaRevision: 1,
    })
  })

  it('derives the samples path from the export directory', () => {
    expect(loadNarrativeConfig({ EXPORT_DIR: '/exports' }).samplesPath).toBe(join('/exports', 'meso_samples.json'))
  })

  it('prefers an explicit samples path', () => {
    const config = loadNarrativeConfig({ EXPORT_DIR: '/exports', MESO_SAMPLES_PATH: '/tmp/samples.json' })

    expect(config.samplesPath).toBe('/tmp/samples.json')
  })

  it('treats blank values as unset', () => {
    const config = loadNarrativeConfig({ MESO_SAMPLES_PATH: '  ', NARRATIVE_SCHEMA_VARIANT: '' })

    expect(config.samplesPath).toBe(join('./data', 'meso_samples.json'))
    expect(config.schemaVariant).toBe('per-model')
  })

  it('reads the consolidated settings', () => {
    const config = loadNarrativeConfig({
      NARRATIVE_SCHEMA_VARIANT: 'consolidated',
      NARRATIVE_ANNOTATION_FIELD: 'narratives',
      NARRATIVE_DEFAULT_MODEL: 'merged',
      NARRATIVE_SCHEMA_REVISION: '3',
    })

    expect(config).toMatchObject({
      schemaVariant: 'consolidated',
      annotationField: 'narratives',
      defaultModel: 'merged',
      schemaRevision: 3,
    })
  })

  it('names the variable of an unknown schema variant', () => {
    expect(() => loadNarrativeConfig({ NARRATIVE_SCHEMA_VARIANT: 'nested' })).toThrow(NarrativeConfigError)

    try {
      loadNarrativeConfig({ NARRATIVE_SCHEMA_VARIANT: 'nested' })
    } catch (error) {
      expect(error).toBeInstanceOf(NarrativeConfigError)
      expect(error).toMatchObject({ code: 'CONFIG_INVALID', variable: 'NARRATIVE_SCHEMA_VARIANT' })
    }
  })

  it('rejects a revision that is not a positive integer', () => {
    expect(() => loadNarrativeConfig({ NARRATIVE_SCHEMA_REVISION: 'abc' })).toThrow(/^CONFIG_INVALID: NARRATIVE_SCHEMA_REVISION /)
    expect(() => loadNarrativeConfig({ NARRATIVE_SCHEMA_REVISION: '0' })).toThrow(/^CONFIG_INVALID: NARRATIVE_SCHEMA_REVISION /)
  })
})

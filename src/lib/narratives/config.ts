/**
 * Centralized configuration for the narratives highlighter.
 *
 * Read from the environment (entry points load `.env.local` through dotenv
 * first) and validated with zod. Override any value per run:
 *   NARRATIVE_SCHEMA_VARIANT=consolidated npm run render -- --record 0
 */

import { join } from 'path'
import { z } from 'zod'
import type { AnnotationSchemaVariant } from '@/types/narratives'
import { DEFAULT_ANNOTATION_FIELD, DEFAULT_CONSOLIDATED_MODEL } from './fragment-extraction'
import { NarrativeConfigError } from './errors'

export const DEFAULT_EXPORT_DIR = './data'
export const SAMPLES_FILENAME = 'meso_samples.json'

const EnvironmentSchema = z.object({
  MESO_SAMPLES_PATH: z.string().optional(),
  EXPORT_DIR: z.string().default(DEFAULT_EXPORT_DIR),
  NARRATIVE_SCHEMA_VARIANT: z.enum(['per-model', 'consolidated']).default('per-model'),
  NARRATIVE_ANNOTATION_FIELD: z.string().default(DEFAULT_ANNOTATION_FIELD),
  NARRATIVE_DEFAULT_MODEL: z.string().default(DEFAULT_CONSOLIDATED_MODEL),
  NARRATIVE_SCHEMA_REVISION: z.coerce.number().int().positive().default(1),
})

export interface NarrativeConfig {
  /** JSON export of the meso samples table */
  samplesPath: string
  exportDir: string
  schemaVariant: AnnotationSchemaVariant
  /** Consolidated payload field (variant B only) */
  annotationField: string
  /** Model name for consolidated entries without one */
  defaultModel: string
  /** Bumped when the annotation payload layout changes; part of cache keys */
  schemaRevision: number
}

/**
 * Load and validate configuration.
 *
 * Blank variables count as unset.
 *
 * @throws NarrativeConfigError naming the first invalid variable
 */
export function loadNarrativeConfig(env: NodeJS.ProcessEnv = process.env): NarrativeConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )

  const parsed = EnvironmentSchema.safeParse(present)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new NarrativeConfigError(String(issue?.path[0] ?? 'environment'), issue?.message ?? 'is invalid')
  }

  const values = parsed.data
  return {
    samplesPath: values.MESO_SAMPLES_PATH ?? join(values.EXPORT_DIR, SAMPLES_FILENAME),
    exportDir: values.EXPORT_DIR,
    schemaVariant: values.NARRATIVE_SCHEMA_VARIANT,
    annotationField: values.NARRATIVE_ANNOTATION_FIELD,
    defaultModel: values.NARRATIVE_DEFAULT_MODEL,
    schemaRevision: values.NARRATIVE_SCHEMA_REVISION,
  }
}

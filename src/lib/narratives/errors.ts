/**
 * Errors raised around the highlight engine: loading exported samples and
 * reading configuration. The engine itself never throws; malformed payloads
 * and unlocatable fragments are ordinary outcomes there.
 */

export type NarrativeErrorCode =
  | 'SAMPLES_UNREADABLE'
  | 'SAMPLES_INVALID'
  | 'CONFIG_INVALID'
  | 'RECORD_NOT_FOUND'

export class NarrativeError extends Error {
  readonly code: NarrativeErrorCode

  constructor(code: NarrativeErrorCode, message: string, options?: { cause?: unknown }) {
    super(`${code}: ${message}`, options)
    this.name = 'NarrativeError'
    this.code = code
  }
}

export class NarrativeStoreError extends NarrativeError {
  readonly path: string

  constructor(
    code: 'SAMPLES_UNREADABLE' | 'SAMPLES_INVALID',
    path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, options)
    this.name = 'NarrativeStoreError'
    this.path = path
  }
}

export class NarrativeConfigError extends NarrativeError {
  readonly variable: string

  constructor(variable: string, message: string) {
    super('CONFIG_INVALID', `${variable} ${message}`)
    this.name = 'NarrativeConfigError'
    this.variable = variable
  }
}

/**
 * Gets a user-friendly message with recovery guidance for an error.
 *
 * @example
 * const error = new NarrativeStoreError('SAMPLES_INVALID', 'data/x.json', 'expected a JSON array')
 * getUserFriendlyError(error)
 * // 'SAMPLES_INVALID: expected a JSON array. Re-export the samples table as a JSON array of rows.'
 */
export function getUserFriendlyError(error: unknown): string {
  if (!(error instanceof Error)) {
    return `Unexpected error: ${String(error)}`
  }

  if (!(error instanceof NarrativeError)) {
    return `Processing error: ${error.message}`
  }

  switch (error.code) {
    case 'SAMPLES_UNREADABLE':
      return `${error.message}. Check that MESO_SAMPLES_PATH points to a readable file.`
    case 'SAMPLES_INVALID':
      return `${error.message}. Re-export the samples table as a JSON array of rows.`
    case 'CONFIG_INVALID':
      return `${error.message}. Fix the value in .env.local or the environment.`
    case 'RECORD_NOT_FOUND':
      return `${error.message}. Loosen the filters or pick another record.`
    default:
      return error.message
  }
}

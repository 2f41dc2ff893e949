/**
 * Tests for error types and user-facing messages.
 */

import {
  NarrativeConfigError,
  NarrativeError,
  NarrativeStoreError,
  getUserFriendlyError,
} from '../errors'

describe('NarrativeError', () => {
  it('prefixes the message with its code', () => {
    const error = new NarrativeError('RECORD_NOT_FOUND', 'no record titled "x"')

    expect(error.message).toBe('RECORD_NOT_FOUND: no record titled "x"')
    expect(error.code).toBe('RECORD_NOT_FOUND')
    expect(error).toBeInstanceOf(Error)
  })

  it('keeps the cause and path of store errors', () => {
    const cause = new Error('EACCES')
    const error = new NarrativeStoreError('SAMPLES_UNREADABLE', 'data/x.json', 'could not read data/x.json', { cause })

    expect(error.cause).toBe(cause)
    expect(error.path).toBe('data/x.json')
    expect(error.name).toBe('NarrativeStoreError')
    expect(error).toBeInstanceOf(NarrativeError)
  })

  it('names the variable in config errors', () => {
    const error = new NarrativeConfigError('EXPORT_DIR', 'is required')

    expect(error.message).toBe('CONFIG_INVALID: EXPORT_DIR is required')
    expect(error.variable).toBe('EXPORT_DIR')
  })
})

describe('getUserFriendlyError', () => {
  it('adds recovery guidance per code', () => {
    expect(getUserFriendlyError(new NarrativeStoreError('SAMPLES_INVALID', 'x.json', 'expected a JSON array of rows'))).toBe(
      'SAMPLES_INVALID: expected a JSON array of rows. Re-export the samples table as a JSON array of rows.'
    )
    expect(getUserFriendlyError(new NarrativeStoreError('SAMPLES_UNREADABLE', 'x.json', 'could not read x.json'))).toBe(
      'SAMPLES_UNREADABLE: could not read x.json. Check that MESO_SAMPLES_PATH points to a readable file.'
    )
    expect(getUserFriendlyError(new NarrativeConfigError('EXPORT_DIR', 'is required'))).toBe(
      'CONFIG_INVALID: EXPORT_DIR is required. Fix the value in .env.local or the environment.'
    )
    expect(getUserFriendlyError(new NarrativeError('RECORD_NOT_FOUND', 'no match'))).toBe(
      'RECORD_NOT_FOUND: no match. Loosen the filters or pick another record.'
    )
  })

  it('wraps other errors', () => {
    expect(getUserFriendlyError(new Error('boom'))).toBe('Processing error: boom')
    expect(getUserFriendlyError('boom')).toBe('Unexpected error: boom')
  })
})

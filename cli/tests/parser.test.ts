/**
 * Client Output Parser Tests
 */

import { describe, it, expect } from 'vitest'
import { parseClientOutput } from '../bench/parser'
import { ErrorCode, MalformedOutputError } from '../utils/errors'
import { clientOutput } from './helpers'

function parseError(output: string): MalformedOutputError {
  try {
    parseClientOutput(output)
  } catch (error) {
    if (error instanceof MalformedOutputError) return error
    throw error
  }
  throw new Error('expected parseClientOutput to throw')
}

describe('parseClientOutput', () => {
  it('extracts request count and elapsed time from client output', () => {
    const output = 'Opening db...\nFinished 1000 requests\nTime elapsed: 52341.125 us\n'
    expect(parseClientOutput(output)).toEqual({ requests: 1000, elapsedUs: 52341.125 })
  })

  it('accepts the summary on a single line', () => {
    expect(parseClientOutput('Finished 100 requests, Time elapsed: 50000.0 us')).toEqual({
      requests: 100,
      elapsedUs: 50000,
    })
  })

  it.each([
    [0, 1],
    [100, 50000],
    [123456, 0.5],
    [7, 1e-7],
  ])('reads back %i requests in %f us', (requests, elapsedUs) => {
    expect(parseClientOutput(clientOutput(requests, String(elapsedUs)))).toEqual({ requests, elapsedUs })
  })

  it('looks for the time suffix after its marker', () => {
    const output = 'warmup took 3 us\nFinished 5 requests\nTime elapsed: 10.5 us\n'
    expect(parseClientOutput(output)).toEqual({ requests: 5, elapsedUs: 10.5 })
  })

  describe('malformed output', () => {
    it('rejects output without the request marker', () => {
      const error = parseError('Time elapsed: 10.0 us\n')
      expect(error.code).toBe(ErrorCode.MARKER_NOT_FOUND)
      expect(error.message).toBe('Marker not found in client output: "Finished "')
    })

    it('rejects output without the elapsed marker', () => {
      const error = parseError('Finished 10 requests\n')
      expect(error.code).toBe(ErrorCode.MARKER_NOT_FOUND)
      expect(error.message).toBe('Marker not found in client output: "Time elapsed: "')
    })

    it('rejects a marker without its suffix', () => {
      const error = parseError('Finished 10 requests\nTime elapsed: 10.0 ms\n')
      expect(error.message).toBe('Marker not found in client output: " us"')
    })

    it('rejects a fractional request count', () => {
      const error = parseError(clientOutput(1, '10').replace('Finished 1', 'Finished 12.5'))
      expect(error.code).toBe(ErrorCode.INVALID_NUMBER)
      expect(error.details).toEqual({ field: 'request count', received: '12.5' })
    })

    it('rejects a request count beyond the exact integer range', () => {
      const error = parseError(clientOutput(1, '10').replace('Finished 1', 'Finished 9007199254740993'))
      expect(error.code).toBe(ErrorCode.INVALID_NUMBER)
      expect(error.details).toEqual({ field: 'request count', received: '9007199254740993' })
    })

    it('accepts the largest exact request count', () => {
      const output = clientOutput(1, '10').replace('Finished 1', 'Finished 9007199254740991')
      expect(parseClientOutput(output).requests).toBe(Number.MAX_SAFE_INTEGER)
    })

    it('rejects an empty request count', () => {
      const error = parseError('Finished  requests\nTime elapsed: 10 us')
      expect(error.code).toBe(ErrorCode.INVALID_NUMBER)
    })

    it('rejects a non-numeric elapsed time', () => {
      const error = parseError('Finished 10 requests\nTime elapsed: fast us')
      expect(error.code).toBe(ErrorCode.INVALID_NUMBER)
      expect(error.details).toEqual({ field: 'elapsed time', received: 'fast' })
    })

    it('rejects a zero elapsed time', () => {
      const error = parseError(clientOutput(10, '0'))
      expect(error.code).toBe(ErrorCode.INVALID_NUMBER)
    })

    it('keeps the offending output for diagnosis', () => {
      const output = 'segfault in compaction\n'
      expect(parseError(output).output).toBe(output)
    })
  })
})

/**
 * Backend Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { buildEnvironment, createBackends } from '../bench/backends'
import { PRELOAD_ENV_VAR } from '../bench/params'

describe('createBackends', () => {
  const backends = createBackends({ library: '/opt/lib/libstore.so', baselineName: 'ext4', preloadName: 'store' })

  it('returns baseline then preload', () => {
    expect(backends.map((backend) => backend.name)).toEqual(['ext4', 'store'])
  })

  it('removes the preload variable for the baseline', () => {
    expect(Object.keys(backends[0].env)).toEqual([PRELOAD_ENV_VAR])
    expect(backends[0].env[PRELOAD_ENV_VAR]).toBeUndefined()
  })

  it('points the preload variable at the library for the preload pass', () => {
    expect(backends[1].env).toEqual({ LD_PRELOAD: '/opt/lib/libstore.so' })
  })

  it('freezes the configurations', () => {
    expect(Object.isFrozen(backends)).toBe(true)
    expect(Object.isFrozen(backends[0])).toBe(true)
    expect(Object.isFrozen(backends[1].env)).toBe(true)
  })
})

describe('buildEnvironment', () => {
  it('keeps inherited variables and drops the ones set to undefined', () => {
    const env = buildEnvironment({ PATH: '/usr/bin', LD_PRELOAD: '/old.so' }, { LD_PRELOAD: undefined })
    expect(env).toEqual({ PATH: '/usr/bin' })
    expect('LD_PRELOAD' in env).toBe(false)
  })

  it('sets overridden variables', () => {
    const env = buildEnvironment({ PATH: '/usr/bin' }, { LD_PRELOAD: '/lib.so' })
    expect(env).toEqual({ PATH: '/usr/bin', LD_PRELOAD: '/lib.so' })
  })

  it('does not modify the base environment', () => {
    const base = { PATH: '/usr/bin', LD_PRELOAD: '/old.so' }
    buildEnvironment(base, { LD_PRELOAD: '/new.so' })
    expect(base).toEqual({ PATH: '/usr/bin', LD_PRELOAD: '/old.so' })
  })
})

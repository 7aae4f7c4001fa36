/**
 * Trial Descriptor Builder Tests
 */

import { describe, it, expect } from 'vitest'
import { buildTrial, tracePath } from '../bench/trial'

describe('tracePath', () => {
  it('joins the trace directory with <workload>-<phase>.txt', () => {
    expect(tracePath('ycsb-traces', 'a', 'load')).toBe('ycsb-traces/a-load.txt')
    expect(tracePath('/data/traces/', 'f', 'run')).toBe('/data/traces/f-run.txt')
  })
})

describe('buildTrial', () => {
  const env = { PATH: '/usr/bin' }

  it('builds the load phase invocation', () => {
    const trial = buildTrial({
      client: './ycsbcli',
      traceDir: 'ycsb-traces',
      dbDir: '/mnt/pmem/db',
      workload: 'a',
      valueSize: 100,
      phase: 'load',
      env,
    })

    expect(trial.command).toBe('./ycsbcli')
    expect(trial.args).toEqual(['-f', 'ycsb-traces/a-load.txt', '-v', '100', '-d', '/mnt/pmem/db'])
    expect(trial.phase).toBe('load')
  })

  it('builds the run phase invocation', () => {
    const trial = buildTrial({
      client: '/opt/bench/ycsbcli',
      traceDir: 'ycsb-traces',
      dbDir: '/tmp/db',
      workload: 'e',
      valueSize: 100000,
      phase: 'run',
      env,
    })

    expect(trial.args).toEqual(['-f', 'ycsb-traces/e-run.txt', '-v', '100000', '-d', '/tmp/db'])
    expect(trial.workload).toBe('e')
    expect(trial.valueSize).toBe(100000)
  })

  it('passes the environment through unchanged', () => {
    const trial = buildTrial({
      client: './ycsbcli',
      traceDir: 't',
      dbDir: 'd',
      workload: 'b',
      valueSize: 10,
      phase: 'run',
      env,
    })
    expect(trial.env).toBe(env)
  })
})

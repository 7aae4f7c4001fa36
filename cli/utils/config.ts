/**
 * Config Utility
 *
 * Merges command-line options over the built-in parameter space and
 * validates the result before a run starts.
 */

import { z } from 'zod'
import {
  DEFAULT_CLIENT_PATH,
  DEFAULT_TRACE_DIR,
  NUM_ITERS,
  VALUE_SIZES,
  WORKLOADS,
} from '../bench/params'
import { ValidationError } from './errors'

export const OUTPUT_FORMATS = ['table', 'json'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

export const BenchConfigSchema = z
  .object({
    dbDir: z.string().min(1),
    library: z.string().min(1),
    client: z.string().min(1).default(DEFAULT_CLIENT_PATH),
    traceDir: z.string().min(1).default(DEFAULT_TRACE_DIR),
    workloads: z.array(z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be a plain workload name')).min(1).default([...WORKLOADS]),
    valueSizes: z.array(z.number().int().positive()).min(1).default([...VALUE_SIZES]),
    iterations: z.number().int().positive().default(NUM_ITERS),
    dropCaches: z.boolean().default(true),
    baselineName: z.string().min(1).default('baseline'),
    preloadName: z.string().min(1).default('preload'),
    format: z.enum(OUTPUT_FORMATS).default('table'),
  })
  .strict()
  .refine((data) => data.baselineName !== data.preloadName, {
    message: 'backend labels must differ',
    path: ['preloadName'],
  })
  .refine((data) => new Set(data.workloads).size === data.workloads.length, {
    message: 'workloads must not repeat',
    path: ['workloads'],
  })
  .refine((data) => new Set(data.valueSizes).size === data.valueSizes.length, {
    message: 'value sizes must not repeat',
    path: ['valueSizes'],
  })

export type BenchConfigInput = z.input<typeof BenchConfigSchema>

export type BenchConfig = z.output<typeof BenchConfigSchema>

/**
 * Validate raw options into a frozen BenchConfig.
 *
 * @throws ValidationError listing every failing field
 */
export function resolveConfig(input: unknown): BenchConfig {
  const result = BenchConfigSchema.safeParse(input)

  if (!result.success) {
    throw ValidationError.invalidConfig(
      result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    )
  }

  return Object.freeze(result.data)
}

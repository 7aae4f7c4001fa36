/**
 * Backend Configurations
 *
 * The two storage setups under comparison. Both share the inherited
 * environment; they differ only in whether the storage library is preloaded.
 */

import { PRELOAD_ENV_VAR } from './params'

export interface BackendConfig {
  readonly name: string
  /** Overrides on top of the inherited environment; `undefined` removes the variable */
  readonly env: Readonly<Record<string, string | undefined>>
}

export interface BackendOptions {
  library: string
  baselineName: string
  preloadName: string
}

/**
 * Baseline first, then preload. The experiment runs them in this order.
 */
export function createBackends(options: BackendOptions): readonly BackendConfig[] {
  const baseline: BackendConfig = Object.freeze({
    name: options.baselineName,
    env: Object.freeze({ [PRELOAD_ENV_VAR]: undefined }),
  })
  const preload: BackendConfig = Object.freeze({
    name: options.preloadName,
    env: Object.freeze({ [PRELOAD_ENV_VAR]: options.library }),
  })
  return Object.freeze([baseline, preload])
}

/**
 * Apply backend overrides to a copy of `base`.
 */
export function buildEnvironment(
  base: NodeJS.ProcessEnv,
  overrides: Readonly<Record<string, string | undefined>>
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base }
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete env[key]
    } else {
      env[key] = value
    }
  }
  return env
}

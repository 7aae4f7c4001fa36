/**
 * Page Cache Control
 *
 * Asks the kernel to drop clean caches before each timed trial so runs do
 * not read each other's warm pages. Best effort: a failure is reported as a
 * warning and the trial still runs.
 */

import type { Logger } from '../utils/logger'
import { runCommand, defaultExecutorDeps, type ExecutorDeps } from './executor'

export const DROP_CACHES_COMMAND = 'sh'

export const DROP_CACHES_ARGS = ['-c', 'sync; echo 3 | sudo -n tee /proc/sys/vm/drop_caches']

/**
 * Returns whether the drop succeeded.
 */
export async function dropPageCache(logger: Logger, deps: ExecutorDeps = defaultExecutorDeps): Promise<boolean> {
  try {
    const result = await runCommand(DROP_CACHES_COMMAND, DROP_CACHES_ARGS, process.env, deps)
    if (result.code !== 0) {
      logger.warn('Failed to drop page cache; timings may include warm cache reads', {
        exitCode: result.code,
        stderr: result.stderr.trim(),
      })
      return false
    }
    return true
  } catch (error) {
    logger.warn('Failed to drop page cache; timings may include warm cache reads', {
      error: error instanceof Error ? error.message : String(error),
    })
    return false
  }
}

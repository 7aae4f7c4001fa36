/**
 * Target Directory Cleanup
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { CleanupError } from '../utils/errors'

/**
 * Remove every entry directly inside `dir`, leaving `dir` itself in place.
 * Sub-directories go recursively; an already empty directory is a no-op.
 */
export async function clearDirectory(dir: string): Promise<void> {
  let entries: string[]
  try {
    entries = await fs.readdir(dir)
  } catch (error) {
    throw new CleanupError(dir, error instanceof Error ? error : undefined)
  }

  for (const entry of entries) {
    const target = path.join(dir, entry)
    try {
      await fs.rm(target, { recursive: true })
    } catch (error) {
      throw new CleanupError(target, error instanceof Error ? error : undefined)
    }
  }
}

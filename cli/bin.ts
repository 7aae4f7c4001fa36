#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Main entry point for the `preload-bench` command.
 */

import { program } from './main'
import { handleError } from './utils/errors'

program.parseAsync(process.argv).catch((error: unknown) => {
  handleError(error)
})

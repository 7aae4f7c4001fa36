/**
 * preload-bench CLI Entry Point (Commander-based)
 *
 * Commands:
 *   preload-bench ycsb   - Compare baseline vs. preloaded-library throughput (default)
 */

import { Command } from 'commander'
import { ycsbCommand } from './commands/ycsb'

const pkg = {
  name: 'preload-bench',
  version: '0.1.0',
  description: 'Benchmark a key-value workload client with and without a preloaded storage library',
}

export const program = new Command()
  .name(pkg.name)
  .description(pkg.description)
  .version(pkg.version, '-v, --version', 'Show version number')
  .option('--debug', 'Enable debug output')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().debug) {
      process.env.DEBUG = '1'
    }
  })

program.addCommand(ycsbCommand, { isDefault: true })

#!/usr/bin/env node

/**
 * spectro-connect — Entry Point
 *
 * Open an SSH or Telnet session to a Spectrum-managed device through
 * SpectroServer.
 *
 * @example
 * ```bash
 * spectro-connect 172.31.100.20
 * spectro-connect CORE_RTR01 --telnet
 * spectro-connect CORE_RTR01 --proxy --local-port 2222
 * ```
 */

import { runCli } from './cli/program.js'

// Clean shutdown
process.on('SIGTERM', () => {
  process.exit(0)
})

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    console.error('Fatal error:', err)
    process.exit(1)
  })

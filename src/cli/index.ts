#!/usr/bin/env node
/**
 * @entry nodoze CLI
 *
 *   nodoze                       - immediate session, then scheduled sessions forever
 *   nodoze -d Mon,Wed -i 30      - custom weekdays and keypress interval
 *   nodoze --no-pulse            - power assertion only
 */

import { createProgram } from './program.js'
import { runKeepalive } from './runKeepalive.js'

const program = createProgram(async options => {
  const exitCode = await runKeepalive(options)
  process.exit(exitCode)
})

await program.parseAsync()

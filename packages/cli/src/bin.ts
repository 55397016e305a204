#!/usr/bin/env node
import { main } from './index.js'
import { formatError } from './helpers.js'

main().catch((error: unknown) => {
  console.error(formatError(error))
  process.exit(1)
})

#!/usr/bin/env node

/**
 * pagewatch CLI
 *
 * Command-line entry point for the live-preview server.
 */

import { createProgram, reportFailure } from './program.js'

try {
  await createProgram().parseAsync()
} catch (error) {
  reportFailure(error)
  process.exit(1)
}

#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Main entry point for the `listenrelay` command.
 */

import { program } from './main'
import { handleError } from './utils/errors'

/**
 * Main CLI function
 */
export async function main(argv: string[]): Promise<void> {
  await program.parseAsync(argv)
}

// Run if executed directly
if (require.main === module) {
  main(process.argv).catch((error: unknown) => handleError(error))
}

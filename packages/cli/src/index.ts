#!/usr/bin/env node

/**
 * Knightline CLI - UCI protocol toolkit
 *
 * Main entry point for the knightline command-line interface.
 */

import { createProgram } from './cli.js';
import { handleError } from './errors/index.js';

export { VERSION } from './cli.js';

/**
 * Main entry point
 */
export async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch(handleError);

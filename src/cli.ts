#!/usr/bin/env node
/**
 * turnkit CLI entry point
 *
 * Sends one prompt to an OpenAI-compatible endpoint and prints the answer.
 */

import chalk from 'chalk';
import { runCli } from '@cli/index.js';
import { formatError } from '@utils/errorUtils.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv);
}

process.on('SIGINT', () => {
  process.exit(130); // Standard exit code for SIGINT
});

main().catch(error => {
  console.error(chalk.red(`Unexpected error: ${formatError(error)}`));
  process.exit(1);
});

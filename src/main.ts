#!/usr/bin/env node
import { runHarvestCommand } from './infrastructure/cli/HarvestCommand';

/**
 * Command-line entry point for the link harvester.
 */
async function main(): Promise<void> {
  const exitCode = await runHarvestCommand(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch(error => {
  // eslint-disable-next-line no-console
  console.error('Fatal error:', error);
  process.exit(1);
});

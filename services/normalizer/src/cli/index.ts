#!/usr/bin/env node
/**
 * leveler command-line entry point
 */

import { EXIT_FAILURE, EXIT_INTERRUPTED, main } from './main.js';

const controller = new AbortController();

// First Ctrl+C cancels the running job cleanly; a second one exits at once
process.once('SIGINT', () => {
  controller.abort();
  process.once('SIGINT', () => process.exit(EXIT_INTERRUPTED));
});

main(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[leveler] Fatal error:', error);
    process.exitCode = EXIT_FAILURE;
  });

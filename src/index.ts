#!/usr/bin/env node

/**
 * TEI Converter
 *
 * Command-line entry point. Converts one document, or serves the renderers
 * as tools over stdio with --serve.
 */

import { runCli } from './cli/run.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  },
);

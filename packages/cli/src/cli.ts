#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   catalog-sync --config ./org-units.json [--dry-run]
 */

import { main } from './main.js';

void main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);

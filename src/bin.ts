#!/usr/bin/env node
/**
 * legal-lineage CLI entry point
 *
 * Usage:
 *   legal-lineage run acme-spa          # after npm install -g
 *   node dist/bin.js status acme-spa    # direct invocation
 *
 * @module bin
 */

import { main } from './main.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });

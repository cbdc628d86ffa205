#!/usr/bin/env node

/**
 * texnotes: build a Quarto notes site from a tree of LaTeX files
 *
 *   notes_staging/<topic>/<course>/<name>.tex  ->  notes/<topic>/<course>/<slug>.qmd
 */

import { SiteBuilder } from './builder.js';
import { loadConfig } from './config.js';

async function main() {
  const config = loadConfig();
  const builder = new SiteBuilder(config);
  await builder.build();
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`ERROR: ${message}`);
  process.exit(1);
});

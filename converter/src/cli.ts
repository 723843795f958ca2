#!/usr/bin/env tsx
/*
  Card script converter

  Converts a Cockatrice card database into one card script file per card.

  Run:
    npm run convert -- cards.xml [output-dir] [--dry-run]

  Optional env:
    CARDS_XML_PATH=./exports/set.xml
    FORGE_OUTPUT_DIR=./forge_cards
    DEBUG_STATE=2
*/

import path from 'node:path';
import { config } from './config';
import { convertDocument } from './convert';

const USAGE = `Usage: card-script-convert <cards.xml> [output-dir] [--dry-run]

  cards.xml    Cockatrice card database (default: $CARDS_XML_PATH)
  output-dir   Script directory (default: $FORGE_OUTPUT_DIR or ./forge_cards)
  --dry-run    Compile every card without writing files
  --help       Show this message`;

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return;
  }

  const dryRun = args.includes('--dry-run');
  const [xmlArg, outputArg] = args.filter((a) => a && !a.startsWith('-'));
  const xmlPath = xmlArg || config.cardsXmlPath;
  if (!xmlPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const outputDir = path.resolve(outputArg || config.outputDir);

  console.log(`Reading ${path.resolve(xmlPath)}`);
  if (dryRun) console.log('Dry run: no files will be written');

  const summary = convertDocument(path.resolve(xmlPath), {
    outputDir,
    dryRun,
    onCard: (card) => console.log(`✓ ${card.name}`),
  });

  console.log('\nConversion complete!');
  console.log(`Total cards converted: ${summary.converted}`);
  console.log(`Skipped: ${summary.skipped}`);
  console.log(`Output directory: ${summary.outputDir}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

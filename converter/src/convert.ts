/**
 * Batch conversion of card records into card script files
 *
 * Output layout: <outputDir>/<first letter of file name>/<file name>.txt
 */

import fs from 'node:fs';
import path from 'node:path';
import { compileCard, renderCardScript, type CompiledCard } from '../../compiler/src';
import { decodeHtmlEntities, type CardRecord } from '../../shared/src';
import { readCardDocument } from './cardDocument';
import { debug, debugWarn, isDebugEnabled } from './utils/debug';

/**
 * "Goblin's Feast & Famine" → "goblins_feast_and_famine"
 */
export function deriveCardFileName(name: string): string {
  return name
    .toLowerCase()
    .replace(/'/g, '')
    .replace(/&/g, 'and')
    .replace(/[^a-z0-9\s-]/g, '')
    .trim()
    .replace(/\s+/g, '_');
}

/**
 * Path of a card's script file inside the output directory
 */
export function cardOutputPath(outputDir: string, name: string): string {
  const fileName = deriveCardFileName(name);
  const subdirectory = fileName.charAt(0) || 'z';
  return path.join(outputDir, subdirectory, `${fileName}.txt`);
}

/**
 * Compile one record; null when the record has no name
 */
export function convertCardRecord(record: CardRecord): CompiledCard | null {
  if (!decodeHtmlEntities(record.name).trim()) return null;

  const card = compileCard(record);
  if (isDebugEnabled(2)) {
    for (const block of card.dropped) {
      debug(2, `[convert] ${card.name}: dropped block at ${block.offset}:`, block.raw.trim());
    }
  }
  return card;
}

export interface ConvertOptions {
  readonly outputDir: string;
  /** Compile without writing any file */
  readonly dryRun?: boolean;
  /** Called after each card is converted */
  readonly onCard?: (card: CompiledCard, filePath: string) => void;
}

export interface ConversionSummary {
  readonly total: number;
  readonly converted: number;
  readonly skipped: number;
  readonly outputDir: string;
}

/**
 * Convert every record, writing one script file per named card
 */
export function convertRecords(records: readonly CardRecord[], options: ConvertOptions): ConversionSummary {
  const { outputDir, dryRun = false, onCard } = options;
  let converted = 0;
  let skipped = 0;

  if (!dryRun) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  for (const record of records) {
    const card = convertCardRecord(record);
    if (!card) {
      skipped += 1;
      debugWarn(1, '[convert] Skipped card without a name');
      continue;
    }

    const filePath = cardOutputPath(outputDir, card.name);
    if (!dryRun) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, renderCardScript(card), 'utf8');
      debug(1, `[convert] Wrote ${filePath}`);
    }

    converted += 1;
    onCard?.(card, filePath);
  }

  return { total: records.length, converted, skipped, outputDir };
}

/**
 * Read a card database and convert all of it
 *
 * @throws CardDocumentError when the document is missing or malformed
 */
export function convertDocument(xmlPath: string, options: ConvertOptions): ConversionSummary {
  return convertRecords(readCardDocument(xmlPath), options);
}

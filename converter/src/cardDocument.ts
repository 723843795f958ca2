/**
 * Cockatrice card database reader
 *
 * Supports both layouts Cockatrice has written:
 *
 *   v4: <card><name/><text/><prop><manacost/><type/><pt/><loyalty/></prop></card>
 *   v3: <card><name/><manacost/><type/><pt/><loyalty/><text/></card>
 *
 * Values are returned exactly as exported; entity decoding happens when a
 * record is compiled.
 */

import fs from 'node:fs';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { CardRecord } from '../../shared/src';

export class CardDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CardDocumentError';
  }
}

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  processEntities: false,
  trimValues: true,
  isArray: (tagName) => tagName === 'card',
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: XmlNode, key: string): XmlNode | null {
  const value = node[key];
  return isNode(value) ? value : null;
}

function text(node: XmlNode | null, key: string): string {
  const value = node?.[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Field from <prop> when present, else from the card element itself
 */
function field(card: XmlNode, key: string): string {
  return text(child(card, 'prop'), key) || text(card, key);
}

function toCardRecord(card: XmlNode): CardRecord {
  return {
    name: text(card, 'name'),
    manaCost: field(card, 'manacost'),
    type: field(card, 'type'),
    powerToughness: field(card, 'pt'),
    loyalty: field(card, 'loyalty'),
    text: text(card, 'text'),
  };
}

/**
 * Find the <cards> element: under the database root, or the root itself
 */
function findCardsNode(document: XmlNode): XmlNode | null {
  for (const value of Object.values(document)) {
    if (!isNode(value)) continue;
    const cards = child(value, 'cards');
    if (cards) return cards;
  }
  return child(document, 'cards');
}

/**
 * Parse a card database document into card records, in document order.
 *
 * @throws CardDocumentError when the document is not well-formed XML
 */
export function parseCardDocument(xml: string): CardRecord[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line } = validation.err;
    throw new CardDocumentError(`Malformed card document (${code} at line ${line}): ${msg}`);
  }

  const document: unknown = parser.parse(xml);
  if (!isNode(document)) return [];

  const cards = findCardsNode(document)?.card;
  if (!Array.isArray(cards)) return [];
  return cards.filter(isNode).map(toCardRecord);
}

/**
 * Read and parse a card database file
 */
export function readCardDocument(filePath: string): CardRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new CardDocumentError(`Card document not found: ${filePath}`);
  }
  return parseCardDocument(fs.readFileSync(filePath, 'utf8'));
}

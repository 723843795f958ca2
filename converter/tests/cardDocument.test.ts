/**
 * Tests for reading Cockatrice card databases
 */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { CardDocumentError, parseCardDocument, readCardDocument } from '../src/cardDocument';

const V4_DOCUMENT = `<?xml version="1.0" encoding="UTF-8"?>
<cockatrice_carddatabase version="4">
  <sets>
    <set>
      <name>TST</name>
      <longname>Test Set</longname>
    </set>
  </sets>
  <cards>
    <card>
      <name>Goblin Lookout</name>
      <text>Whenever this creature attacks, you gain 1 life.</text>
      <prop>
        <type>Creature - Goblin Scout</type>
        <manacost>1R</manacost>
        <pt>1/2</pt>
      </prop>
      <set rarity="common">TST</set>
    </card>
    <card>
      <name>Test Walker</name>
      <text>Choose one —
• You gain 3 life.
• Draw two cards.</text>
      <prop>
        <type>Legendary Planeswalker - Tester</type>
        <manacost>2WU</manacost>
        <loyalty>4</loyalty>
      </prop>
    </card>
  </cards>
</cockatrice_carddatabase>`;

const V3_DOCUMENT = `<?xml version="1.0" encoding="UTF-8"?>
<cockatrice_carddatabase version="3">
  <cards>
    <card>
      <name>Quiet Grove</name>
      <set>TST</set>
      <manacost></manacost>
      <type>Land</type>
      <text>{T}: Add {G}.</text>
    </card>
  </cards>
</cockatrice_carddatabase>`;

describe('parseCardDocument', () => {
  it('should read cards from <prop> in the v4 layout', () => {
    expect(parseCardDocument(V4_DOCUMENT)).toEqual([
      {
        name: 'Goblin Lookout',
        manaCost: '1R',
        type: 'Creature - Goblin Scout',
        powerToughness: '1/2',
        loyalty: '',
        text: 'Whenever this creature attacks, you gain 1 life.',
      },
      {
        name: 'Test Walker',
        manaCost: '2WU',
        type: 'Legendary Planeswalker - Tester',
        powerToughness: '',
        loyalty: '4',
        text: 'Choose one —\n• You gain 3 life.\n• Draw two cards.',
      },
    ]);
  });

  it('should read fields from the card element in the v3 layout', () => {
    expect(parseCardDocument(V3_DOCUMENT)).toEqual([
      {
        name: 'Quiet Grove',
        manaCost: '',
        type: 'Land',
        powerToughness: '',
        loyalty: '',
        text: '{T}: Add {G}.',
      },
    ]);
  });

  it('should return no records for a document without cards', () => {
    expect(parseCardDocument('<cockatrice_carddatabase version="4"><cards></cards></cockatrice_carddatabase>')).toEqual([]);
  });

  it('should reject malformed XML', () => {
    expect(() => parseCardDocument('<cards><card><name>Broken</card></cards>')).toThrow(CardDocumentError);
  });
});

describe('readCardDocument', () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  it('should read a document from disk', () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'card-document-'));
    const filePath = path.join(tempDir, 'cards.xml');
    fs.writeFileSync(filePath, V3_DOCUMENT, 'utf8');

    expect(readCardDocument(filePath).map((card) => card.name)).toEqual(['Quiet Grove']);
  });

  it('should fail for a missing file', () => {
    expect(() => readCardDocument(path.join(os.tmpdir(), 'no-such-dir', 'cards.xml'))).toThrow(CardDocumentError);
  });
});

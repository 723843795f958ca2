/**
 * Tests for card script assembly
 */
import { describe, it, expect } from 'vitest';
import type { CardRecord } from '../../shared/src';
import { compileCard, renderCardScript, renderHeader } from '../src/assembler';
import { escapeOracleText, formatTypeLine, tokenizeManaCost } from '../src/cardFormat';

function record(overrides: Partial<CardRecord>): CardRecord {
  return {
    name: 'Test Card',
    manaCost: '',
    type: '',
    powerToughness: '',
    loyalty: '',
    text: '',
    ...overrides,
  };
}

const MULTI_ABILITY_TEXT =
  'Whenever this creature attacks, tell a joke. {T}: Draw a card. At the beginning of your upkeep, you lose 1 life. ' +
  'When this creature dies, choose one —\n• You gain 2 life.\n• Scry 2.';

describe('tokenizeManaCost', () => {
  it('should split concatenated symbols', () => {
    expect(tokenizeManaCost('2U/B')).toBe('2 U/B');
    expect(tokenizeManaCost('3GG')).toBe('3 G G');
  });

  it('should keep multi-digit generic costs whole', () => {
    expect(tokenizeManaCost('10R')).toBe('10 R');
  });

  it('should ignore braces', () => {
    expect(tokenizeManaCost('{X}{R}{R}')).toBe('X R R');
  });

  it('should return an empty string for no cost', () => {
    expect(tokenizeManaCost('')).toBe('');
  });
});

describe('formatTypeLine', () => {
  it('should drop the subtype separator', () => {
    expect(formatTypeLine('Creature - Goblin Rogue')).toBe('Creature Goblin Rogue');
    expect(formatTypeLine('Legendary Creature — Elf Druid')).toBe('Legendary Creature Elf Druid');
  });

  it('should leave a type line without subtypes alone', () => {
    expect(formatTypeLine('  Instant ')).toBe('Instant');
  });
});

describe('escapeOracleText', () => {
  it('should escape line breaks and em dashes', () => {
    expect(escapeOracleText('Choose one —\n• Scry 2.')).toBe('Choose one -\\n• Scry 2.');
  });
});

describe('renderHeader', () => {
  it('should write "no cost" and omit empty fields', () => {
    expect(renderHeader(record({ name: 'Quiet Grove', type: 'Land' }))).toEqual([
      'Name:Quiet Grove',
      'ManaCost:no cost',
      'Types:Land',
    ]);
  });

  it('should include loyalty for planeswalkers', () => {
    expect(
      renderHeader(record({ name: 'Test Walker', manaCost: '2WU', type: 'Legendary Planeswalker - Tester', loyalty: '4' }))
    ).toEqual(['Name:Test Walker', 'ManaCost:2 W U', 'Types:Legendary Planeswalker Tester', 'Loyalty:4']);
  });
});

describe('compileCard', () => {
  it('should assemble header, abilities, variables and oracle text', () => {
    const card = compileCard(
      record({
        name: 'Goblin Lookout',
        manaCost: '1R',
        type: 'Creature - Goblin Scout',
        powerToughness: '1/2',
        text: 'Whenever this creature attacks, you gain 1 life.',
      })
    );

    expect(card.name).toBe('Goblin Lookout');
    expect(card.lines).toEqual([
      'Name:Goblin Lookout',
      'ManaCost:1 R',
      'Types:Creature Goblin Scout',
      'PT:1/2',
      'T:Mode$ Attacks | ValidCard$ Card.Self | TriggerZones$ Battlefield | Execute$ Effect1 | TriggerDescription$ Whenever this creature attacks, you gain 1 life.',
      'SVar:Effect1:GainLife | Defined$ You | LifeAmount$ 1',
      'Oracle:Whenever this creature attacks, you gain 1 life.',
    ]);
  });

  it('should decode entities before compiling', () => {
    const card = compileCard(record({ name: 'Rock &amp; Roll', text: 'Draw a card. It&apos;s loud.' }));

    expect(card.name).toBe('Rock & Roll');
    expect(card.lines[0]).toBe('Name:Rock & Roll');
    expect(card.lines[card.lines.length - 1]).toBe("Oracle:Draw a card. It's loud.");
  });

  it('should keep the oracle line when no ability is recognized', () => {
    const card = compileCard(record({ name: 'Quiet Grove', type: 'Land', text: '{T}: Add {G}.' }));

    expect(card.lines).toEqual(['Name:Quiet Grove', 'ManaCost:no cost', 'Types:Land', 'Oracle:{T}: Add {G}.']);
    expect(card.dropped).toHaveLength(1);
  });

  it('should write an empty oracle line for a card without text', () => {
    expect(compileCard(record({ name: 'Vanilla' })).lines).toEqual(['Name:Vanilla', 'ManaCost:no cost', 'Oracle:']);
  });

  it('should join lines with newlines', () => {
    const card = compileCard(record({ name: 'Vanilla' }));
    expect(renderCardScript(card)).toBe('Name:Vanilla\nManaCost:no cost\nOracle:');
  });
});

describe('compiled script properties', () => {
  const card = compileCard(record({ name: 'Property Test', text: MULTI_ABILITY_TEXT }));

  const definedNames = card.lines
    .filter((line) => line.startsWith('SVar:'))
    .map((line) => line.split(':')[1]);

  const referencedNames = card.lines.flatMap((line) => {
    const names: string[] = [];
    for (const match of line.matchAll(/(?:Execute|Choices)\$ (\w+)/g)) names.push(match[1]);
    const choiceList = line.match(/^SVar:\w+:(\w+(?:,\w+)+)$/);
    if (choiceList) names.push(...choiceList[1].split(','));
    return names;
  });

  it('should be deterministic', () => {
    expect(compileCard(record({ name: 'Property Test', text: MULTI_ABILITY_TEXT }))).toEqual(card);
  });

  it('should define every support variable once', () => {
    expect(new Set(definedNames).size).toBe(definedNames.length);
    expect(definedNames).toEqual(['Effect1', 'Choice2', 'Choice3', 'Choices4', 'CharmEffect5']);
  });

  it('should only reference defined variables', () => {
    expect(referencedNames.length).toBeGreaterThan(0);
    for (const name of referencedNames) {
      expect(definedNames).toContain(name);
    }
  });

  it('should keep ability lines in text order and drop what it cannot compile', () => {
    expect(card.lines.filter((line) => /^[TAS]:/.test(line)).map((line) => line.slice(0, 2))).toEqual([
      'A:',
      'T:',
      'T:',
    ]);
    expect(card.dropped.map((block) => block.raw.trim())).toEqual(['Whenever this creature attacks, tell a joke.']);
  });
});

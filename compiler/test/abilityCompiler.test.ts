/**
 * Tests for compiling rules text into ability lines and support variables
 */
import { describe, it, expect } from 'vitest';
import { compileAbilityText, compileBlock, formatActivationCost } from '../src/abilityCompiler';
import { renderAbilityLine, renderSupportVariable } from '../src/assembler';
import { createSupportVariableAllocator } from '../src/supportVariables';
import { AbilityCategory } from '../src/types';

function compileLines(text: string): { abilities: string[]; variables: string[] } {
  const compiled = compileAbilityText(text);
  return {
    abilities: compiled.abilityLines.map(renderAbilityLine),
    variables: compiled.supportVariables.map(renderSupportVariable),
  };
}

describe('compileAbilityText', () => {
  it('should compile an attack trigger', () => {
    expect(compileLines('Whenever this creature attacks, you gain 1 life.')).toEqual({
      abilities: [
        'T:Mode$ Attacks | ValidCard$ Card.Self | TriggerZones$ Battlefield | Execute$ Effect1 | TriggerDescription$ Whenever this creature attacks, you gain 1 life.',
      ],
      variables: ['SVar:Effect1:GainLife | Defined$ You | LifeAmount$ 1'],
    });
  });

  it('should compile a tap ability', () => {
    expect(compileLines('{T}: Draw a card.')).toEqual({
      abilities: ['A:AB$ Draw | Defined$ You | NumCards$ 1 | Cost$ T | SpellDescription$ {T}: Draw a card.'],
      variables: [],
    });
  });

  it('should compile an upkeep trigger', () => {
    expect(compileLines('At the beginning of your upkeep, you lose 2 life.')).toEqual({
      abilities: [
        'T:Mode$ Phase | Phase$ Upkeep | ValidPlayer$ You | TriggerZones$ Battlefield | Execute$ Effect1 | TriggerDescription$ At the beginning of your upkeep, you lose 2 life.',
      ],
      variables: ['SVar:Effect1:LoseLife | Defined$ You | LifeAmount$ 2'],
    });
  });

  it('should compile an upkeep cost', () => {
    expect(compileLines('Upkeep—Sacrifice a land.')).toEqual({
      abilities: [
        'T:Mode$ Phase | Phase$ Upkeep | ValidPlayer$ You | TriggerZones$ Battlefield | Execute$ UpkeepEffect1 | TriggerDescription$ Upkeep— Sacrifice a land',
      ],
      variables: ['SVar:UpkeepEffect1:Sacrifice | SacValid$ Land'],
    });
  });

  it('should compile a spell effect', () => {
    expect(compileLines('Target player mills three cards.').abilities).toEqual([
      'A:SP$ Mill | NumCards$ 3 | ValidTgts$ Player | TgtPrompt$ Select target player | SpellDescription$ Target player mills three cards.',
    ]);
  });

  it('should number variables across abilities in text order', () => {
    const { abilities, variables } = compileLines(
      'When this creature enters the battlefield, draw a card. Whenever this creature attacks, you gain 1 life.'
    );

    expect(abilities).toEqual([
      'T:Mode$ ChangesZone | Destination$ Battlefield | ValidCard$ Card.Self | TriggerZones$ Battlefield | Execute$ Effect1 | TriggerDescription$ When this creature enters the battlefield, draw a card.',
      'T:Mode$ Attacks | ValidCard$ Card.Self | TriggerZones$ Battlefield | Execute$ Effect2 | TriggerDescription$ Whenever this creature attacks, you gain 1 life.',
    ]);
    expect(variables).toEqual([
      'SVar:Effect1:Draw | Defined$ You | NumCards$ 1',
      'SVar:Effect2:GainLife | Defined$ You | LifeAmount$ 1',
    ]);
  });

  it('should compile a modal spell', () => {
    expect(compileLines('Choose one —\n• You gain 3 life.\n• Draw two cards.')).toEqual({
      abilities: [
        'A:SP$ Charm | CharmNum$ 1 | Choices$ Choices3 | SpellDescription$ Choose one — • You gain 3 life. • Draw two cards.',
      ],
      variables: [
        'SVar:Choice1:GainLife | Defined$ You | LifeAmount$ 3',
        'SVar:Choice2:Draw | Defined$ You | NumCards$ 2',
        'SVar:Choices3:Choice1,Choice2',
      ],
    });
  });

  it('should compile a triggered modal ability', () => {
    expect(compileLines('When this creature enters the battlefield, choose one —\n• You gain 2 life.\n• Scry 2.')).toEqual({
      abilities: [
        'T:Mode$ ChangesZone | Destination$ Battlefield | ValidCard$ Card.Self | TriggerZones$ Battlefield | Execute$ CharmEffect4 | TriggerDescription$ When this creature enters the battlefield, choose one — • You gain 2 life. • Scr',
      ],
      variables: [
        'SVar:Choice1:GainLife | Defined$ You | LifeAmount$ 2',
        'SVar:Choice2:Scry | ScryNum$ 2',
        'SVar:Choices3:Choice1,Choice2',
        'SVar:CharmEffect4:AB$ Charm | CharmNum$ 1 | Choices$ Choices3',
      ],
    });
  });

  it('should render the minimum for optional modes', () => {
    expect(compileLines('Choose up to two —\n• Scry 1.\n• Draw a card.\n• You gain 1 life.').abilities).toEqual([
      'A:SP$ Charm | CharmNum$ 2 | MinCharmNum$ 0 | Choices$ Choices4 | SpellDescription$ Choose up to two — • Scry 1. • Draw a card. • You gain 1 life.',
    ]);
  });

  it('should let "one or both" pick both modes', () => {
    expect(compileLines('Choose one or both —\n• You gain 2 life.\n• Draw a card.').abilities).toEqual([
      'A:SP$ Charm | CharmNum$ 2 | MinCharmNum$ 1 | Choices$ Choices3 | SpellDescription$ Choose one or both — • You gain 2 life. • Draw a card.',
    ]);
  });

  it('should give drained life to you in a trigger', () => {
    expect(compileLines('When this creature enters the battlefield, each opponent loses 1 life and you gain 1 life.').variables).toEqual([
      'SVar:Effect1:GainLife | Defined$ You | LifeAmount$ 1',
    ]);
  });

  it('should fall back to a spell effect when a modal block lists no modes', () => {
    expect(compileLines('Choose one — you gain 3 life.').abilities).toEqual([
      'A:SP$ GainLife | Defined$ You | LifeAmount$ 3 | SpellDescription$ Choose one — you gain 3 life.',
    ]);
  });

  it('should compile static abilities without variables', () => {
    expect(compileLines('Creatures you control have flying.')).toEqual({
      abilities: [
        'S:Mode$ Continuous | Affected$ Creature.YouCtrl | AddKeyword$ Flying | Duration$ Permanent | Description$ Creatures you control have flying.',
      ],
      variables: [],
    });
  });

  it('should truncate long trigger descriptions to 80 characters', () => {
    const text = 'Whenever this creature attacks, you gain 1 life for each of the many creatures that are attacking alongside it.';
    const [line] = compileAbilityText(text).abilityLines;
    expect(line.description).toBe(text.slice(0, 80));
  });
});

describe('drop-safety', () => {
  it('should drop a block whose effect is not understood without allocating', () => {
    const compiled = compileAbilityText('Whenever this creature attacks, tell a joke. When this creature dies, you gain 2 life.');

    expect(compiled.abilityLines).toHaveLength(1);
    expect(compiled.supportVariables.map(renderSupportVariable)).toEqual([
      'SVar:Effect1:GainLife | Defined$ You | LifeAmount$ 2',
    ]);
    expect(compiled.abilityLines.map(renderAbilityLine)).toEqual([
      'T:Mode$ ChangesZone | Origin$ Battlefield | Destination$ Graveyard | ValidCard$ Card.Self | TriggerZones$ Graveyard | Execute$ Effect1 | TriggerDescription$ When this creature dies, you gain 2 life.',
    ]);
    expect(compiled.dropped.map((block) => block.raw)).toEqual(['Whenever this creature attacks, tell a joke. ']);
  });

  it('should drop an unmapped trigger condition', () => {
    const compiled = compileAbilityText('Whenever you gain life, draw a card.');
    expect(compiled.abilityLines).toEqual([]);
    expect(compiled.supportVariables).toEqual([]);
  });

  it('should produce nothing for empty text', () => {
    expect(compileAbilityText('')).toEqual({ abilityLines: [], supportVariables: [], dropped: [] });
  });
});

describe('compileBlock', () => {
  it('should report unrecognized when the handler extracts nothing', () => {
    const outcome = compileBlock({ raw: '{T}: Add {G}.', offset: 0 }, createSupportVariableAllocator());
    expect(outcome.category).toBe(AbilityCategory.UNRECOGNIZED);
    expect(outcome.compilation).toBeNull();
  });

  it('should report the classified category on success', () => {
    const outcome = compileBlock({ raw: 'Scry 2.', offset: 0 }, createSupportVariableAllocator());
    expect(outcome.category).toBe(AbilityCategory.SPELL_EFFECT);
  });
});

describe('formatActivationCost', () => {
  it('should strip braces and separate symbols', () => {
    expect(formatActivationCost('{T}')).toBe('T');
    expect(formatActivationCost('{2}{R}')).toBe('2 R');
  });
});

/**
 * modalResolver.ts
 *
 * "Choose one —" blocks. The text before the "Choose …" header is a
 * trigger prefix (or nothing); the modes come from bullet lines, from the
 * remaining lines when there are no bullets, or from inline " • "
 * separators when the export put everything on one line.
 */

import { parseNumberFromText } from '../../shared/src/textUtils';
import { describeAbility, SPELL_DESCRIPTION_LENGTH, TRIGGER_DESCRIPTION_LENGTH } from './clauseCues';
import { isResolved, resolveEffect } from './effectResolver';
import { extractTrigger } from './triggerExtractor';
import type {
  AbilityLine,
  BlockCompilation,
  CharmSpec,
  ResolvedEffect,
  SupportVariable,
  SupportVariableAllocator,
} from './types';

const CHOOSE_HEADER = /choose (?:one or more|one or both|any number|one|two|three|four|up to \w+)/i;

const BULLET_LINE = /^\s*[•\-–—]\s*(.*)$/;

const INLINE_BULLET = /\s+•\s*/;

const TRIGGER_PREFIX = /\b(?:Whenever|When)\b|At the beginning/;

export interface ModalSplit {
  /** Text before the "Choose …" header, trimmed */
  readonly prefix: string;
  /** Header and modes */
  readonly choicesText: string;
}

/**
 * Separate a trigger prefix from the "Choose …" part of a modal block
 */
export function splitModalBlock(text: string): ModalSplit {
  const header = text.match(CHOOSE_HEADER);
  if (!header || header.index === undefined) {
    return { prefix: '', choicesText: text };
  }
  return {
    prefix: text.slice(0, header.index).trim(),
    choicesText: text.slice(header.index).trim(),
  };
}

function bulletChoices(lines: readonly string[]): string[] {
  const choices: string[] = [];
  for (const line of lines) {
    const bullet = line.match(BULLET_LINE);
    if (bullet) {
      choices.push(bullet[1].trim());
    } else if (choices.length > 0 && line.trim()) {
      choices[choices.length - 1] = `${choices[choices.length - 1]} ${line.trim()}`;
    }
  }
  return choices;
}

/**
 * Extract the mode texts of a "Choose …" clause list, in printed order
 */
export function extractModalChoices(choicesText: string): string[] {
  const [headerLine = '', ...rest] = choicesText.split('\n');

  const bullets = bulletChoices(rest);
  if (bullets.length > 0) {
    return bullets.filter(Boolean);
  }

  const lines = rest.map((line) => line.trim()).filter((line) => line && !CHOOSE_HEADER.test(line));
  if (lines.length > 0) {
    return lines;
  }

  const [, ...inline] = headerLine.split(INLINE_BULLET);
  return inline.map((choice) => choice.trim()).filter(Boolean);
}

/**
 * Number of modes to choose, from the header ("Choose two" → 2)
 */
export function charmCount(choicesText: string, available: number): Pick<CharmSpec, 'charmNum' | 'minCharmNum'> {
  const header = choicesText.match(CHOOSE_HEADER)?.[0].toLowerCase() ?? '';

  if (header.endsWith('one or more')) {
    return { charmNum: available, minCharmNum: 1 };
  }
  if (header.endsWith('one or both')) {
    return { charmNum: Math.min(2, available), minCharmNum: 1 };
  }
  if (header.endsWith('any number')) {
    return { charmNum: available, minCharmNum: 0 };
  }
  const upTo = header.match(/up to (\w+)$/);
  if (upTo) {
    return { charmNum: Math.min(parseNumberFromText(upTo[1], available), available), minCharmNum: 0 };
  }
  const count = header.match(/choose (\w+)$/);
  return { charmNum: count ? Math.min(parseNumberFromText(count[1], available), available) : available };
}

/**
 * Compile a modal block whose choices were already extracted.
 *
 * Returns null, allocating nothing, when a mode or the trigger prefix
 * cannot be resolved.
 */
export function compileModalBlock(
  text: string,
  split: ModalSplit,
  choices: readonly string[],
  allocator: SupportVariableAllocator
): BlockCompilation | null {
  const effects: ResolvedEffect[] = [];
  for (const choice of choices) {
    const effect = resolveEffect(choice);
    if (!isResolved(effect)) return null;
    effects.push(effect);
  }

  const isTriggered = TRIGGER_PREFIX.test(split.prefix);
  const trigger = isTriggered ? extractTrigger(split.prefix.replace(/,\s*$/, '')) : null;
  if (isTriggered && !trigger) return null;

  const supportVariables = effects.map((effect): SupportVariable => ({
    name: allocator.allocate('Choice'),
    definition: { kind: 'effect', effect },
  }));

  const choicesName = allocator.allocate('Choices');
  supportVariables.push({
    name: choicesName,
    definition: { kind: 'choices', choiceNames: supportVariables.map((variable) => variable.name) },
  });

  const charm: CharmSpec = { ...charmCount(split.choicesText, effects.length), choices: choicesName };

  if (!trigger) {
    const line: AbilityLine = { kind: 'charm', charm, description: describeAbility(text, SPELL_DESCRIPTION_LENGTH) };
    return { abilityLines: [line], supportVariables };
  }

  const charmName = allocator.allocate('CharmEffect');
  supportVariables.push({ name: charmName, definition: { kind: 'charm', charm } });
  return {
    abilityLines: [{ kind: 'trigger', trigger, execute: charmName, description: describeAbility(text, TRIGGER_DESCRIPTION_LENGTH) }],
    supportVariables,
  };
}

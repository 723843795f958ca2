/**
 * abilityCompiler.ts
 *
 * Compiles a card's rules text into ability lines and support variables.
 * Each block is classified, then handed to the handler for its category; a
 * handler returns null when it cannot extract everything it needs, and the
 * block is dropped without allocating any name.
 */

import { collapseWhitespace } from '../../shared/src/textUtils';
import { classifyText } from './classifier';
import { describeAbility, SPELL_DESCRIPTION_LENGTH, TRIGGER_DESCRIPTION_LENGTH } from './clauseCues';
import { isResolved, resolveEffect } from './effectResolver';
import { compileModalBlock, extractModalChoices, splitModalBlock } from './modalResolver';
import { blockText, segmentAbilityText } from './segmenter';
import { parseStaticAbility } from './staticAbilities';
import { createSupportVariableAllocator } from './supportVariables';
import { extractPhaseTrigger, extractTrigger } from './triggerExtractor';
import {
  AbilityCategory,
  type AbilityBlock,
  type AbilityLine,
  type BlockCompilation,
  type ClassifiedCategory,
  type CompiledAbilities,
  type SupportVariable,
  type SupportVariableAllocator,
  type TriggerDescriptor,
} from './types';

type BlockHandler = (text: string, allocator: SupportVariableAllocator) => BlockCompilation | null;

const TRIGGERED_PATTERN = /^(Whenever|When)\s+(.+?),\s+(.+?)(?:\.|$)/s;
const PERIODIC_PATTERN = /^At the beginning of (.+?),\s+(.+?)(?:\.|$)/s;
const UPKEEP_COST_PATTERN = /Upkeep[—:]\s*(.+?)(?:\.|$)/s;
const ACTIVATED_PATTERN = /^(\{.+?\}):\s*(.+?)(?:\.|$)/s;

/**
 * A trigger line whose effect lives in a freshly allocated variable
 */
function triggeredEffect(
  trigger: TriggerDescriptor | null,
  effectText: string,
  baseName: string,
  description: string,
  allocator: SupportVariableAllocator
): BlockCompilation | null {
  if (!trigger) return null;
  const effect = resolveEffect(effectText);
  if (!isResolved(effect)) return null;

  const name = allocator.allocate(baseName);
  const variable: SupportVariable = { name, definition: { kind: 'effect', effect } };
  return {
    abilityLines: [{ kind: 'trigger', trigger, execute: name, description }],
    supportVariables: [variable],
  };
}

function singleLine(line: AbilityLine | null): BlockCompilation | null {
  return line ? { abilityLines: [line], supportVariables: [] } : null;
}

/**
 * "{2}{R}" → "2 R"
 */
export function formatActivationCost(cost: string): string {
  return collapseWhitespace(cost.replace(/\{/g, '').replace(/\}/g, ' '));
}

function compileSpellEffect(text: string): BlockCompilation | null {
  const effect = resolveEffect(text);
  if (!isResolved(effect)) return null;
  return singleLine({ kind: 'spell', effect, description: describeAbility(text, SPELL_DESCRIPTION_LENGTH) });
}

export const BLOCK_HANDLERS: Readonly<Record<ClassifiedCategory, BlockHandler>> = {
  [AbilityCategory.MODAL]: (text, allocator) => {
    const split = splitModalBlock(text);
    const choices = extractModalChoices(split.choicesText);
    if (choices.length === 0) {
      return compileSpellEffect(text);
    }
    return compileModalBlock(text, split, choices, allocator);
  },

  [AbilityCategory.TRIGGERED]: (text, allocator) => {
    const match = text.match(TRIGGERED_PATTERN);
    if (!match) return null;
    const [, keyword, condition, effectText] = match;
    return triggeredEffect(
      extractTrigger(`${keyword} ${condition}`),
      effectText,
      'Effect',
      describeAbility(text, TRIGGER_DESCRIPTION_LENGTH),
      allocator
    );
  },

  [AbilityCategory.PERIODIC]: (text, allocator) => {
    const match = text.match(PERIODIC_PATTERN);
    if (!match) return null;
    const [, timing, effectText] = match;
    return triggeredEffect(
      extractPhaseTrigger(timing),
      effectText,
      'Effect',
      describeAbility(text, TRIGGER_DESCRIPTION_LENGTH),
      allocator
    );
  },

  [AbilityCategory.UPKEEP_COST]: (text, allocator) => {
    const match = text.match(UPKEEP_COST_PATTERN);
    if (!match) return null;
    const cost = match[1].trim();
    return triggeredEffect(
      extractPhaseTrigger('your upkeep'),
      cost,
      'UpkeepEffect',
      describeAbility(`Upkeep— ${cost}`, TRIGGER_DESCRIPTION_LENGTH),
      allocator
    );
  },

  [AbilityCategory.ACTIVATED]: (text) => {
    const match = text.match(ACTIVATED_PATTERN);
    if (!match) return null;
    const effect = resolveEffect(match[2]);
    if (!isResolved(effect)) return null;
    return singleLine({
      kind: 'activated',
      cost: formatActivationCost(match[1]),
      effect,
      description: describeAbility(text, SPELL_DESCRIPTION_LENGTH),
    });
  },

  [AbilityCategory.STATIC]: (text) => singleLine(parseStaticAbility(text)),

  [AbilityCategory.SPELL_EFFECT]: (text) => compileSpellEffect(text),
};

/**
 * Result of compiling one block; UNRECOGNIZED when nothing was emitted
 */
export interface BlockOutcome {
  readonly block: AbilityBlock;
  readonly category: AbilityCategory;
  readonly compilation: BlockCompilation | null;
}

/**
 * Classify and compile a single block
 */
export function compileBlock(block: AbilityBlock, allocator: SupportVariableAllocator): BlockOutcome {
  const text = blockText(block);
  const category = classifyText(text);
  const compilation = BLOCK_HANDLERS[category](text, allocator);
  return {
    block,
    category: compilation ? category : AbilityCategory.UNRECOGNIZED,
    compilation,
  };
}

export interface AbilityTextCompilation extends CompiledAbilities {
  /** Blocks that produced no output, in text order */
  readonly dropped: readonly AbilityBlock[];
}

/**
 * Compile a card's rules text.
 *
 * Ability lines keep block order and support variables keep allocation
 * order. Pass an allocator only to share one across several texts of the
 * same card.
 */
export function compileAbilityText(
  text: string,
  allocator: SupportVariableAllocator = createSupportVariableAllocator()
): AbilityTextCompilation {
  const abilityLines: AbilityLine[] = [];
  const supportVariables: SupportVariable[] = [];
  const dropped: AbilityBlock[] = [];

  for (const block of segmentAbilityText(text)) {
    const { compilation } = compileBlock(block, allocator);
    if (!compilation) {
      if (blockText(block)) dropped.push(block);
      continue;
    }
    abilityLines.push(...compilation.abilityLines);
    supportVariables.push(...compilation.supportVariables);
  }

  return { abilityLines, supportVariables, dropped };
}

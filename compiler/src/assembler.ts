/**
 * assembler.ts
 *
 * Renders compiled abilities as card script lines:
 *
 *   Name / ManaCost / Types / PT / Loyalty
 *   T:, A:, S: lines in block order
 *   SVar: lines in allocation order
 *   Oracle:
 */

import type { CardRecord } from '../../shared/src/cardRecord';
import { decodeHtmlEntities } from '../../shared/src/textUtils';
import { compileAbilityText } from './abilityCompiler';
import { escapeOracleText, formatTypeLine, tokenizeManaCost } from './cardFormat';
import { renderEffect } from './effectResolver';
import { renderTrigger } from './triggerExtractor';
import type { AbilityLine, CharmSpec, CompiledAbilities, CompiledCard, SupportVariable } from './types';

export const NO_COST = 'no cost';

function renderCharm(charm: CharmSpec): string {
  const minimum = charm.minCharmNum === undefined ? '' : ` | MinCharmNum$ ${charm.minCharmNum}`;
  return `Charm | CharmNum$ ${charm.charmNum}${minimum} | Choices$ ${charm.choices}`;
}

/**
 * Render one ability line (T:, A: or S:)
 */
export function renderAbilityLine(line: AbilityLine): string {
  switch (line.kind) {
    case 'trigger':
      return `T:${renderTrigger(line.trigger)} | Execute$ ${line.execute} | TriggerDescription$ ${line.description}`;
    case 'activated':
      return `A:AB$ ${renderEffect(line.effect)} | Cost$ ${line.cost} | SpellDescription$ ${line.description}`;
    case 'spell':
      return `A:SP$ ${renderEffect(line.effect)} | SpellDescription$ ${line.description}`;
    case 'charm':
      return `A:SP$ ${renderCharm(line.charm)} | SpellDescription$ ${line.description}`;
    case 'static':
      return `S:${line.params.map(([key, value]) => `${key}$ ${value}`).join(' | ')} | Description$ ${line.description}`;
  }
}

/**
 * Render one support-variable line
 */
export function renderSupportVariable(variable: SupportVariable): string {
  const { definition } = variable;
  switch (definition.kind) {
    case 'effect':
      return `SVar:${variable.name}:${renderEffect(definition.effect)}`;
    case 'choices':
      return `SVar:${variable.name}:${definition.choiceNames.join(',')}`;
    case 'charm':
      return `SVar:${variable.name}:AB$ ${renderCharm(definition.charm)}`;
  }
}

/**
 * Header lines for a card record; absent power/toughness and loyalty are omitted
 */
export function renderHeader(record: CardRecord): string[] {
  const lines = [`Name:${record.name.trim()}`];

  const manaCost = tokenizeManaCost(record.manaCost.trim());
  lines.push(`ManaCost:${manaCost || NO_COST}`);

  const types = formatTypeLine(record.type);
  if (types) lines.push(`Types:${types}`);

  const powerToughness = record.powerToughness.trim();
  if (powerToughness) lines.push(`PT:${powerToughness}`);

  const loyalty = record.loyalty.trim();
  if (loyalty) lines.push(`Loyalty:${loyalty}`);

  return lines;
}

/**
 * Assemble the full script from a record and its compiled abilities
 */
export function assembleCard(record: CardRecord, abilities: CompiledAbilities, oracleText: string): string[] {
  return [
    ...renderHeader(record),
    ...abilities.abilityLines.map(renderAbilityLine),
    ...abilities.supportVariables.map(renderSupportVariable),
    `Oracle:${escapeOracleText(oracleText)}`,
  ];
}

/**
 * Compile a card record into its script.
 *
 * Entities are decoded before anything reads the rules text, so the oracle
 * line and the abilities see the same characters.
 */
export function compileCard(record: CardRecord): CompiledCard {
  const decoded: CardRecord = {
    ...record,
    name: decodeHtmlEntities(record.name).trim(),
    type: decodeHtmlEntities(record.type),
    text: decodeHtmlEntities(record.text).trim(),
  };

  const compiled = compileAbilityText(decoded.text);
  return {
    name: decoded.name,
    lines: assembleCard(decoded, compiled, decoded.text),
    dropped: compiled.dropped,
  };
}

/**
 * Script file contents for a compiled card
 */
export function renderCardScript(card: CompiledCard): string {
  return card.lines.join('\n');
}

/**
 * Ability-text compiler
 */

export * from './types';
export { segmentAbilityText, blockText } from './segmenter';
export { classifyBlock, classifyText, CLASSIFICATION_RULES } from './classifier';
export { extractTrigger, extractPhaseTrigger, renderTrigger, TRIGGER_RULES } from './triggerExtractor';
export { resolveEffect, renderEffect, isResolved, EFFECT_RULES } from './effectResolver';
export { splitModalBlock, extractModalChoices, compileModalBlock } from './modalResolver';
export { parseStaticAbility } from './staticAbilities';
export { createSupportVariableAllocator } from './supportVariables';
export { compileAbilityText, compileBlock } from './abilityCompiler';
export type { AbilityTextCompilation, BlockOutcome } from './abilityCompiler';
export { tokenizeManaCost, formatTypeLine, escapeOracleText } from './cardFormat';
export { compileCard, assembleCard, renderAbilityLine, renderSupportVariable, renderCardScript } from './assembler';

import type { ReactionRule } from './types';
import { acidBaseRule, combustionRule, hydrolysisRule, precipitationRule } from './composition-rules';
import { decompositionRule, isomerizationRule, synthesisRule } from './count-rules';
import { doubleReplacementRule, singleReplacementRule } from './replacement-rules';

export * from './types';
export { isSingleReplacement, isDoubleReplacement } from './replacement-rules';

export const DEFAULT_RULES: readonly ReactionRule[] = Object.freeze([
  combustionRule,
  acidBaseRule,
  precipitationRule,
  hydrolysisRule,
  singleReplacementRule,
  doubleReplacementRule,
  synthesisRule,
  decompositionRule,
  isomerizationRule,
]);

export {
  acidBaseRule,
  combustionRule,
  decompositionRule,
  doubleReplacementRule,
  hydrolysisRule,
  isomerizationRule,
  precipitationRule,
  singleReplacementRule,
  synthesisRule,
};

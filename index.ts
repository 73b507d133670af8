export { Reaction } from 'src/reactions/reaction';
export type { ReactionOptions, PhaseAssignment } from 'src/reactions/reaction';
export { ReactionComponent } from 'src/reactions/reaction-component';
export type { ReactionSides } from 'src/reactions/reaction-component';
export { ReactionDictSchema } from 'src/reactions/reaction-schema';
export type { ReactionDict } from 'src/reactions/reaction-schema';
export { Molecule } from 'src/molecule/molecule';
export type { CompositionInput, MoleculeOptions } from 'src/molecule/molecule';
export { parseFormula } from 'src/parsers/formula-parser';
export { parseEquation, parseTerm, splitTerms } from 'src/parsers/equation-parser';
export type { EquationTerm } from 'src/parsers/equation-parser';
export { NullSpaceBalancer } from 'src/balancer/null-space-balancer';
export type { BalanceSolution } from 'src/balancer/null-space-balancer';
export { buildStoichiometricMatrix, findElementMismatch } from 'src/balancer/stoichiometric-matrix';
export type { StoichiometricMatrix, ElementMismatch } from 'src/balancer/stoichiometric-matrix';
export { balanceEquation } from 'src/balancer/balance-equation';
export { OxidationStateEstimator } from 'src/classification-engine/oxidation-state-estimator';
export type { OxidationStateAssignment } from 'src/classification-engine/oxidation-state-estimator';
export { ElectronTransferAnalyzer } from 'src/classification-engine/electron-transfer-analyzer';
export type { ElectronTransferAnalysis, RedoxDetectionMethod } from 'src/classification-engine/electron-transfer-analyzer';
export { FunctionalGroupAnalyzer, detectGroups } from 'src/classification-engine/functional-group-analyzer';
export type {
  FunctionalGroup,
  FunctionalGroupAnalysis,
  GroupTransformation,
  ReactionMechanism,
} from 'src/classification-engine/functional-group-analyzer';
export { ExpertRuleEngine } from 'src/classification-engine/expert-rule-engine';
export { DEFAULT_RULES } from 'src/classification-engine/rules';
export type { ReactionRule, RuleContext, RuleMatch, RuleFailure, RuleEvaluation } from 'src/classification-engine/rules';
export { ReactionFingerprinter } from 'src/classification-engine/reaction-fingerprinter';
export type { ReactionFingerprint, PhaseChanges } from 'src/classification-engine/reaction-fingerprinter';
export { ReactionTypeClassifier, pickPrimaryType } from 'src/classification-engine/reaction-type-classifier';
export type { ReactionAnalysis, ClassifierOptions } from 'src/classification-engine/reaction-type-classifier';
export { fallbackReactionType } from 'src/classification-engine/fallback-classifier';
export { verifyBalance, suggestBalancingSteps } from 'src/validators/balance-validator';
export type { BalanceReport } from 'src/validators/balance-validator';
export {
  analyzeReactionFeasibility,
  calculateAtomEconomy,
  calculateMassBalanceError,
  calculateReactionQuotient,
  calculateTheoreticalYield,
} from 'src/utils/reaction-metrics';
export type { FeasibilityVerdict, ReactionFeasibility, StoichiometricReaction } from 'src/utils/reaction-metrics';
export { getHillFormula, displayFormula, speciesLabel } from 'src/utils/composition-properties';
export { resolveEngineConfig, DEFAULT_ENGINE_CONFIG } from 'src/config/engine-config';
export type { EngineConfig, EngineConfigInput } from 'src/config/engine-config';
export { createChemistryTables, defaultChemistryTables } from 'src/config/chemistry-tables';
export type { ChemistryTables, ElementRecord } from 'src/config/chemistry-tables';
export { ChemistryError, ValidationError, BalancingError, ConfigValidationError } from 'src/errors';
export { Phase, REACTION_TYPES } from 'types';
export type {
  ClassificationResult,
  ConfidenceScores,
  ElementBalance,
  ElementCounts,
  ElementSymbol,
  MoleculeComposition,
  ReactionType,
} from 'types';

import { REACTION_TYPES, type ClassificationResult, type ConfidenceScores, type ReactionType } from 'types';
import { defaultChemistryTables, type ChemistryTables } from 'src/config/chemistry-tables';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from 'src/config/engine-config';
import type { ReactionSides } from 'src/reactions/reaction-component';
import { ElectronTransferAnalyzer, type ElectronTransferAnalysis } from './electron-transfer-analyzer';
import { ExpertRuleEngine } from './expert-rule-engine';
import { fallbackReactionType } from './fallback-classifier';
import { FunctionalGroupAnalyzer, type FunctionalGroupAnalysis } from './functional-group-analyzer';
import { OxidationStateEstimator } from './oxidation-state-estimator';
import { ReactionFingerprinter, type ReactionFingerprint } from './reaction-fingerprinter';
import { DEFAULT_RULES, type ReactionRule, type RuleEvaluation } from './rules';

export interface ReactionAnalysis {
  classification: ClassificationResult;
  electronTransfer?: ElectronTransferAnalysis;
  functionalGroups?: FunctionalGroupAnalysis;
  rules: RuleEvaluation;
  fingerprint?: ReactionFingerprint;
  fallbackType: ReactionType;
  /** stages that threw and were left out */
  diagnostics: string[];
}

export interface ClassifierOptions {
  tables?: ChemistryTables;
  config?: EngineConfig;
  rules?: readonly ReactionRule[];
}

const clamp = (value: number) => Math.min(1, Math.max(0, value));

/**
 * argmax over the scores; equal scores go to the type listed first in REACTION_TYPES.
 */
export function pickPrimaryType(scores: ConfidenceScores): ReactionType {
  let best: ReactionType = 'unknown';
  let bestScore = -Infinity;
  for (const type of REACTION_TYPES) {
    const score = scores[type];
    if (score !== undefined && score > bestScore) {
      best = type;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Merges rule matches, electron transfer and the count-based fallback into
 * one confidence map. Never throws: a failing stage is dropped and noted
 * in `diagnostics`.
 */
export class ReactionTypeClassifier {
  private readonly config: EngineConfig;
  private readonly electronTransfer: ElectronTransferAnalyzer;
  private readonly functionalGroups = new FunctionalGroupAnalyzer();
  private readonly ruleEngine: ExpertRuleEngine;
  private readonly fingerprinter: ReactionFingerprinter;

  constructor(options: ClassifierOptions = {}) {
    const tables = options.tables ?? defaultChemistryTables();
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.electronTransfer = new ElectronTransferAnalyzer(new OxidationStateEstimator(tables), this.config.redox);
    this.ruleEngine = new ExpertRuleEngine(options.rules ?? DEFAULT_RULES, tables);
    this.fingerprinter = new ReactionFingerprinter(this.electronTransfer);
  }

  classify(reaction: ReactionSides): ClassificationResult {
    return this.analyze(reaction).classification;
  }

  analyze(reaction: ReactionSides): ReactionAnalysis {
    const diagnostics: string[] = [];
    const guard = <T>(stage: string, run: () => T): T | undefined => {
      try {
        return run();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        diagnostics.push(`${stage}: ${message}`);
        if (process.env.VERBOSE) console.log(`[classifier] ${stage} failed: ${message}`);
        return undefined;
      }
    };

    const electronTransfer = guard('electron transfer', () => this.electronTransfer.analyze(reaction));
    const functionalGroups = guard('functional groups', () => this.functionalGroups.analyze(reaction));
    const rules = guard('rule engine', () => this.ruleEngine.evaluate(reaction)) ?? { matches: [], failures: [] };
    const fingerprint = guard('fingerprint', () => this.fingerprinter.fingerprint(reaction));
    const fallbackType = guard('fallback', () => fallbackReactionType(reaction)) ?? 'unknown';

    const scores = this.mergeScores(rules, electronTransfer, fallbackType);
    const classification: ClassificationResult = { confidenceScores: scores, primaryType: pickPrimaryType(scores) };

    if (process.env.VERBOSE) {
      console.log(`[classifier] primary=${classification.primaryType}`, scores);
    }

    return { classification, electronTransfer, functionalGroups, rules, fingerprint, fallbackType, diagnostics };
  }

  private mergeScores(
    rules: RuleEvaluation,
    electronTransfer: ElectronTransferAnalysis | undefined,
    fallbackType: ReactionType,
  ): ConfidenceScores {
    const { redox, classification } = this.config;
    const scores: ConfidenceScores = {};

    for (const match of rules.matches) {
      scores[match.type] = Math.max(scores[match.type] ?? 0, clamp(match.confidence));
    }

    if (electronTransfer?.isRedox) {
      scores.redox = Math.max(scores.redox ?? 0, redox.confidence);
      if (scores.synthesis !== undefined) scores.synthesis *= redox.structuralPenalty;
      if (scores.decomposition !== undefined) scores.decomposition *= redox.structuralPenalty;
    }

    if (fallbackType !== 'unknown') {
      scores[fallbackType] = Math.max(scores[fallbackType] ?? 0, classification.fallbackConfidence);
    }

    if (Object.keys(scores).length === 0) {
      return { unknown: 0 };
    }
    return scores;
  }
}

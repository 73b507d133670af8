import type { ReactionType } from 'types';
import type { ChemistryTables } from 'src/config/chemistry-tables';
import type { ReactionComponent, ReactionSides } from 'src/reactions/reaction-component';

export interface RuleContext {
  readonly tables: ChemistryTables;
  /** catalysts excluded */
  readonly reactants: readonly ReactionComponent[];
  readonly products: readonly ReactionComponent[];
}

export interface ReactionRule {
  readonly name: string;
  readonly type: ReactionType;
  readonly description: string;
  readonly confidence: number;
  predicate(reaction: ReactionSides, context: RuleContext): boolean;
}

export interface RuleMatch {
  rule: string;
  type: ReactionType;
  confidence: number;
}

export interface RuleFailure {
  rule: string;
  message: string;
  error: unknown;
}

export interface RuleEvaluation {
  matches: RuleMatch[];
  failures: RuleFailure[];
}

// Core types for reaction balancing and classification

export type ElementSymbol = string;

/**
 * Ordered element -> atom count mapping.
 * Counts are positive integers; insertion order follows the formula as written.
 */
export type ElementCounts = ReadonlyMap<ElementSymbol, number>;

export enum Phase {
  SOLID = 's',
  LIQUID = 'l',
  GAS = 'g',
  AQUEOUS = 'aq',
}

/**
 * What the reaction core reads from a molecule.
 * The core never looks at structure, only at composition and a few scalars.
 */
export interface MoleculeComposition {
  elements(): ElementCounts;
  readonly formula: string; // Hill order
  readonly molecularWeight: number; // g/mol
  readonly charge: number; // 0 when neutral
  readonly phase?: Phase;
  readonly sourceFormula?: string; // as written, without charge/phase
}

export interface ParseError {
  message: string;
  position: number; // character position in the input (0-based)
}

export interface FormulaParseResult {
  composition: Map<ElementSymbol, number>;
  charge: number;
  sourceFormula: string;
  errors: ParseError[];
}

/**
 * Reaction categories, in tie-break priority order.
 * When two categories end up with the same confidence the earlier one wins.
 */
export const REACTION_TYPES = [
  'combustion',
  'acid_base',
  'precipitation',
  'redox',
  'hydrolysis',
  'single_replacement',
  'double_replacement',
  'synthesis',
  'decomposition',
  'isomerization',
  'unknown',
] as const;

export type ReactionType = (typeof REACTION_TYPES)[number];

export type ConfidenceScores = Partial<Record<ReactionType, number>>;

export interface ClassificationResult {
  confidenceScores: ConfidenceScores;
  primaryType: ReactionType;
}

/** products - reactants, per element, catalysts excluded */
export type ElementBalance = Record<ElementSymbol, number>;

export type ReactionConditions = Record<string, string | number>;

import type { ElementSymbol } from 'types';
import { findElementMismatch } from 'src/balancer/stoichiometric-matrix';
import { ValidationError } from 'src/errors';
import type { ReactionComponent, ReactionSides } from 'src/reactions/reaction-component';

const CHARGE_TOLERANCE = 1e-9;

/** Σ coefficient × molecular weight */
export function sideMass(components: readonly ReactionComponent[]): number {
  return components.reduce((sum, c) => sum + c.coefficient * c.molecule.molecularWeight, 0);
}

/**
 * Mass share of the first product among all products, in percent.
 */
export function calculateAtomEconomy(reaction: ReactionSides): number {
  const products = reaction.getProducts();
  const desired = products[0];
  if (!desired) return 0;

  const total = sideMass(products);
  if (total === 0) return 0;
  return ((desired.coefficient * desired.molecule.molecularWeight) / total) * 100;
}

/** |product mass - reactant mass| as a percentage of reactant mass; catalysts excluded */
export function calculateMassBalanceError(reaction: ReactionSides): number {
  const reactantMass = sideMass(reaction.getReactants(false));
  const productMass = sideMass(reaction.getProducts());
  if (reactantMass === 0) return productMass > 0 ? Infinity : 0;
  return (Math.abs(productMass - reactantMass) / reactantMass) * 100;
}

/** Sides plus the conservation check the stoichiometric metrics depend on */
export interface StoichiometricReaction extends ReactionSides {
  isBalanced(): boolean;
}

export type FeasibilityVerdict = 'unknown' | 'cannot_determine' | 'impossible';

export interface ReactionFeasibility {
  massBalanced: boolean;
  chargeBalanced: boolean;
  /** product elements that no reactant supplies */
  missingElements: ElementSymbol[];
  thermodynamicallyFeasible: FeasibilityVerdict;
  kineticallyFeasible: 'unknown';
  recommendations: string[];
}

function requireBalanced(reaction: StoichiometricReaction, purpose: string): void {
  if (!reaction.isBalanced()) {
    throw new ValidationError('reaction', `must be balanced to calculate ${purpose}`);
  }
}

/**
 * Moles of every product obtainable from `amounts[limitingReactant]` moles of
 * the limiting reactant. Species are keyed by label (`H2O`, `Fe³⁺`).
 */
export function calculateTheoreticalYield(
  reaction: StoichiometricReaction,
  limitingReactant: string,
  amounts: Readonly<Record<string, number>>,
): Record<string, number> {
  requireBalanced(reaction, 'theoretical yield');

  const limiting = reaction.getReactants(false).find(c => c.label === limitingReactant);
  if (!limiting) {
    throw new ValidationError('limitingReactant', `${limitingReactant} is not a reactant`, limitingReactant);
  }

  const available = amounts[limitingReactant] ?? 0;
  const yields: Record<string, number> = {};
  for (const product of reaction.getProducts()) {
    yields[product.label] = (available * product.coefficient) / limiting.coefficient;
  }
  return yields;
}

/**
 * Q = Π[product]^ν / Π[reactant]^ν over the species present in
 * `concentrations` (mol/L); catalysts excluded.
 */
export function calculateReactionQuotient(
  reaction: StoichiometricReaction,
  concentrations: Readonly<Record<string, number>>,
): number {
  requireBalanced(reaction, 'reaction quotient');

  const activity = (components: readonly ReactionComponent[]) =>
    components.reduce((q, c) => {
      const concentration = concentrations[c.label];
      return concentration === undefined ? q : q * concentration ** c.coefficient;
    }, 1);

  const numerator = activity(reaction.getProducts());
  const denominator = activity(reaction.getReactants(false));
  return denominator === 0 ? Infinity : numerator / denominator;
}

const netCharge = (components: readonly ReactionComponent[]) =>
  components.reduce((sum, c) => sum + c.coefficient * c.molecule.charge, 0);

export function analyzeReactionFeasibility(reaction: StoichiometricReaction): ReactionFeasibility {
  const reactants = reaction.getReactants(false);
  const products = reaction.getProducts();
  const massBalanced = reaction.isBalanced();
  const chargeBalanced = Math.abs(netCharge(products) - netCharge(reactants)) < CHARGE_TOLERANCE;
  const { missingFromReactants: missingElements } = findElementMismatch(
    reactants.map(c => c.molecule),
    products.map(c => c.molecule),
  );

  const result: ReactionFeasibility = {
    massBalanced,
    chargeBalanced,
    missingElements,
    thermodynamicallyFeasible: 'unknown',
    kineticallyFeasible: 'unknown',
    recommendations: [],
  };

  if (!massBalanced) {
    result.thermodynamicallyFeasible = 'cannot_determine';
    result.recommendations.push('Balance the chemical equation first');
  }
  if (!chargeBalanced) {
    result.thermodynamicallyFeasible = 'cannot_determine';
    result.recommendations.push('Balance the net charge on both sides');
  }
  if (missingElements.length > 0) {
    result.thermodynamicallyFeasible = 'impossible';
    result.recommendations.push(`Products contain elements not present in reactants: ${missingElements.join(', ')}`);
  }
  if (result.thermodynamicallyFeasible === 'unknown') {
    result.recommendations.push(
      'Calculate the Gibbs free energy change (ΔG) for a definitive answer',
      'Consider the activation energy and reaction kinetics',
      'Optimize the reaction conditions (temperature, pressure, catalysts)',
    );
  }

  if (process.env.VERBOSE) {
    console.log(`[metrics] feasibility: ${result.thermodynamicallyFeasible}`, result.recommendations);
  }
  return result;
}

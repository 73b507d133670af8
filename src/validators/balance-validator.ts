import { maxBy, sortBy } from 'es-toolkit';
import type { ElementBalance } from 'types';
import type { Reaction } from 'src/reactions/reaction';
import { DEFAULT_ENGINE_CONFIG } from 'src/config/engine-config';
import { displayFormula } from 'src/utils/composition-properties';
import { sideMass } from 'src/utils/reaction-metrics';

export interface BalanceReport {
  isBalanced: boolean;
  elementBalance: ElementBalance;
  balancedElements: ElementBalance;
  unbalancedElements: ElementBalance;
  massBalance: number;
  massBalanced: boolean;
  totalReactantMass: number;
  totalProductMass: number;
  reactantCount: number;
  productCount: number;
  catalystCount: number;
}

export function verifyBalance(reaction: Reaction, tolerance = DEFAULT_ENGINE_CONFIG.balancer.tolerance): BalanceReport {
  const elementBalance = reaction.getElementBalance();
  const balancedElements: ElementBalance = {};
  const unbalancedElements: ElementBalance = {};
  for (const [symbol, net] of Object.entries(elementBalance)) {
    if (Math.abs(net) < tolerance) balancedElements[symbol] = net;
    else unbalancedElements[symbol] = net;
  }

  const massBalance = reaction.getMolecularWeightBalance();
  const reactants = reaction.getReactants(false);

  return {
    isBalanced: reaction.isBalanced(tolerance),
    elementBalance,
    balancedElements,
    unbalancedElements,
    massBalance,
    massBalanced: Math.abs(massBalance) < tolerance,
    totalReactantMass: sideMass(reactants),
    totalProductMass: sideMass(reaction.getProducts()),
    reactantCount: reactants.length,
    productCount: reaction.getProducts().length,
    catalystCount: reaction.getCatalysts().length,
  };
}

/**
 * Hints for balancing by hand: what is off, which molecule to start from,
 * and an element order from least to most shared.
 */
export function suggestBalancingSteps(reaction: Reaction): string[] {
  if (reaction.isBalanced()) {
    return ['Reaction is already balanced!'];
  }

  const steps: string[] = ['Unbalanced elements found:'];
  const unbalanced = reaction.getUnbalancedElements();
  for (const [symbol, net] of Object.entries(unbalanced)) {
    steps.push(
      net > 0
        ? `  - ${symbol}: excess in products (+${net.toFixed(3)})`
        : `  - ${symbol}: excess in reactants (${net.toFixed(3)})`,
    );
  }

  const molecules = [
    ...reaction.getReactants(false).map(c => ({ molecule: c.molecule, side: 'reactant' })),
    ...reaction.getProducts().map(c => ({ molecule: c.molecule, side: 'product' })),
  ];

  const mostComplex = maxBy(molecules, entry => entry.molecule.elements().size);
  if (mostComplex) {
    steps.push('Suggestion: Start by balancing the most complex molecule:');
    steps.push(`  - ${displayFormula(mostComplex.molecule)} (${mostComplex.side})`);
  }

  const appearances = Object.keys(unbalanced).map(symbol => ({
    symbol,
    count: molecules.filter(entry => entry.molecule.elements().has(symbol)).length,
  }));
  if (appearances.length > 0) {
    steps.push('Suggested balancing order (least to most complex):');
    for (const { symbol, count } of sortBy(appearances, [entry => entry.count])) {
      steps.push(`  - ${symbol} (appears in ${count} molecules)`);
    }
  }

  return steps;
}

import { intersection } from 'es-toolkit';
import type { MoleculeComposition } from 'types';
import type { ReactionRule } from './types';

const symbols = (m: MoleculeComposition) => [...m.elements().keys()];
const overlaps = (a: MoleculeComposition, b: MoleculeComposition) => intersection(symbols(a), symbols(b)).length > 0;

/**
 * A + BC -> AC + B: one reactant is a single element that reappears in one
 * product, and the other product shares an element with the compound.
 */
export function isSingleReplacement(
  reactants: readonly MoleculeComposition[],
  products: readonly MoleculeComposition[],
): boolean {
  if (reactants.length !== 2 || products.length !== 2) return false;
  const [first, second] = [reactants[0]!, reactants[1]!];

  const elementIndex = first.elements().size === 1 ? 0 : second.elements().size === 1 ? 1 : -1;
  if (elementIndex < 0) return false;

  const element = symbols(elementIndex === 0 ? first : second)[0]!;
  const compound = elementIndex === 0 ? second : first;

  return products.some((product, i) => {
    if (!product.elements().has(element)) return false;
    const other = products[1 - i]!;
    return overlaps(other, compound);
  });
}

/** AB + CD -> AD + CB: each reactant shares elements with both products */
export function isDoubleReplacement(
  reactants: readonly MoleculeComposition[],
  products: readonly MoleculeComposition[],
): boolean {
  if (reactants.length !== 2 || products.length !== 2) return false;
  return reactants.every(reactant => products.every(product => overlaps(reactant, product)));
}

export const singleReplacementRule: ReactionRule = {
  name: 'single_replacement',
  type: 'single_replacement',
  description: 'A + BC -> AC + B',
  confidence: 0.8,
  predicate: (_reaction, { reactants, products }) =>
    isSingleReplacement(
      reactants.map(c => c.molecule),
      products.map(c => c.molecule),
    ),
};

export const doubleReplacementRule: ReactionRule = {
  name: 'double_replacement',
  type: 'double_replacement',
  description: 'AB + CD -> AD + CB',
  confidence: 0.8,
  predicate: (_reaction, { reactants, products }) =>
    isDoubleReplacement(
      reactants.map(c => c.molecule),
      products.map(c => c.molecule),
    ),
};

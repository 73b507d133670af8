import type { ReactionRule } from './types';

export const synthesisRule: ReactionRule = {
  name: 'synthesis',
  type: 'synthesis',
  description: 'A + B -> AB',
  confidence: 0.9,
  predicate: (_reaction, { reactants, products }) => reactants.length > 1 && products.length === 1,
};

export const decompositionRule: ReactionRule = {
  name: 'decomposition',
  type: 'decomposition',
  description: 'AB -> A + B',
  confidence: 0.9,
  predicate: (_reaction, { reactants, products }) => reactants.length === 1 && products.length > 1,
};

export const isomerizationRule: ReactionRule = {
  name: 'isomerization',
  type: 'isomerization',
  description: 'A -> A′ with the same formula',
  confidence: 0.95,
  predicate: (_reaction, { reactants, products }) =>
    reactants.length === 1 &&
    products.length === 1 &&
    reactants[0]!.molecule.formula === products[0]!.molecule.formula,
};

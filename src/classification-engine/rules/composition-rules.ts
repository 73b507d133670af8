import { Phase } from 'types';
import { displayFormula } from 'src/utils/composition-properties';
import type { ReactionRule } from './types';
import { isCarbonDioxide, isKnownAcid, isKnownBase, isOxygenGas, isWater } from './species';

export const combustionRule: ReactionRule = {
  name: 'combustion',
  type: 'combustion',
  description: 'hydrocarbon + O2 -> CO2 + H2O',
  confidence: 0.95,
  predicate: (_reaction, { reactants, products }) =>
    reactants.some(c => c.molecule.elements().has('C') && c.molecule.elements().has('H')) &&
    reactants.some(c => isOxygenGas(c.molecule)) &&
    products.some(c => isCarbonDioxide(c.molecule)) &&
    products.some(c => isWater(c.molecule)),
};

export const acidBaseRule: ReactionRule = {
  name: 'acid_base',
  type: 'acid_base',
  description: 'acid + base -> salt + H2O',
  confidence: 0.9,
  predicate: (_reaction, { reactants, products, tables }) =>
    reactants.some(c => isKnownAcid(c.molecule, tables)) &&
    reactants.some(c => isKnownBase(c.molecule, tables)) &&
    products.some(c => isWater(c.molecule)),
};

export const precipitationRule: ReactionRule = {
  name: 'precipitation',
  type: 'precipitation',
  description: 'aqueous reactants -> solid product',
  confidence: 0.85,
  predicate: (_reaction, { reactants, products }) =>
    reactants.length >= 2 &&
    reactants.some(c => c.effectivePhase === Phase.AQUEOUS) &&
    products.some(c => c.effectivePhase === Phase.SOLID),
};

export const hydrolysisRule: ReactionRule = {
  name: 'hydrolysis',
  type: 'hydrolysis',
  description: 'compound + H2O -> hydroxyl-bearing products',
  confidence: 0.85,
  predicate: (_reaction, { reactants, products }) =>
    reactants.length >= 2 &&
    reactants.some(c => isWater(c.molecule)) &&
    products.some(c => !isWater(c.molecule) && displayFormula(c.molecule).includes('OH')),
};

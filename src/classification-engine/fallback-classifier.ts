import type { ReactionType } from 'types';
import type { ReactionSides } from 'src/reactions/reaction-component';
import { isDoubleReplacement, isSingleReplacement } from './rules';

/**
 * Coarse type from reactant/product counts alone (catalysts excluded).
 */
export function fallbackReactionType(reaction: ReactionSides): ReactionType {
  const reactants = reaction.getReactants(false).map(c => c.molecule);
  const products = reaction.getProducts().map(c => c.molecule);

  if (reactants.length === 0 || products.length === 0) return 'unknown';

  if (reactants.length === 1 && products.length === 1) {
    return reactants[0]!.formula === products[0]!.formula ? 'isomerization' : 'unknown';
  }
  if (reactants.length === 1) return 'decomposition';
  if (products.length === 1) return 'synthesis';

  if (reactants.length === 2 && products.length === 2) {
    if (isSingleReplacement(reactants, products)) return 'single_replacement';
    if (isDoubleReplacement(reactants, products)) return 'double_replacement';
  }
  return 'unknown';
}

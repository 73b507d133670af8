import { parseEquation } from 'src/parsers/equation-parser';
import type { ReactionOptions } from 'src/reactions/reaction';

/**
 * Parse, balance and render an equation string:
 * `H2 + O2 -> H2O` becomes `2 H2 + O2 → 2 H2O`.
 */
export function balanceEquation(equation: string, options: ReactionOptions = {}): string {
  const reaction = parseEquation(equation, options);
  reaction.balance();
  return reaction.toString();
}

import { Phase } from 'types';
import { ValidationError } from 'src/errors';
import { Reaction, type ReactionOptions } from 'src/reactions/reaction';

const ARROW = /->|→|⟶|=/;
const COEFFICIENT = /^(\d+(?:\.\d+)?|\.\d+)\s*(?=\S)/;
const PHASE_SUFFIX = /\((s|l|g|aq)\)$/;
const PHASES: Record<string, Phase> = { s: Phase.SOLID, l: Phase.LIQUID, g: Phase.GAS, aq: Phase.AQUEOUS };

export interface EquationTerm {
  coefficient: number;
  formula: string;
  phase?: Phase;
}

const isSpace = (ch: string | undefined) => ch !== undefined && /\s/.test(ch);
const startsTerm = (ch: string | undefined) => ch !== undefined && /[0-9A-Z([]/.test(ch);

/**
 * Split one side on `+`. A `+` separates terms when it stands between
 * spaces or directly precedes a new term; otherwise it is part of a charge
 * (`Na+ + Cl-`, `Na++Cl-`).
 */
export function splitTerms(side: string): string[] {
  const terms: string[] = [];
  let start = 0;
  for (let i = 0; i < side.length; i++) {
    if (side[i] !== '+') continue;
    const prev = side[i - 1];
    const next = side[i + 1];
    if (prev === '^') continue;
    if ((isSpace(prev) && isSpace(next)) || startsTerm(next)) {
      terms.push(side.slice(start, i));
      start = i + 1;
    }
  }
  terms.push(side.slice(start));
  return terms.map(term => term.trim());
}

export function parseTerm(text: string): EquationTerm {
  let rest = text.trim();
  if (!rest) {
    throw new ValidationError('equation', 'empty term', text);
  }

  let coefficient = 1;
  const leading = COEFFICIENT.exec(rest);
  if (leading) {
    coefficient = Number(leading[1]);
    rest = rest.slice(leading[0].length);
  }

  let phase: Phase | undefined;
  const suffix = PHASE_SUFFIX.exec(rest);
  if (suffix) {
    phase = PHASES[suffix[1] ?? ''];
    rest = rest.slice(0, suffix.index).trimEnd();
  }

  if (!rest) {
    throw new ValidationError('equation', `term '${text}' has no formula`, text);
  }
  return { coefficient, formula: rest, phase };
}

/**
 * Parse `A + B -> C`, `A + B → C` or `A + B = C`; terms may carry a leading
 * coefficient and a trailing phase such as `(aq)`.
 */
export function parseEquation(text: string, options: ReactionOptions = {}): Reaction {
  const sides = text.split(ARROW);
  if (sides.length !== 2) {
    throw new ValidationError('equation', sides.length === 1 ? 'missing reaction arrow' : 'more than one reaction arrow', text);
  }
  const [left = '', right = ''] = sides;

  const reaction = new Reaction(options);
  for (const term of splitTerms(left).map(parseTerm)) {
    reaction.addReactant(term.formula, term.coefficient, term.phase);
  }
  for (const term of splitTerms(right).map(parseTerm)) {
    reaction.addProduct(term.formula, term.coefficient, term.phase);
  }
  return reaction;
}

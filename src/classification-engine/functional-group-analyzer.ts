import type { ReactionComponent, ReactionSides } from 'src/reactions/reaction-component';
import { displayFormula } from 'src/utils/composition-properties';

export type FunctionalGroup =
  | 'alcohol'
  | 'aldehyde'
  | 'ketone'
  | 'carboxylic_acid'
  | 'ester'
  | 'amine'
  | 'nitrile'
  | 'nitro'
  | 'halide';

export type ReactionMechanism =
  | 'esterification'
  | 'hydrolysis'
  | 'oxidation'
  | 'reduction'
  | 'nucleophilic_substitution'
  | 'unknown';

export type GroupCounts = Partial<Record<FunctionalGroup, number>>;
export type GroupTransformation = readonly [from: FunctionalGroup, to: FunctionalGroup];

export interface FunctionalGroupAnalysis {
  reactantGroups: GroupCounts;
  productGroups: GroupCounts;
  transformations: GroupTransformation[];
  mechanism: ReactionMechanism;
}

interface GroupPattern {
  group: FunctionalGroup;
  matches: (formula: string) => boolean;
}

const HALIDE = /(F|Cl|Br|I)(?![a-z])/;

// String heuristics over the written formula, not structure
const GROUP_PATTERNS: readonly GroupPattern[] = [
  { group: 'alcohol', matches: f => f.includes('OH') && !f.startsWith('HO') },
  { group: 'aldehyde', matches: f => f.includes('CHO') || (f.endsWith('O') && f.includes('C')) },
  { group: 'ketone', matches: f => f.includes('CO') && !f.includes('CHO') && !f.includes('COOH') },
  { group: 'carboxylic_acid', matches: f => f.includes('COOH') },
  { group: 'ester', matches: f => f.includes('COO') && !f.includes('COOH') },
  { group: 'amine', matches: f => f.includes('NH2') },
  { group: 'nitrile', matches: f => f.includes('CN') },
  { group: 'nitro', matches: f => f.includes('NO2') },
  { group: 'halide', matches: f => HALIDE.test(f) },
];

interface MechanismEntry {
  mechanism: Exclude<ReactionMechanism, 'unknown'>;
  /** every pair in one of the alternatives must be present */
  requires: GroupTransformation[][];
}

const MECHANISMS: readonly MechanismEntry[] = [
  {
    mechanism: 'esterification',
    requires: [
      [
        ['alcohol', 'ester'],
        ['carboxylic_acid', 'ester'],
      ],
    ],
  },
  {
    mechanism: 'hydrolysis',
    requires: [
      [
        ['ester', 'alcohol'],
        ['ester', 'carboxylic_acid'],
      ],
    ],
  },
  { mechanism: 'oxidation', requires: [[['alcohol', 'ketone']], [['alcohol', 'aldehyde']]] },
  { mechanism: 'reduction', requires: [[['ketone', 'alcohol']], [['aldehyde', 'alcohol']]] },
  { mechanism: 'nucleophilic_substitution', requires: [[['halide', 'alcohol']]] },
];

export function detectGroups(formula: string): FunctionalGroup[] {
  return GROUP_PATTERNS.filter(pattern => pattern.matches(formula)).map(pattern => pattern.group);
}

export class FunctionalGroupAnalyzer {
  analyze(reaction: ReactionSides): FunctionalGroupAnalysis {
    const reactantGroups = this.countGroups(reaction.getReactants(false));
    const productGroups = this.countGroups(reaction.getProducts());
    const transformations = this.transformations(reactantGroups, productGroups);
    return { reactantGroups, productGroups, transformations, mechanism: this.mechanism(transformations) };
  }

  countGroups(components: readonly ReactionComponent[]): GroupCounts {
    const counts: GroupCounts = {};
    for (const component of components) {
      for (const group of detectGroups(displayFormula(component.molecule))) {
        counts[group] = (counts[group] ?? 0) + component.coefficient;
      }
    }
    return counts;
  }

  /** Lost-or-reduced reactant groups paired with every new-or-increased product group */
  transformations(reactantGroups: GroupCounts, productGroups: GroupCounts): GroupTransformation[] {
    const lost = GROUP_PATTERNS.map(p => p.group).filter(g => (reactantGroups[g] ?? 0) > (productGroups[g] ?? 0));
    const gained = GROUP_PATTERNS.map(p => p.group).filter(g => (productGroups[g] ?? 0) > (reactantGroups[g] ?? 0));
    return lost.flatMap(from => gained.map(to => [from, to] as const));
  }

  mechanism(transformations: readonly GroupTransformation[]): ReactionMechanism {
    const has = ([from, to]: GroupTransformation) => transformations.some(([f, t]) => f === from && t === to);
    const match = MECHANISMS.find(entry => entry.requires.some(pairs => pairs.every(has)));
    return match?.mechanism ?? 'unknown';
  }
}

import type { ElementSymbol, MoleculeComposition } from 'types';
import { defaultChemistryTables, type ChemistryTables } from 'src/config/chemistry-tables';
import { displayFormula } from 'src/utils/composition-properties';

export type OxidationStateAssignment = Map<ElementSymbol, number>;

/**
 * Formal oxidation numbers from composition alone. Rules run in order and
 * each one only fills elements the earlier ones left open:
 *
 * 0. single-element species: 0 when neutral, charge / atoms for ions
 * 1. F is -1
 * 2. O is -2, or -1 in a peroxide
 * 3. H is +1, or -1 in an active-metal hydride
 * 4. binary compounds: the more electronegative element takes its most negative common state
 * 5. one element left: solved from the total charge; more than one stays unresolved
 */
export class OxidationStateEstimator {
  constructor(private readonly tables: ChemistryTables = defaultChemistryTables()) {}

  estimate(molecule: MoleculeComposition): OxidationStateAssignment {
    const counts = molecule.elements();
    const symbols = [...counts.keys()];
    const states: OxidationStateAssignment = new Map();

    if (symbols.length === 1) {
      const only = symbols[0]!;
      states.set(only, molecule.charge === 0 ? 0 : molecule.charge / (counts.get(only) ?? 1));
      return states;
    }

    if (counts.has('F')) states.set('F', -1);

    if (counts.has('O')) {
      states.set('O', this.isPeroxide(molecule) ? -1 : -2);
    }

    if (counts.has('H')) {
      states.set('H', this.isMetalHydride(symbols) ? -1 : 1);
    }

    if (symbols.length === 2) {
      const negative = this.moreElectronegative(symbols[0]!, symbols[1]!);
      if (negative && !states.has(negative)) {
        const common = this.tables.elements.get(negative)?.oxidationStates ?? [];
        if (common.length > 0) states.set(negative, Math.min(...common));
      }
    }

    const remaining = symbols.filter(symbol => !states.has(symbol));
    if (remaining.length === 1) {
      const last = remaining[0]!;
      let assigned = 0;
      for (const [symbol, state] of states) assigned += state * (counts.get(symbol) ?? 0);
      states.set(last, (molecule.charge - assigned) / (counts.get(last) ?? 1));
    } else if (remaining.length > 1 && process.env.VERBOSE) {
      console.log(`[oxidation] ${displayFormula(molecule)}: unresolved ${remaining.join(', ')}`);
    }

    return states;
  }

  /** Literal O2 in the written formula, next to nothing but H and alkali/alkaline-earth cations */
  private isPeroxide(molecule: MoleculeComposition): boolean {
    if (!displayFormula(molecule).includes('O2')) return false;
    for (const symbol of molecule.elements().keys()) {
      if (symbol !== 'O' && symbol !== 'H' && !this.tables.peroxideFormers.has(symbol)) return false;
    }
    return true;
  }

  private isMetalHydride(symbols: readonly ElementSymbol[]): boolean {
    const others = symbols.filter(symbol => symbol !== 'H');
    return others.length > 0 && others.every(symbol => this.tables.metals.has(symbol));
  }

  private moreElectronegative(a: ElementSymbol, b: ElementSymbol): ElementSymbol | undefined {
    const ea = this.tables.elements.get(a)?.electronegativity;
    const eb = this.tables.elements.get(b)?.electronegativity;
    if (ea === undefined || eb === undefined) return undefined;
    return ea > eb ? a : b;
  }
}

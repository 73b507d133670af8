import type { ElementCounts, ElementSymbol, MoleculeComposition, Phase } from 'types';
import { defaultChemistryTables, type ChemistryTables } from 'src/config/chemistry-tables';
import { ValidationError } from 'src/errors';
import { parseFormula } from 'src/parsers/formula-parser';
import { getHillFormula, getMolecularMass, sameComposition } from 'src/utils/composition-properties';

export type CompositionInput =
  | ReadonlyMap<ElementSymbol, number>
  | Iterable<readonly [ElementSymbol, number]>
  | Readonly<Record<ElementSymbol, number>>;

export interface MoleculeOptions {
  charge?: number;
  phase?: Phase;
  sourceFormula?: string;
  tables?: ChemistryTables;
}

function isIterable(value: unknown): value is Iterable<readonly [ElementSymbol, number]> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

function toEntries(input: CompositionInput): [ElementSymbol, number][] {
  if (isIterable(input)) {
    return [...input].map(([symbol, count]) => [symbol, count]);
  }
  return Object.entries(input);
}

/**
 * Composition-only molecule: what the balancer and classifier consume.
 */
export class Molecule implements MoleculeComposition {
  readonly formula: string;
  readonly molecularWeight: number;
  readonly charge: number;
  readonly phase?: Phase;
  readonly sourceFormula?: string;
  private readonly counts: ReadonlyMap<ElementSymbol, number>;
  private readonly tables: ChemistryTables;

  constructor(composition: CompositionInput, options: MoleculeOptions = {}) {
    const tables = options.tables ?? defaultChemistryTables();
    const counts = new Map<ElementSymbol, number>();

    for (const [symbol, count] of toEntries(composition)) {
      if (!tables.elements.has(symbol)) {
        throw new ValidationError('composition', `unknown element symbol '${symbol}'`, symbol);
      }
      if (!Number.isInteger(count) || count <= 0) {
        throw new ValidationError('composition', `atom count for ${symbol} must be a positive integer`, count);
      }
      counts.set(symbol, (counts.get(symbol) ?? 0) + count);
    }
    if (counts.size === 0) {
      throw new ValidationError('composition', 'molecule must contain at least one element');
    }

    const charge = options.charge ?? 0;
    if (!Number.isInteger(charge)) {
      throw new ValidationError('charge', 'must be an integer', charge);
    }

    this.counts = counts;
    this.tables = tables;
    this.charge = charge;
    this.phase = options.phase;
    this.sourceFormula = options.sourceFormula;
    this.formula = getHillFormula(counts);
    this.molecularWeight = getMolecularMass(counts, tables);
  }

  static fromFormula(text: string, options: Omit<MoleculeOptions, 'sourceFormula'> = {}): Molecule {
    const result = parseFormula(text, options.tables);
    if (result.errors.length > 0) {
      const detail = result.errors.map(e => `${e.message} at ${e.position}`).join('; ');
      throw new ValidationError('formula', detail, text);
    }
    return new Molecule(result.composition, {
      ...options,
      charge: options.charge ?? result.charge,
      sourceFormula: result.sourceFormula,
    });
  }

  elements(): ElementCounts {
    return this.counts;
  }

  withPhase(phase: Phase | undefined): Molecule {
    return new Molecule(this.counts, this.options({ phase }));
  }

  withCharge(charge: number): Molecule {
    return new Molecule(this.counts, this.options({ charge }));
  }

  /** Same composition and charge; phase and spelling are ignored */
  equals(other: MoleculeComposition): boolean {
    return this.charge === other.charge && sameComposition(this.counts, other.elements());
  }

  toString(): string {
    return this.sourceFormula ?? this.formula;
  }

  private options(overrides: Partial<MoleculeOptions>): MoleculeOptions {
    return {
      charge: this.charge,
      phase: this.phase,
      sourceFormula: this.sourceFormula,
      tables: this.tables,
      ...overrides,
    };
  }
}

import { z } from 'zod';
import type { ElementSymbol } from 'types';
import { ConfigValidationError } from 'src/errors';
import elementsData from '../../data/elements.json';
import referenceData from '../../data/reference-compounds.json';

const ElementRecordSchema = z.object({
  symbol: z.string().regex(/^[A-Z][a-z]?$/, 'must be a capital letter optionally followed by a lowercase letter'),
  atomicNumber: z.number().int().positive(),
  atomicMass: z.number().positive(),
  electronegativity: z.number().positive().optional(),
  oxidationStates: z.array(z.number().int()),
});

export const ChemistryTablesSourceSchema = z.object({
  elements: z.array(ElementRecordSchema).min(1),
  metals: z.array(z.string()),
  peroxideFormers: z.array(z.string()),
  acids: z.array(z.string().min(1)),
  bases: z.array(z.string().min(1)),
});

export type ElementRecord = z.infer<typeof ElementRecordSchema>;
export type ChemistryTablesSource = z.infer<typeof ChemistryTablesSourceSchema>;

/**
 * Read-only lookup tables shared by the parser, the molecule factory
 * and every analyzer. Build once, pass around.
 */
export interface ChemistryTables {
  readonly elements: ReadonlyMap<ElementSymbol, ElementRecord>;
  readonly metals: ReadonlySet<ElementSymbol>;
  readonly peroxideFormers: ReadonlySet<ElementSymbol>;
  /** formulas of common acids and bases, matched by composition */
  readonly acids: readonly string[];
  readonly bases: readonly string[];
}

export function createChemistryTables(source: unknown): ChemistryTables {
  const parsed = ChemistryTablesSourceSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigValidationError(
      'Chemistry tables',
      parsed.error.issues.map(issue => ({ path: issue.path, message: issue.message })),
    );
  }

  const data = parsed.data;
  const elements = new Map<ElementSymbol, ElementRecord>();
  for (const record of data.elements) {
    if (elements.has(record.symbol)) {
      throw new ConfigValidationError('Chemistry tables', [
        { path: ['elements', record.symbol], message: 'duplicate element symbol' },
      ]);
    }
    elements.set(record.symbol, Object.freeze({ ...record, oxidationStates: [...record.oxidationStates] }));
  }

  const unknownSymbols = [
    ...data.metals.map(symbol => ['metals', symbol] as const),
    ...data.peroxideFormers.map(symbol => ['peroxideFormers', symbol] as const),
  ].filter(([, symbol]) => !elements.has(symbol));
  if (unknownSymbols.length > 0) {
    throw new ConfigValidationError(
      'Chemistry tables',
      unknownSymbols.map(([list, symbol]) => ({ path: [list, symbol], message: 'not present in the element table' })),
    );
  }

  return Object.freeze({
    elements,
    metals: new Set(data.metals),
    peroxideFormers: new Set(data.peroxideFormers),
    acids: Object.freeze([...data.acids]),
    bases: Object.freeze([...data.bases]),
  });
}

let defaultTables: ChemistryTables | undefined;

export function defaultChemistryTables(): ChemistryTables {
  if (!defaultTables) {
    defaultTables = createChemistryTables({ ...elementsData, ...referenceData });
    if (process.env.VERBOSE) {
      console.log(`[config] loaded ${defaultTables.elements.size} elements`);
    }
  }
  return defaultTables;
}

export function getElementRecord(tables: ChemistryTables, symbol: ElementSymbol): ElementRecord | undefined {
  return tables.elements.get(symbol);
}

import type { ElementCounts, ElementSymbol, MoleculeComposition } from 'types';
import type { ChemistryTables } from 'src/config/chemistry-tables';
import { parseFormula } from 'src/parsers/formula-parser';
import { sameComposition } from 'src/utils/composition-properties';

function counts(entries: Record<ElementSymbol, number>): ElementCounts {
  return new Map(Object.entries(entries));
}

const WATER = counts({ H: 2, O: 1 });
const OXYGEN = counts({ O: 2 });
const CARBON_DIOXIDE = counts({ C: 1, O: 2 });
const PROTON = counts({ H: 1 });
const HYDROXIDE = counts({ O: 1, H: 1 });

export function isSpecies(molecule: MoleculeComposition, composition: ElementCounts, charge = 0): boolean {
  return molecule.charge === charge && sameComposition(molecule.elements(), composition);
}

export const isWater = (m: MoleculeComposition) => isSpecies(m, WATER);
export const isOxygenGas = (m: MoleculeComposition) => isSpecies(m, OXYGEN);
export const isCarbonDioxide = (m: MoleculeComposition) => isSpecies(m, CARBON_DIOXIDE);

const referenceCache = new WeakMap<readonly string[], ElementCounts[]>();

function referenceCompositions(tables: ChemistryTables, list: readonly string[]): ElementCounts[] {
  const cached = referenceCache.get(list);
  if (cached) return cached;
  const parsed = list
    .map(formula => parseFormula(formula, tables))
    .filter(result => result.errors.length === 0)
    .map(result => result.composition);
  referenceCache.set(list, parsed);
  return parsed;
}

/** Listed acid by composition, or a bare H⁺ */
export function isKnownAcid(molecule: MoleculeComposition, tables: ChemistryTables): boolean {
  if (isSpecies(molecule, PROTON, 1)) return true;
  return molecule.charge === 0 && referenceCompositions(tables, tables.acids).some(c => sameComposition(molecule.elements(), c));
}

/** Listed base by composition, or a bare OH⁻ */
export function isKnownBase(molecule: MoleculeComposition, tables: ChemistryTables): boolean {
  if (isSpecies(molecule, HYDROXIDE, -1)) return true;
  return molecule.charge === 0 && referenceCompositions(tables, tables.bases).some(c => sameComposition(molecule.elements(), c));
}

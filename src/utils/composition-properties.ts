import type { ElementCounts, ElementSymbol, MoleculeComposition } from 'types';
import { getElementRecord, type ChemistryTables } from 'src/config/chemistry-tables';
import { superscriptCharge } from 'src/parsers/formula-parser';

function formatPart(symbol: ElementSymbol, count: number): string {
  return count === 1 ? symbol : `${symbol}${count}`;
}

/**
 * Hill order: C first, H second, the rest alphabetical.
 * Without carbon every element (hydrogen included) is alphabetical.
 */
export function getHillFormula(counts: ElementCounts): string {
  const symbols = [...counts.keys()].filter(symbol => (counts.get(symbol) ?? 0) > 0);
  const parts: string[] = [];

  if (symbols.includes('C')) {
    parts.push(formatPart('C', counts.get('C') ?? 0));
    if (symbols.includes('H')) parts.push(formatPart('H', counts.get('H') ?? 0));
    const rest = symbols.filter(symbol => symbol !== 'C' && symbol !== 'H').sort();
    for (const el of rest) parts.push(formatPart(el, counts.get(el) ?? 0));
  } else {
    for (const el of [...symbols].sort()) parts.push(formatPart(el, counts.get(el) ?? 0));
  }

  return parts.join('');
}

export function getMolecularMass(counts: ElementCounts, tables: ChemistryTables): number {
  let mass = 0;
  for (const [symbol, count] of counts) {
    const record = getElementRecord(tables, symbol);
    if (!record) {
      throw new RangeError(`No atomic mass for element ${symbol}`);
    }
    mass += record.atomicMass * count;
  }
  return mass;
}

/** Formula as written when known, Hill formula otherwise */
export function displayFormula(molecule: MoleculeComposition): string {
  return molecule.sourceFormula ?? molecule.formula;
}

/** Display formula with the charge as superscripts: Fe²⁺, Ce⁴⁺, Cl⁻ */
export function speciesLabel(molecule: MoleculeComposition): string {
  return `${displayFormula(molecule)}${superscriptCharge(molecule.charge)}`;
}

export function sameComposition(a: ElementCounts, b: ElementCounts): boolean {
  if (a.size !== b.size) return false;
  for (const [symbol, count] of a) {
    if (b.get(symbol) !== count) return false;
  }
  return true;
}

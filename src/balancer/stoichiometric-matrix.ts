import { difference, uniq } from 'es-toolkit';
import type { ElementSymbol, MoleculeComposition } from 'types';

export const CHARGE_ROW = 'charge';

export interface StoichiometricMatrix {
  /** Row labels: elements in first-appearance order, then `charge` when any species is charged */
  rows: string[];
  /** rows × columns; reactant columns positive, product columns negative */
  values: number[][];
  reactantCount: number;
  productCount: number;
}

export interface ElementMismatch {
  missingFromReactants: ElementSymbol[];
  missingFromProducts: ElementSymbol[];
}

export function sideElements(side: readonly MoleculeComposition[]): ElementSymbol[] {
  return uniq(side.flatMap(molecule => [...molecule.elements().keys()]));
}

export function findElementMismatch(
  reactants: readonly MoleculeComposition[],
  products: readonly MoleculeComposition[],
): ElementMismatch {
  const left = sideElements(reactants);
  const right = sideElements(products);
  return {
    missingFromReactants: difference(right, left),
    missingFromProducts: difference(left, right),
  };
}

export function buildStoichiometricMatrix(
  reactants: readonly MoleculeComposition[],
  products: readonly MoleculeComposition[],
): StoichiometricMatrix {
  const columns = [...reactants.map(m => ({ m, sign: 1 })), ...products.map(m => ({ m, sign: -1 }))];
  const elements = sideElements([...reactants, ...products]);

  const values = elements.map(element => columns.map(({ m, sign }) => sign * (m.elements().get(element) ?? 0)));
  const rows: string[] = [...elements];

  if (columns.some(({ m }) => m.charge !== 0)) {
    rows.push(CHARGE_ROW);
    values.push(columns.map(({ m, sign }) => sign * m.charge));
  }

  return { rows, values, reactantCount: reactants.length, productCount: products.length };
}

import { describe, it, expect } from 'vitest';
import { balanceEquation } from 'src/balancer/balance-equation';
import { NullSpaceBalancer } from 'src/balancer/null-space-balancer';
import { buildStoichiometricMatrix, findElementMismatch } from 'src/balancer/stoichiometric-matrix';
import { resolveEngineConfig } from 'src/config/engine-config';
import { BalancingError } from 'src/errors';
import { Molecule } from 'src/molecule/molecule';
import { parseEquation } from 'src/parsers/equation-parser';

const coefficientsOf = (equation: string) => {
  const reaction = parseEquation(equation);
  reaction.balance();
  return [...reaction.getReactants(false), ...reaction.getProducts()].map(c => c.coefficient);
};

const molecules = (...formulas: string[]) => formulas.map(f => Molecule.fromFormula(f));

describe('buildStoichiometricMatrix', () => {
  it('puts reactants positive and products negative', () => {
    const matrix = buildStoichiometricMatrix(molecules('H2', 'O2'), molecules('H2O'));
    expect(matrix.rows).toEqual(['H', 'O']);
    expect(matrix.values).toEqual([
      [2, 0, -2],
      [0, 2, -1],
    ]);
    expect(matrix.reactantCount).toBe(2);
    expect(matrix.productCount).toBe(1);
  });

  it('adds a charge row when any species is charged', () => {
    const matrix = buildStoichiometricMatrix(molecules('Fe^3+', 'Cu'), molecules('Fe^2+', 'Cu^2+'));
    expect(matrix.rows).toEqual(['Fe', 'Cu', 'charge']);
    expect(matrix.values[2]).toEqual([3, 0, -2, -2]);
  });
});

describe('findElementMismatch', () => {
  it('lists elements present on one side only', () => {
    expect(findElementMismatch(molecules('H2', 'O2'), molecules('NaCl'))).toEqual({
      missingFromReactants: ['Na', 'Cl'],
      missingFromProducts: ['H', 'O'],
    });
    expect(findElementMismatch(molecules('H2', 'O2'), molecules('H2O'))).toEqual({
      missingFromReactants: [],
      missingFromProducts: [],
    });
  });
});

describe('NullSpaceBalancer', () => {
  it('balances water formation', () => {
    expect(coefficientsOf('H2 + O2 -> H2O')).toEqual([2, 1, 2]);
  });

  it('balances hydrocarbon combustion', () => {
    expect(coefficientsOf('CH4 + O2 -> CO2 + H2O')).toEqual([1, 2, 1, 2]);
    expect(coefficientsOf('C3H8 + O2 -> CO2 + H2O')).toEqual([1, 5, 3, 4]);
    expect(coefficientsOf('C6H12O6 + O2 -> CO2 + H2O')).toEqual([1, 6, 6, 6]);
  });

  it('balances rusting', () => {
    expect(coefficientsOf('Fe + O2 -> Fe2O3')).toEqual([4, 3, 2]);
  });

  it('balances permanganate with hydrochloric acid', () => {
    expect(coefficientsOf('KMnO4 + HCl -> KCl + MnCl2 + H2O + Cl2')).toEqual([2, 16, 2, 2, 8, 5]);
  });

  it('balances hydrate and group formulas', () => {
    expect(coefficientsOf('CuSO4·5H2O -> CuSO4 + H2O')).toEqual([1, 1, 5]);
    expect(coefficientsOf('Ca(OH)2 + H3PO4 -> Ca3(PO4)2 + H2O')).toEqual([3, 2, 1, 6]);
  });

  it('conserves charge in ionic equations', () => {
    expect(coefficientsOf('MnO4^- + Fe^2+ + H^+ -> Mn^2+ + Fe^3+ + H2O')).toEqual([1, 5, 8, 1, 5, 4]);
  });

  it('returns the solution details', () => {
    const balancer = new NullSpaceBalancer();
    const solution = balancer.solve(molecules('N2', 'H2'), molecules('NH3'));
    expect(solution.coefficients).toEqual([1, 3, 2]);
    expect(solution.nullity).toBe(1);
    expect(solution.matrix.rows).toEqual(['N', 'H']);
    expect(solution.singularValues[0]).toBeCloseTo(0, 6);
  });

  it('takes its settings from the engine configuration', () => {
    const config = resolveEngineConfig({ balancer: { maxSweeps: 50 } });
    const balancer = new NullSpaceBalancer(config.balancer);
    expect(balancer.balance(parseEquation('N2 + H2 -> NH3')).coefficients).toEqual([1, 3, 2]);
  });

  describe('failures', () => {
    it('rejects a missing side', () => {
      const balancer = new NullSpaceBalancer();
      expect(() => balancer.solve(molecules('H2'), [])).toThrow(
        'Unable to balance reaction: a reaction needs at least one reactant and one product',
      );
    });

    it('names elements that cannot be conserved', () => {
      expect(() => parseEquation('H2 + O2 -> NaCl').balance()).toThrow(
        'Unable to balance reaction: products contain Na, Cl absent from reactants; reactants contain H, O absent from products',
      );
      expect(() => parseEquation('H2 -> H2O').balance()).toThrow(
        'Unable to balance reaction: products contain O absent from reactants',
      );
    });

    it('rejects systems with only the trivial solution', () => {
      expect(() => parseEquation('H2O -> H2O2').balance()).toThrow(
        'Unable to balance reaction: the stoichiometric matrix has no null space',
      );
    });

    it('rejects solutions that need negative amounts', () => {
      expect(() => parseEquation('H2O + H2 -> H2O2').balance()).toThrow(
        'Unable to balance reaction: the solution requires negative quantities',
      );
    });

    it('raises BalancingError with a code', () => {
      try {
        parseEquation('H2O -> H2O2').balance();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(BalancingError);
        if (!(error instanceof BalancingError)) return;
        expect(error.code).toBe('BALANCING_ERROR');
        expect(error.name).toBe('BalancingError');
      }
    });
  });
});

describe('balanceEquation', () => {
  it('parses, balances and renders', () => {
    expect(balanceEquation('H2 + O2 -> H2O')).toBe('2 H2 + O2 → 2 H2O');
    expect(balanceEquation('Al + O2 = Al2O3')).toBe('4 Al + 3 O2 → 2 Al2O3');
  });
});

import type { MoleculeComposition } from 'types';
import { DEFAULT_ENGINE_CONFIG, type BalancerConfig } from 'src/config/engine-config';
import { BalancingError } from 'src/errors';
import type { ReactionSides } from 'src/reactions/reaction-component';
import { limitDenominator, toMinimalIntegers } from 'src/utils/rational';
import { multiplyVector, smallestRightSingularVector } from 'src/utils/linear-algebra';
import { buildStoichiometricMatrix, findElementMismatch, type StoichiometricMatrix } from './stoichiometric-matrix';

export interface BalanceSolution {
  /** Non-catalyst reactants first, then products, in reaction order */
  coefficients: number[];
  matrix: StoichiometricMatrix;
  singularValues: number[];
  nullity: number;
}

/**
 * Finds the smallest positive integer coefficients conserving every element
 * (and total charge, when ions are present) from the numerical null space
 * of the stoichiometric matrix.
 */
export class NullSpaceBalancer {
  constructor(private readonly config: BalancerConfig = DEFAULT_ENGINE_CONFIG.balancer) {}

  balance(reaction: ReactionSides): BalanceSolution {
    return this.solve(
      reaction.getReactants(false).map(c => c.molecule),
      reaction.getProducts().map(c => c.molecule),
    );
  }

  /** Side and element-set checks shared with callers that short-circuit balanced input */
  assertBalanceable(reactants: readonly MoleculeComposition[], products: readonly MoleculeComposition[]): void {
    if (reactants.length === 0 || products.length === 0) {
      throw new BalancingError('a reaction needs at least one reactant and one product', {
        reactantCount: reactants.length,
        productCount: products.length,
      });
    }

    const { missingFromReactants, missingFromProducts } = findElementMismatch(reactants, products);
    if (missingFromReactants.length > 0 || missingFromProducts.length > 0) {
      const parts: string[] = [];
      if (missingFromReactants.length > 0) parts.push(`products contain ${missingFromReactants.join(', ')} absent from reactants`);
      if (missingFromProducts.length > 0) parts.push(`reactants contain ${missingFromProducts.join(', ')} absent from products`);
      throw new BalancingError(parts.join('; '), { missingFromReactants, missingFromProducts });
    }
  }

  solve(reactants: readonly MoleculeComposition[], products: readonly MoleculeComposition[]): BalanceSolution {
    this.assertBalanceable(reactants, products);

    const matrix = buildStoichiometricMatrix(reactants, products);
    const { vector, singularValues, nullity } = smallestRightSingularVector(matrix.values, this.config.maxSweeps);

    if (process.env.VERBOSE) {
      console.log(`[balancer] rows=${matrix.rows.join(',')} nullity=${nullity} σmin=${singularValues[0]}`);
    }

    if (nullity === 0) {
      throw new BalancingError('the stoichiometric matrix has no null space', {
        rows: matrix.rows,
        smallestSingularValue: singularValues[0],
      });
    }

    const coefficients = this.toIntegers(vector, nullity);
    this.verify(matrix, coefficients);

    if (process.env.VERBOSE) {
      console.log(`[balancer] coefficients=${coefficients.join(',')}`);
    }

    return { coefficients, matrix, singularValues, nullity };
  }

  private toIntegers(vector: readonly number[], nullity: number): number[] {
    const { clampEpsilon, maxDenominator } = this.config;
    const total = vector.reduce((sum, x) => sum + x, 0);
    const oriented = total < 0 ? vector.map(x => -x) : [...vector];

    const negative = oriented.filter(x => x < -clampEpsilon);
    if (negative.length > 0) {
      throw new BalancingError('the solution requires negative quantities', { vector: oriented, nullity });
    }

    const clamped = oriented.map(x => Math.max(x, clampEpsilon));
    const smallest = Math.min(...clamped);
    const scaled = clamped.map(x => x / smallest);

    return toMinimalIntegers(scaled.map(x => limitDenominator(x, maxDenominator)));
  }

  private verify(matrix: StoichiometricMatrix, coefficients: readonly number[]): void {
    if (coefficients.some(c => !Number.isSafeInteger(c) || c <= 0)) {
      throw new BalancingError('coefficients are not all positive integers', { coefficients: [...coefficients] });
    }

    const residual = multiplyVector(matrix.values, coefficients);
    const offending = matrix.rows.filter((_, i) => Math.abs(residual[i] ?? 0) > this.config.tolerance);
    if (offending.length > 0) {
      throw new BalancingError(`verification failed for ${offending.join(', ')}`, {
        coefficients: [...coefficients],
        residual,
      });
    }
  }
}

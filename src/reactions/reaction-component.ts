import type { MoleculeComposition, Phase } from 'types';
import { ValidationError } from 'src/errors';
import { speciesLabel } from 'src/utils/composition-properties';

export function assertPositiveCoefficient(value: number, field = 'coefficient'): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, 'must be a positive finite number', value);
  }
}

export function formatCoefficient(value: number): string {
  return value === 1 ? '' : `${Number(value.toPrecision(3))} `;
}

/**
 * One molecule on one side of a reaction. Immutable: the reaction swaps
 * components instead of editing them.
 */
export class ReactionComponent {
  constructor(
    readonly molecule: MoleculeComposition,
    readonly coefficient: number = 1,
    readonly phase?: Phase,
    readonly isCatalyst: boolean = false,
  ) {
    assertPositiveCoefficient(coefficient);
  }

  get effectivePhase(): Phase | undefined {
    return this.phase ?? this.molecule.phase;
  }

  get label(): string {
    return speciesLabel(this.molecule);
  }

  withCoefficient(coefficient: number): ReactionComponent {
    return new ReactionComponent(this.molecule, coefficient, this.phase, this.isCatalyst);
  }

  withPhase(phase: Phase | undefined): ReactionComponent {
    return new ReactionComponent(this.molecule, this.coefficient, phase, this.isCatalyst);
  }

  toString(): string {
    const phase = this.effectivePhase;
    return `${formatCoefficient(this.coefficient)}${this.label}${phase ? `(${phase})` : ''}`;
  }
}

/** Read access to both sides of a reaction; what the balancer and analyzers need */
export interface ReactionSides {
  getReactants(includeCatalysts?: boolean): readonly ReactionComponent[];
  getProducts(): readonly ReactionComponent[];
}

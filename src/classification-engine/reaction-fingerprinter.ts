import type { ElementBalance, ElementSymbol, Phase } from 'types';
import type { ReactionComponent, ReactionSides } from 'src/reactions/reaction-component';
import { ElectronTransferAnalyzer } from './electron-transfer-analyzer';

export interface PhaseChanges {
  reactantPhases: Record<string, Phase>;
  productPhases: Record<string, Phase>;
  changes: Record<string, readonly [from: Phase, to: Phase]>;
  hasPhaseChanges: boolean;
}

export interface ReactionFingerprint {
  readonly reactantElements: Readonly<Record<ElementSymbol, number>>;
  readonly productElements: Readonly<Record<ElementSymbol, number>>;
  readonly elementBalance: Readonly<ElementBalance>;
  readonly phaseChanges: Readonly<PhaseChanges>;
  readonly chargeChanges: Readonly<{ hasChargeTransfer: boolean }>;
  readonly reactantCount: number;
  readonly productCount: number;
}

export function countElements(components: readonly ReactionComponent[]): Record<ElementSymbol, number> {
  const totals: Record<ElementSymbol, number> = {};
  for (const component of components) {
    for (const [symbol, count] of component.molecule.elements()) {
      totals[symbol] = (totals[symbol] ?? 0) + count * component.coefficient;
    }
  }
  return totals;
}

function phasesByFormula(components: readonly ReactionComponent[]): Record<string, Phase> {
  const phases: Record<string, Phase> = {};
  for (const component of components) {
    const phase = component.effectivePhase;
    if (phase) phases[component.molecule.formula] = phase;
  }
  return phases;
}

/**
 * Snapshot of element, phase and charge deltas. Makes no classification decisions.
 */
export class ReactionFingerprinter {
  constructor(private readonly electronTransfer: ElectronTransferAnalyzer = new ElectronTransferAnalyzer()) {}

  fingerprint(reaction: ReactionSides): ReactionFingerprint {
    const reactants = reaction.getReactants(false);
    const products = reaction.getProducts();

    const reactantElements = countElements(reactants);
    const productElements = countElements(products);
    const elementBalance: ElementBalance = {};
    for (const symbol of new Set([...Object.keys(reactantElements), ...Object.keys(productElements)])) {
      elementBalance[symbol] = (productElements[symbol] ?? 0) - (reactantElements[symbol] ?? 0);
    }

    const reactantPhases = phasesByFormula(reactants);
    const productPhases = phasesByFormula(products);
    const changes: Record<string, readonly [Phase, Phase]> = {};
    for (const [formula, from] of Object.entries(reactantPhases)) {
      const to = productPhases[formula];
      if (to !== undefined && to !== from) changes[formula] = Object.freeze([from, to] as const);
    }

    return Object.freeze({
      reactantElements: Object.freeze(reactantElements),
      productElements: Object.freeze(productElements),
      elementBalance: Object.freeze(elementBalance),
      phaseChanges: Object.freeze({
        reactantPhases,
        productPhases,
        changes,
        hasPhaseChanges: Object.keys(changes).length > 0,
      }),
      chargeChanges: Object.freeze({ hasChargeTransfer: this.electronTransfer.analyze(reaction).isRedox }),
      reactantCount: reactants.length,
      productCount: products.length,
    });
  }
}

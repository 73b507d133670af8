import type { ElementSymbol } from 'types';
import { DEFAULT_ENGINE_CONFIG, type RedoxConfig } from 'src/config/engine-config';
import type { ReactionComponent, ReactionSides } from 'src/reactions/reaction-component';
import { OxidationStateEstimator } from './oxidation-state-estimator';

export type RedoxDetectionMethod = 'oxidation_states' | 'ionic_charges';

export interface ElectronTransferAnalysis {
  method: RedoxDetectionMethod;
  isRedox: boolean;
  /** product - reactant, only for elements past the change threshold */
  changes: Record<ElementSymbol, number>;
  reactantStates: Record<ElementSymbol, number>;
  productStates: Record<ElementSymbol, number>;
  oxidizingAgent?: string;
  reducingAgent?: string;
}

/**
 * Finds electron transfer by diffing per-element oxidation states between
 * the two sides. Explicit monatomic ion charges (Fe²⁺ -> Fe³⁺) are checked
 * too and take over whenever they show redox on their own.
 */
export class ElectronTransferAnalyzer {
  constructor(
    private readonly estimator: OxidationStateEstimator = new OxidationStateEstimator(),
    private readonly config: RedoxConfig = DEFAULT_ENGINE_CONFIG.redox,
  ) {}

  analyze(reaction: ReactionSides): ElectronTransferAnalysis {
    const reactants = reaction.getReactants(false);
    const products = reaction.getProducts();

    const ionic = this.fromIonicCharges(reactants, products);
    if (ionic.isRedox) {
      if (process.env.VERBOSE) console.log('[electron-transfer] ionic charges show redox', ionic.changes);
      return ionic;
    }

    const reactantStates = this.averageStates(reactants);
    const productStates = this.averageStates(products);
    const changes = this.diff(reactantStates, productStates);
    const result = this.withAgents('oxidation_states', changes, reactants, reactantStates, productStates);

    if (process.env.VERBOSE) {
      console.log(`[electron-transfer] isRedox=${result.isRedox}`, changes);
    }
    return result;
  }

  /**
   * Coefficient × atom-count weighted average per element, over the
   * molecules where the estimator resolved that element.
   */
  averageStates(components: readonly ReactionComponent[]): Record<ElementSymbol, number> {
    const weighted = new Map<ElementSymbol, { total: number; atoms: number }>();

    for (const component of components) {
      const counts = component.molecule.elements();
      for (const [symbol, state] of this.estimator.estimate(component.molecule)) {
        const atoms = (counts.get(symbol) ?? 0) * component.coefficient;
        const entry = weighted.get(symbol) ?? { total: 0, atoms: 0 };
        entry.total += state * atoms;
        entry.atoms += atoms;
        weighted.set(symbol, entry);
      }
    }

    const averages: Record<ElementSymbol, number> = {};
    for (const [symbol, { total, atoms }] of weighted) {
      if (atoms > 0) averages[symbol] = total / atoms;
    }
    return averages;
  }

  private fromIonicCharges(
    reactants: readonly ReactionComponent[],
    products: readonly ReactionComponent[],
  ): ElectronTransferAnalysis {
    const reactantCharges = monatomicIonCharges(reactants);
    const productCharges = monatomicIonCharges(products);
    return this.withAgents('ionic_charges', this.diff(reactantCharges, productCharges), reactants, reactantCharges, productCharges);
  }

  private diff(
    before: Record<ElementSymbol, number>,
    after: Record<ElementSymbol, number>,
  ): Record<ElementSymbol, number> {
    const changes: Record<ElementSymbol, number> = {};
    for (const [symbol, start] of Object.entries(before)) {
      const end = after[symbol];
      if (end === undefined) continue;
      const delta = end - start;
      if (Math.abs(delta) > this.config.changeThreshold) changes[symbol] = delta;
    }
    return changes;
  }

  private withAgents(
    method: RedoxDetectionMethod,
    changes: Record<ElementSymbol, number>,
    reactants: readonly ReactionComponent[],
    reactantStates: Record<ElementSymbol, number>,
    productStates: Record<ElementSymbol, number>,
  ): ElectronTransferAnalysis {
    const isRedox = Object.keys(changes).length >= this.config.minChangedElements;
    const result: ElectronTransferAnalysis = { method, isRedox, changes, reactantStates, productStates };
    if (!isRedox) return result;

    const reduced = Object.keys(changes).filter(symbol => (changes[symbol] ?? 0) < 0);
    const oxidized = Object.keys(changes).filter(symbol => (changes[symbol] ?? 0) > 0);
    const contains = (component: ReactionComponent, symbols: string[]) =>
      symbols.some(symbol => component.molecule.elements().has(symbol));

    // gains electrons -> oxidizing agent; loses electrons -> reducing agent
    result.oxidizingAgent = reactants.find(c => contains(c, reduced))?.label;
    result.reducingAgent = reactants.find(c => contains(c, oxidized))?.label;
    return result;
  }
}

function monatomicIonCharges(components: readonly ReactionComponent[]): Record<ElementSymbol, number> {
  const charges: Record<ElementSymbol, number> = {};
  for (const { molecule } of components) {
    const symbols = [...molecule.elements().keys()];
    if (symbols.length === 1 && molecule.charge !== 0) {
      charges[symbols[0]!] = molecule.charge;
    }
  }
  return charges;
}

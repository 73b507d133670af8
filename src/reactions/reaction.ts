import type {
  ClassificationResult,
  ElementBalance,
  MoleculeComposition,
  Phase,
  ReactionConditions,
  ReactionType,
} from 'types';
import { NullSpaceBalancer } from 'src/balancer/null-space-balancer';
import { ReactionTypeClassifier, type ReactionAnalysis } from 'src/classification-engine/reaction-type-classifier';
import { defaultChemistryTables, type ChemistryTables } from 'src/config/chemistry-tables';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from 'src/config/engine-config';
import { ValidationError } from 'src/errors';
import { Molecule } from 'src/molecule/molecule';
import { limitDenominator, toMinimalIntegers } from 'src/utils/rational';
import { sideMass } from 'src/utils/reaction-metrics';
import { assertPositiveCoefficient, ReactionComponent, type ReactionSides } from './reaction-component';
import { reactionFromDict, reactionToDict, type ReactionDict } from './reaction-schema';

export interface ReactionOptions {
  name?: string;
  temperature?: number; // K
  pressure?: number; // atm
  conditions?: ReactionConditions;
  tables?: ChemistryTables;
  config?: EngineConfig;
  balancer?: NullSpaceBalancer;
  classifier?: ReactionTypeClassifier;
}

export type PhaseAssignment = Phase | readonly (Phase | undefined)[];

/**
 * A chemical equation: ordered reactants (catalysts flagged in place) and products.
 *
 * Every mutation bumps `version`; cached element balance and classification
 * are keyed by it.
 */
export class Reaction implements ReactionSides {
  name?: string;
  temperature?: number;
  pressure?: number;
  conditions: ReactionConditions;

  private reactants: ReactionComponent[] = [];
  private products: ReactionComponent[] = [];
  private revision = 0;
  private balanceCache?: { version: number; balance: ElementBalance };
  private analysisCache?: { version: number; analysis: ReactionAnalysis };

  private readonly tables: ChemistryTables;
  private readonly config: EngineConfig;
  private balancer?: NullSpaceBalancer;
  private classifier?: ReactionTypeClassifier;

  constructor(options: ReactionOptions = {}) {
    this.name = options.name;
    this.temperature = options.temperature;
    this.pressure = options.pressure;
    this.conditions = { ...options.conditions };
    this.tables = options.tables ?? defaultChemistryTables();
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.balancer = options.balancer;
    this.classifier = options.classifier;
  }

  get version(): number {
    return this.revision;
  }

  addReactant(molecule: MoleculeComposition | string, coefficient = 1, phase?: Phase, isCatalyst = false): this {
    this.reactants.push(new ReactionComponent(this.resolve(molecule), coefficient, phase, isCatalyst));
    this.touch();
    return this;
  }

  addProduct(molecule: MoleculeComposition | string, coefficient = 1, phase?: Phase): this {
    this.products.push(new ReactionComponent(this.resolve(molecule), coefficient, phase));
    this.touch();
    return this;
  }

  getReactants(includeCatalysts = true): readonly ReactionComponent[] {
    return includeCatalysts ? [...this.reactants] : this.reactants.filter(c => !c.isCatalyst);
  }

  getProducts(): readonly ReactionComponent[] {
    return [...this.products];
  }

  getCatalysts(): readonly ReactionComponent[] {
    return this.reactants.filter(c => c.isCatalyst);
  }

  /** products - reactants per element, catalysts excluded */
  getElementBalance(): ElementBalance {
    const cached = this.balanceCache;
    if (cached && cached.version === this.revision) return { ...cached.balance };

    const balance: ElementBalance = {};
    const accumulate = (components: readonly ReactionComponent[], sign: number) => {
      for (const component of components) {
        for (const [symbol, count] of component.molecule.elements()) {
          balance[symbol] = (balance[symbol] ?? 0) + sign * count * component.coefficient;
        }
      }
    };
    accumulate(this.getReactants(false), -1);
    accumulate(this.products, 1);
    this.balanceCache = { version: this.revision, balance };
    return { ...balance };
  }

  isBalanced(tolerance = this.config.balancer.tolerance): boolean {
    return Object.values(this.getElementBalance()).every(net => Math.abs(net) <= tolerance);
  }

  getUnbalancedElements(tolerance = this.config.balancer.tolerance): ElementBalance {
    const unbalanced: ElementBalance = {};
    for (const [symbol, net] of Object.entries(this.getElementBalance())) {
      if (Math.abs(net) >= tolerance) unbalanced[symbol] = net;
    }
    return unbalanced;
  }

  /** product mass - reactant mass (g/mol), catalysts excluded */
  getMolecularWeightBalance(): number {
    return sideMass(this.products) - sideMass(this.getReactants(false));
  }

  /**
   * Replace coefficients with the smallest positive integers that conserve
   * every element. Already balanced reactions are left as they are.
   */
  balance(): boolean {
    const balancer = this.getBalancer();
    const reactants = this.getReactants(false);
    balancer.assertBalanceable(
      reactants.map(c => c.molecule),
      this.products.map(c => c.molecule),
    );
    if (this.isBalanced()) return true;

    const { coefficients } = balancer.balance(this);
    this.applyCoefficients(coefficients);

    if (process.env.VERBOSE) console.log(`[reaction] balanced: ${this.toString()}`);
    return this.isBalanced();
  }

  reverse(): Reaction {
    const reversed = new Reaction({
      name: this.name ? `Reverse of ${this.name}` : undefined,
      temperature: this.temperature,
      pressure: this.pressure,
      conditions: { ...this.conditions },
      tables: this.tables,
      config: this.config,
      balancer: this.balancer,
      classifier: this.classifier,
    });
    reversed.reactants = [...this.products, ...this.getCatalysts()];
    reversed.products = [...this.getReactants(false)];
    reversed.touch();
    return reversed;
  }

  scaleCoefficients(factor: number): void {
    assertPositiveCoefficient(factor, 'factor');
    this.reactants = this.reactants.map(c => (c.isCatalyst ? c : c.withCoefficient(c.coefficient * factor)));
    this.products = this.products.map(c => c.withCoefficient(c.coefficient * factor));
    this.touch();
  }

  /**
   * Smallest integer coefficients with the same ratios. Each coefficient is
   * read as a fraction with a bounded denominator first, so 0.5 / 1.5 becomes 1 / 3.
   */
  normalizeCoefficients(): void {
    const current = [...this.getReactants(false), ...this.products].map(c => c.coefficient);
    if (current.length === 0) return;
    const maxDenominator = this.config.normalization.maxDenominator;
    this.applyCoefficients(toMinimalIntegers(current.map(c => limitDenominator(c, maxDenominator))));
  }

  /** One phase for the whole side, or one entry per component */
  setPhases(reactantPhases?: PhaseAssignment, productPhases?: PhaseAssignment): this {
    if (reactantPhases !== undefined) this.reactants = assignPhases(this.reactants, reactantPhases, 'reactantPhases');
    if (productPhases !== undefined) this.products = assignPhases(this.products, productPhases, 'productPhases');
    this.touch();
    return this;
  }

  /** Cached per version and frozen, so callers share one read-only result */
  analyze(): ReactionAnalysis {
    const cached = this.analysisCache;
    if (cached && cached.version === this.revision) return cached.analysis;

    const analysis = this.getClassifier().analyze(this);
    Object.freeze(analysis.classification.confidenceScores);
    Object.freeze(analysis.classification);
    Object.freeze(analysis);
    this.analysisCache = { version: this.revision, analysis };
    return analysis;
  }

  classify(): ClassificationResult {
    return this.analyze().classification;
  }

  get type(): ReactionType {
    return this.classify().primaryType;
  }

  toDict(): ReactionDict {
    return reactionToDict(this);
  }

  static fromDict(data: unknown, options: Omit<ReactionOptions, 'name' | 'temperature' | 'pressure' | 'conditions'> = {}): Reaction {
    return reactionFromDict(data, payload => new Reaction({ ...options, ...payload }));
  }

  toString(): string {
    if (this.reactants.length === 0 && this.products.length === 0) return 'Empty reaction';

    const side = (components: readonly ReactionComponent[]) =>
      components.length > 0 ? components.map(c => c.toString()).join(' + ') : '∅';
    let equation = `${side(this.getReactants(false))} → ${side(this.products)}`;

    const catalysts = this.getCatalysts();
    if (catalysts.length > 0) {
      equation += ` [catalyst: ${catalysts.map(c => c.toString()).join(', ')}]`;
    }

    const conditions: string[] = [];
    if (this.temperature) conditions.push(`T=${this.temperature}K`);
    if (this.pressure) conditions.push(`P=${this.pressure}atm`);
    for (const [key, value] of Object.entries(this.conditions)) conditions.push(`${key}=${value}`);
    if (conditions.length > 0) equation += ` [${conditions.join(', ')}]`;

    return equation;
  }

  /** Molecule from a written formula, against this reaction's element tables */
  parseSpecies(formula: string, charge?: number): Molecule {
    return Molecule.fromFormula(formula, { tables: this.tables, charge });
  }

  private resolve(molecule: MoleculeComposition | string): MoleculeComposition {
    return typeof molecule === 'string' ? this.parseSpecies(molecule) : molecule;
  }

  /** `coefficients` covers non-catalyst reactants then products */
  private applyCoefficients(coefficients: readonly number[]): void {
    let index = 0;
    const next = () => {
      const value = coefficients[index++];
      if (value === undefined) {
        throw new ValidationError('coefficients', 'fewer coefficients than components', coefficients.length);
      }
      return value;
    };
    this.reactants = this.reactants.map(c => (c.isCatalyst ? c : c.withCoefficient(next())));
    this.products = this.products.map(c => c.withCoefficient(next()));
    this.touch();
  }

  private getBalancer(): NullSpaceBalancer {
    this.balancer ??= new NullSpaceBalancer(this.config.balancer);
    return this.balancer;
  }

  private getClassifier(): ReactionTypeClassifier {
    this.classifier ??= new ReactionTypeClassifier({ tables: this.tables, config: this.config });
    return this.classifier;
  }

  private touch(): void {
    this.revision++;
  }
}

function assignPhases(
  components: readonly ReactionComponent[],
  phases: PhaseAssignment,
  field: string,
): ReactionComponent[] {
  if (typeof phases === 'string') {
    return components.map(c => c.withPhase(phases));
  }
  if (phases.length !== components.length) {
    throw new ValidationError(field, `expected ${components.length} phases, got ${phases.length}`, phases);
  }
  return components.map((c, i) => c.withPhase(phases[i]));
}

import { defaultChemistryTables, type ChemistryTables } from 'src/config/chemistry-tables';
import type { ReactionSides } from 'src/reactions/reaction-component';
import { DEFAULT_RULES, type ReactionRule, type RuleContext, type RuleEvaluation } from './rules';

/**
 * Evaluates every rule independently. A rule that throws does not match;
 * the error comes back as a RuleFailure instead of propagating.
 */
export class ExpertRuleEngine {
  private readonly rules: readonly ReactionRule[];

  constructor(
    rules: readonly ReactionRule[] = DEFAULT_RULES,
    private readonly tables: ChemistryTables = defaultChemistryTables(),
  ) {
    this.rules = [...rules];
  }

  getRules(): ReactionRule[] {
    return [...this.rules];
  }

  evaluate(reaction: ReactionSides): RuleEvaluation {
    const context: RuleContext = {
      tables: this.tables,
      reactants: reaction.getReactants(false),
      products: reaction.getProducts(),
    };
    const evaluation: RuleEvaluation = { matches: [], failures: [] };

    for (const rule of this.rules) {
      try {
        if (rule.predicate(reaction, context)) {
          evaluation.matches.push({ rule: rule.name, type: rule.type, confidence: rule.confidence });
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        evaluation.failures.push({ rule: rule.name, message: `Rule ${rule.name} failed: ${message}`, error });
        if (process.env.VERBOSE) console.log(`[rule-engine] ${rule.name} failed: ${message}`);
      }
    }

    return evaluation;
  }
}

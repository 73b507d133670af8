import { z } from 'zod';
import { Phase } from 'types';
import { ValidationError } from 'src/errors';
import { displayFormula } from 'src/utils/composition-properties';
import type { Reaction, ReactionOptions } from './reaction';

const ComponentSchema = z.object({
  formula: z.string().min(1),
  coefficient: z.number().positive().finite().default(1),
  phase: z.nativeEnum(Phase).nullish(),
  charge: z.number().int().optional(),
});

const ReactantSchema = ComponentSchema.extend({
  isCatalyst: z.boolean().default(false),
});

export const ReactionDictSchema = z.object({
  name: z.string().nullish(),
  reactants: z.array(ReactantSchema).default([]),
  products: z.array(ComponentSchema).default([]),
  temperature: z.number().nullish(),
  pressure: z.number().nullish(),
  conditions: z.record(z.union([z.string(), z.number()])).default({}),
  balanced: z.boolean().optional(),
});

export type ReactionDict = z.input<typeof ReactionDictSchema>;

type ReactionPayload = Pick<ReactionOptions, 'name' | 'temperature' | 'pressure' | 'conditions'>;

export function reactionToDict(reaction: Reaction): ReactionDict {
  return {
    name: reaction.name ?? null,
    reactants: reaction.getReactants().map(c => ({
      formula: displayFormula(c.molecule),
      coefficient: c.coefficient,
      phase: c.effectivePhase ?? null,
      charge: c.molecule.charge,
      isCatalyst: c.isCatalyst,
    })),
    products: reaction.getProducts().map(c => ({
      formula: displayFormula(c.molecule),
      coefficient: c.coefficient,
      phase: c.effectivePhase ?? null,
      charge: c.molecule.charge,
    })),
    temperature: reaction.temperature ?? null,
    pressure: reaction.pressure ?? null,
    conditions: { ...reaction.conditions },
    balanced: reaction.isBalanced(),
  };
}

export function reactionFromDict(data: unknown, create: (payload: ReactionPayload) => Reaction): Reaction {
  const parsed = ReactionDictSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'reaction';
    throw new ValidationError(path, issue?.message ?? 'invalid reaction payload', data);
  }

  const { name, temperature, pressure, conditions, reactants, products } = parsed.data;
  const reaction = create({
    name: name ?? undefined,
    temperature: temperature ?? undefined,
    pressure: pressure ?? undefined,
    conditions,
  });

  for (const r of reactants) {
    reaction.addReactant(reaction.parseSpecies(r.formula, r.charge), r.coefficient, r.phase ?? undefined, r.isCatalyst);
  }
  for (const p of products) {
    reaction.addProduct(reaction.parseSpecies(p.formula, p.charge), p.coefficient, p.phase ?? undefined);
  }
  return reaction;
}

import { z } from 'zod';
import { ConfigValidationError } from 'src/errors';

const BalancerConfigSchema = z
  .object({
    tolerance: z.number().positive().default(1e-6),
    maxDenominator: z.number().int().positive().default(10_000),
    clampEpsilon: z.number().positive().default(1e-12),
    maxSweeps: z.number().int().positive().default(100),
  })
  .default({});

const NormalizationConfigSchema = z
  .object({
    maxDenominator: z.number().int().positive().default(1_000_000),
  })
  .default({});

const RedoxConfigSchema = z
  .object({
    changeThreshold: z.number().nonnegative().default(0.1),
    minChangedElements: z.number().int().positive().default(2),
    confidence: z.number().min(0).max(1).default(0.95),
    structuralPenalty: z.number().min(0).max(1).default(0.5),
  })
  .default({});

const ClassificationConfigSchema = z
  .object({
    fallbackConfidence: z.number().min(0).max(1).default(0.8),
  })
  .default({});

export const EngineConfigSchema = z.object({
  balancer: BalancerConfigSchema,
  normalization: NormalizationConfigSchema,
  redox: RedoxConfigSchema,
  classification: ClassificationConfigSchema,
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type BalancerConfig = EngineConfig['balancer'];
export type RedoxConfig = EngineConfig['redox'];

export function resolveEngineConfig(overrides: EngineConfigInput = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigValidationError(
      'Engine configuration',
      result.error.issues.map(issue => ({ path: issue.path, message: issue.message })),
    );
  }
  return result.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = resolveEngineConfig();

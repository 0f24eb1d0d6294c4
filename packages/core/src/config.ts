import { z } from "zod";
import { ValidationError } from "arbor-shared";

/**
 * Engine feature switches. Every pass takes a snapshot of the configuration
 * when its resolution context is created.
 */
export const EngineConfigSchema = z.object({
  /** Reuse unchanged subtrees of the previous committed tree */
  reconciliationEnabled: z.boolean().default(true),
  /** Collect component transitions during resolution */
  transitionsEnabled: z.boolean().default(true),
  /** Fold pending state updates into the tree state before resolving */
  applyStateUpdatesEarly: z.boolean().default(false),
  /** Defer size-spec-dependent components even at the root of a pass */
  alwaysResolveNestedTreeInMeasure: z.boolean().default(false),
  /** Events kept by each resolution context's lifecycle log */
  lifecycleLogCapacity: z.number().int().min(2).default(16),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

let defaults: EngineConfig = EngineConfigSchema.parse({});

/**
 * Merge `overrides` over the configured defaults and validate the result.
 *
 * @throws ValidationError naming the first offending field
 */
export function resolveEngineConfig(overrides: EngineConfigInput = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse({ ...defaults, ...overrides });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : "config";
    throw new ValidationError(
      field,
      `Invalid engine config "${field}": ${issue?.message ?? "invalid value"}`,
      "VALIDATION_CONSTRAINT",
      { issues: parsed.error.issues.length },
      parsed.error,
    );
  }
  return parsed.data;
}

/**
 * Set process-wide defaults for subsequent passes.
 *
 * @example
 * ```typescript
 * configureEngine({ reconciliationEnabled: false });
 * ```
 */
export function configureEngine(overrides: EngineConfigInput): void {
  defaults = resolveEngineConfig(overrides);
}

export function getEngineConfig(): EngineConfig {
  return defaults;
}

export function resetEngineConfig(): void {
  defaults = EngineConfigSchema.parse({});
}

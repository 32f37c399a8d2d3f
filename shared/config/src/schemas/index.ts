/**
 * Zod Schema Validation for Engine Configuration
 *
 * Runtime validation of the topology file and its environment overrides.
 * Prevents runtime failures from malformed configs that pass TypeScript
 * compile-time checks but fail at runtime.
 *
 * Validation runs once at startup. Once validated, the configuration is
 * frozen and trusted for the life of the process.
 */

import { z } from 'zod';
import { ConfigurationError } from '@regionguard/types';
import {
  HEALTH_THRESHOLDS,
  ENGINE_DEFAULTS,
  ANOMALY_DEFAULTS,
  CASCADE_DEFAULTS,
  PROBE_DEFAULTS,
  CONTROL_PLANE_DEFAULTS,
  REMEDIATION_DEFAULTS,
  ALERT_DEFAULTS,
  API_DEFAULTS,
} from '../thresholds';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Number in [0, 1]. Used for thresholds, ratios and penalty weights.
 */
export const UnitIntervalSchema = z
  .number()
  .min(0, 'Value cannot be negative')
  .max(1, 'Value cannot exceed 1');

export const PositiveIntSchema = z.number().int().positive();

export const NonNegativeIntSchema = z.number().int().nonnegative();

export const UrlSchema = z.string().url('Invalid URL format');

const IdentifierSchema = z.string().min(1, 'Identifier cannot be empty');

// =============================================================================
// Section Schemas
// =============================================================================

export const ThresholdsSchema = z.object({
  health: UnitIntervalSchema.default(HEALTH_THRESHOLDS.health),
  warning: UnitIntervalSchema.default(HEALTH_THRESHOLDS.warning),
  responseTimeMs: z.number().positive().default(HEALTH_THRESHOLDS.responseTimeMs),
  consecutiveFailures: PositiveIntSchema.default(HEALTH_THRESHOLDS.consecutiveFailures),
  anomalyDegrade: UnitIntervalSchema.default(HEALTH_THRESHOLDS.anomalyDegrade),
  cascadeFail: UnitIntervalSchema.default(HEALTH_THRESHOLDS.cascadeFail),
});

export const ProbeSpecSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('http'),
    /** May contain {service} and {region} placeholders */
    urlTemplate: z.string().min(1),
  }),
  z.object({
    kind: z.literal('dns'),
    hostnameTemplate: z.string().min(1),
    attempts: PositiveIntSchema.default(1),
  }),
]);

export const ServiceSchema = z.object({
  name: IdentifierSchema,
  weight: z.number().min(0, 'Weight cannot be negative'),
  probe: ProbeSpecSchema,
});

export const DependencyEdgeSchema = z.object({
  upstream: IdentifierSchema,
  downstream: IdentifierSchema,
  weight: z.number().gt(0, 'Edge weight must be greater than 0').max(1, 'Edge weight cannot exceed 1'),
});

export const TrafficGroupSchema = z.object({
  id: IdentifierSchema,
  primaryRegion: IdentifierSchema,
  secondaryRegions: z.array(IdentifierSchema).min(1, 'Traffic group needs at least one secondary region'),
  dns: z
    .object({
      zone: z.string().min(1),
      recordName: z.string().min(1),
      targetTemplate: z.string().min(1),
    })
    .optional(),
  cdn: z
    .object({
      distributionId: z.string().min(1),
      originTemplate: z.string().min(1),
    })
    .optional(),
  scaling: z
    .object({
      targetTemplate: z.string().min(1),
      delta: PositiveIntSchema.default(2),
    })
    .optional(),
});

export const ControlPlaneSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('dry-run') }),
  z.object({
    mode: z.literal('http'),
    baseUrl: UrlSchema,
    apiToken: z.string().optional(),
    timeoutMs: PositiveIntSchema.default(CONTROL_PLANE_DEFAULTS.timeoutMs),
  }),
]);

export const OutcomeLogSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('memory') }),
  z.object({
    kind: z.literal('redis'),
    url: z.string().min(1),
    streamPrefix: z.string().min(1).default('remediation:outcomes:'),
  }),
]);

// =============================================================================
// Engine Configuration
// =============================================================================

export const EngineConfigSchema = z.object({
  thresholds: ThresholdsSchema.default({}),
  pollingIntervalMs: PositiveIntSchema.default(ENGINE_DEFAULTS.pollingIntervalMs),
  cooldownCycles: PositiveIntSchema.default(ENGINE_DEFAULTS.cooldownCycles),
  anomalyPenaltyWeight: UnitIntervalSchema.default(ENGINE_DEFAULTS.anomalyPenaltyWeight),
  autoFailback: z.boolean().default(ENGINE_DEFAULTS.autoFailback),
  sampleWindowSize: PositiveIntSchema.default(ENGINE_DEFAULTS.sampleWindowSize),
  anomaly: z
    .object({
      minSamples: PositiveIntSchema.default(ANOMALY_DEFAULTS.minSamples),
      trees: PositiveIntSchema.default(ANOMALY_DEFAULTS.trees),
      subsampleSize: z.number().int().min(2).default(ANOMALY_DEFAULTS.subsampleSize),
      maxBufferedRows: PositiveIntSchema.default(ANOMALY_DEFAULTS.maxBufferedRows),
      seed: z.number().int().default(ANOMALY_DEFAULTS.seed),
    })
    .default({}),
  cascade: z
    .object({
      maxDepth: PositiveIntSchema.default(CASCADE_DEFAULTS.maxDepth),
      alertThreshold: UnitIntervalSchema.default(CASCADE_DEFAULTS.alertThreshold),
    })
    .default({}),
  probe: z
    .object({
      concurrency: PositiveIntSchema.default(PROBE_DEFAULTS.concurrency),
      /** Defaults to thresholds.responseTimeMs */
      timeoutMs: z.number().positive().optional(),
    })
    .default({}),
  remediation: z
    .object({
      maxAttempts: PositiveIntSchema.default(REMEDIATION_DEFAULTS.maxAttempts),
      initialDelayMs: NonNegativeIntSchema.default(REMEDIATION_DEFAULTS.initialDelayMs),
      maxDelayMs: NonNegativeIntSchema.default(REMEDIATION_DEFAULTS.maxDelayMs),
      backoffMultiplier: z.number().min(1).default(REMEDIATION_DEFAULTS.backoffMultiplier),
      retryPartialEachCycle: z.boolean().default(REMEDIATION_DEFAULTS.retryPartialEachCycle),
    })
    .default({}),
  services: z.array(ServiceSchema).min(1, 'At least one service must be monitored'),
  dependencies: z.array(DependencyEdgeSchema).default([]),
  trafficGroups: z.array(TrafficGroupSchema).min(1, 'At least one traffic group is required'),
  controlPlane: ControlPlaneSchema.default({ mode: 'dry-run' }),
  outcomeLog: OutcomeLogSchema.default({ kind: 'memory' }),
  alerts: z
    .object({
      webhookUrl: UrlSchema.optional(),
      cooldownMs: NonNegativeIntSchema.default(ALERT_DEFAULTS.cooldownMs),
    })
    .default({}),
  api: z
    .object({
      enabled: z.boolean().default(true),
      port: z.number().int().min(1).max(65535).default(API_DEFAULTS.port),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type ThresholdsConfig = z.infer<typeof ThresholdsSchema>;
export type ServiceConfig = z.infer<typeof ServiceSchema>;
export type ProbeSpec = z.infer<typeof ProbeSpecSchema>;
export type TrafficGroupConfig = z.infer<typeof TrafficGroupSchema>;
export type ControlPlaneConfig = z.infer<typeof ControlPlaneSchema>;
export type OutcomeLogConfig = z.infer<typeof OutcomeLogSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Validate data and return detailed results without throwing.
 */
export function validateWithDetails<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw ConfigurationError on failure.
 * Use at startup/load time, not in hot paths.
 *
 * @throws ConfigurationError listing every validation failure
 */
export function validateOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context: string): T {
  const result = validateWithDetails(schema, data);

  if (result.success) {
    return result.data;
  }

  throw new ConfigurationError(
    `Config validation failed for ${context}`,
    result.errors.map(e => `${e.path || '(root)'}: ${e.message}`)
  );
}

/**
 * Engine Configuration Loader
 *
 * Reads the topology file, overlays scalar environment overrides, validates
 * the result with Zod, then checks cross-field rules the schema cannot express.
 * The returned object is deeply frozen and passed to every component.
 *
 * Environment Variables:
 * - ENGINE_CONFIG_PATH: Topology file (default: config/engine.json)
 * - HEALTH_THRESHOLD, WARNING_THRESHOLD, RESPONSE_TIME_THRESHOLD_MS,
 *   CONSECUTIVE_FAILURES_THRESHOLD, POLLING_INTERVAL_MS, COOLDOWN_CYCLES,
 *   ANOMALY_PENALTY_WEIGHT, AUTO_FAILBACK, API_PORT, ALERT_WEBHOOK_URL
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '@regionguard/types';
import { EngineConfigSchema, validateOrThrow } from './schemas';
import type { EngineConfig } from './schemas';
import { parseBooleanEnv, safeParseFloat, safeParseInt } from './utils/env-parsing';
import { WEIGHT_SUM_TOLERANCE } from './thresholds';

export const DEFAULT_CONFIG_PATH = 'config/engine.json';

export type EnvSource = Record<string, string | undefined>;

export interface LoadEngineConfigOptions {
  /** Overrides ENGINE_CONFIG_PATH */
  configPath?: string;
  env?: EnvSource;
  /** Injected for tests */
  readFile?: (filePath: string) => string;
}

// =============================================================================
// Environment Overrides
// =============================================================================

interface EnvOverride {
  env: string;
  path: readonly [string] | readonly [string, string];
  parse: (value: string | undefined) => number | boolean | string | undefined;
}

const ENV_OVERRIDES: readonly EnvOverride[] = [
  { env: 'HEALTH_THRESHOLD', path: ['thresholds', 'health'], parse: safeParseFloat },
  { env: 'WARNING_THRESHOLD', path: ['thresholds', 'warning'], parse: safeParseFloat },
  { env: 'RESPONSE_TIME_THRESHOLD_MS', path: ['thresholds', 'responseTimeMs'], parse: safeParseFloat },
  { env: 'CONSECUTIVE_FAILURES_THRESHOLD', path: ['thresholds', 'consecutiveFailures'], parse: safeParseInt },
  { env: 'POLLING_INTERVAL_MS', path: ['pollingIntervalMs'], parse: safeParseInt },
  { env: 'COOLDOWN_CYCLES', path: ['cooldownCycles'], parse: safeParseInt },
  { env: 'ANOMALY_PENALTY_WEIGHT', path: ['anomalyPenaltyWeight'], parse: safeParseFloat },
  { env: 'AUTO_FAILBACK', path: ['autoFailback'], parse: parseBooleanEnv },
  { env: 'API_PORT', path: ['api', 'port'], parse: safeParseInt },
  { env: 'ALERT_WEBHOOK_URL', path: ['alerts', 'webhookUrl'], parse: value => value || undefined },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay set environment variables onto a copy of the raw topology.
 * A variable that is set but cannot be parsed is reported, not ignored.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: EnvSource): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  const problems: string[] = [];

  for (const override of ENV_OVERRIDES) {
    const rawValue = env[override.env];
    if (rawValue === undefined || rawValue === '') continue;

    const value = override.parse(rawValue);
    if (value === undefined) {
      problems.push(`${override.env}: cannot parse "${rawValue}"`);
      continue;
    }

    if (override.path.length === 1) {
      merged[override.path[0]] = value;
    } else {
      const [section, key] = override.path;
      const existing = merged[section];
      merged[section] = { ...(isRecord(existing) ? existing : {}), [key]: value };
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError('Invalid environment overrides', problems);
  }
  return merged;
}

// =============================================================================
// Semantic Checks
// =============================================================================

/**
 * Cross-field rules. Returns every problem found.
 */
export function findSemanticProblems(config: EngineConfig): string[] {
  const problems: string[] = [];

  if (config.thresholds.warning < config.thresholds.health) {
    problems.push(
      `thresholds.warning (${config.thresholds.warning}) must be >= thresholds.health (${config.thresholds.health})`
    );
  }

  if (config.remediation.maxDelayMs < config.remediation.initialDelayMs) {
    problems.push('remediation.maxDelayMs must be >= remediation.initialDelayMs');
  }

  const serviceNames = new Set<string>();
  let weightSum = 0;
  for (const service of config.services) {
    if (serviceNames.has(service.name)) {
      problems.push(`Duplicate service "${service.name}"`);
    }
    serviceNames.add(service.name);
    weightSum += service.weight;
  }
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
    problems.push(`Service weights must sum to 1 (got ${Number(weightSum.toFixed(6))})`);
  }

  for (const edge of config.dependencies) {
    for (const name of [edge.upstream, edge.downstream]) {
      if (!serviceNames.has(name)) {
        problems.push(`Dependency ${edge.upstream} -> ${edge.downstream} references unknown service "${name}"`);
      }
    }
  }

  const groupIds = new Set<string>();
  for (const group of config.trafficGroups) {
    if (groupIds.has(group.id)) {
      problems.push(`Duplicate traffic group "${group.id}"`);
    }
    groupIds.add(group.id);

    if (group.secondaryRegions.includes(group.primaryRegion)) {
      problems.push(`Traffic group "${group.id}" lists its primary region ${group.primaryRegion} as a secondary`);
    }
    if (new Set(group.secondaryRegions).size !== group.secondaryRegions.length) {
      problems.push(`Traffic group "${group.id}" lists a secondary region more than once`);
    }
  }

  return problems;
}

// =============================================================================
// Loading
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate an already-parsed topology object.
 *
 * @throws ConfigurationError on any schema or semantic problem
 */
export function resolveEngineConfig(raw: unknown, env: EnvSource = {}): EngineConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Engine configuration must be a JSON object');
  }

  const config = validateOrThrow(EngineConfigSchema, applyEnvOverrides(raw, env), 'engine configuration');

  const problems = findSemanticProblems(config);
  if (problems.length > 0) {
    throw new ConfigurationError('Invalid engine configuration', problems);
  }

  return deepFreeze(config);
}

/**
 * Read, merge and validate the engine configuration.
 *
 * @throws ConfigurationError when the file is missing, unparseable or invalid
 */
export function loadEngineConfig(options: LoadEngineConfigOptions = {}): EngineConfig {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? env.ENGINE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);
  const readFile = options.readFile ?? ((filePath: string) => fs.readFileSync(filePath, 'utf8'));

  let text: string;
  try {
    text = readFile(configPath);
  } catch (error) {
    throw new ConfigurationError(`Cannot read engine configuration at ${configPath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Engine configuration at ${configPath} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return resolveEngineConfig(raw, env);
}

// =============================================================================
// Derived Views
// =============================================================================

/**
 * Every region named by a traffic group, primaries first, in declaration order.
 */
export function monitoredRegions(config: EngineConfig): string[] {
  const regions: string[] = [];
  const add = (region: string) => {
    if (!regions.includes(region)) regions.push(region);
  };
  for (const group of config.trafficGroups) add(group.primaryRegion);
  for (const group of config.trafficGroups) group.secondaryRegions.forEach(add);
  return regions;
}

export function serviceWeights(config: EngineConfig): Record<string, number> {
  return Object.fromEntries(config.services.map(service => [service.name, service.weight]));
}

/** Probe timeout, falling back to the response-time threshold. */
export function probeTimeoutMs(config: EngineConfig): number {
  return config.probe.timeoutMs ?? config.thresholds.responseTimeMs;
}

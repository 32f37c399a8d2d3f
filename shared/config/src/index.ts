/**
 * @regionguard/config
 *
 * Engine configuration: defaults, Zod schemas, environment overrides and the
 * startup loader.
 */

export * from './thresholds';
export * from './schemas';
export * from './utils/env-parsing';
export {
  DEFAULT_CONFIG_PATH,
  applyEnvOverrides,
  findSemanticProblems,
  resolveEngineConfig,
  loadEngineConfig,
  monitoredRegions,
  serviceWeights,
  probeTimeoutMs,
} from './engine-config';
export type { EnvSource, LoadEngineConfigOptions } from './engine-config';

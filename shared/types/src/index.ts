/**
 * @regionguard/types
 *
 * Shared domain model, capability interfaces and error taxonomy.
 */

export * from './health';
export * from './failover';
export * from './capabilities';
export * from './errors';

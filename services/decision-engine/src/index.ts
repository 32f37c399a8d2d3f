/**
 * @regionguard/decision-engine
 *
 * Public API of the decision engine service. Importing this module starts
 * nothing; the runnable service is ./main.
 */

export { DecisionEngine } from './engine';
export type { DecisionEngineOptions } from './engine';
export { createEngineRuntime } from './wiring';
export type { EngineRuntime } from './wiring';
export { createApiApp } from './api';
export type { AlertRecord, CycleReport, EngineEvent, EngineListener, EngineStatus } from './types';

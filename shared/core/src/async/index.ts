/**
 * Async Module
 *
 * Timeout handling and bounded concurrent mapping for the probe round.
 *
 * @module async
 */

export { withTimeout, sleep, mapConcurrent } from './async-utils';

/**
 * @fileoverview Barrel export for all port interfaces.
 *
 * Ports define the capabilities that route modules can depend on.
 */

export type { SessionPort } from './session-port.js';

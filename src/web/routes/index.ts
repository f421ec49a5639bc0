/**
 * @fileoverview Barrel export for all route modules.
 */

export { registerSessionRoutes } from './session-routes.js';

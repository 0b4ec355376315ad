/**
 * Contract registry: aggregates all route contracts.
 */

export { riskRoutes } from './risk.js';
export { healthRoutes } from './health.js';

import { riskRoutes } from './risk.js';
import { healthRoutes } from './health.js';

/** The full contract registry. */
export const contract = {
  risk: riskRoutes,
  health: healthRoutes,
} as const;

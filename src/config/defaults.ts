/**
 * Default configuration values.
 * Plan-level values are overridable per plan in the library document.
 */

export const LIMITS = {
  MAX_EVENTS: 50,
  MAX_ROUTE_DEPTH: 15,
} as const;

export const PLAN_DEFAULTS = {
  TRIGGER_THRESHOLD: 2,
  STALE_AFTER_TURNS: 15,
  MAX_RETRIES: 0,
  PACE_LEVEL: 'contingent',
  ESCALATION_REASON: 'Plan escalated',
} as const;

export const SESSION_DEFAULTS = {
  PACE_LEVEL: 'primary',
  CONFIG_PATH: '.plangraph.yaml',
  LIBRARY_PATH: 'plans/library.yaml',
} as const;

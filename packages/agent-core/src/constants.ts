/**
 * Agent core constants: single source of truth for tunable values.
 *
 * Grouping:
 * - AGENT_CONFIG: run defaults
 * - AUTONOMOUS_CONFIG: defaults of the autonomous wrapper
 */

export const AGENT_CONFIG = {
  /**
   * Turn budget of runAgent when the caller gives none.
   */
  defaultMaxTurns: 10,

  /**
   * Tool mode sent with every request that enables tools.
   */
  toolMode: 'auto',
} as const;

export const AUTONOMOUS_CONFIG = {
  defaultModelId: 'gpt-4o-mini',

  /**
   * Smaller than AGENT_CONFIG.defaultMaxTurns: autonomous runs are unattended.
   */
  defaultMaxTurns: 6,
} as const;

export const ENV_KEYS = {
  modelId: 'LOOPWRIGHT_MODEL_ID',
  maxTurns: 'LOOPWRIGHT_MAX_TURNS',
} as const;

/**
 * Run defaults with environment overrides.
 */

import { AgentEnvSchema } from '@loopwright/agent-contracts';
import type { ILogger } from '@loopwright/agent-contracts';
import { AUTONOMOUS_CONFIG, ENV_KEYS } from './constants.js';

export interface AgentDefaults {
  modelId: string;
  maxTurns: number;
}

/**
 * Read LOOPWRIGHT_MODEL_ID and LOOPWRIGHT_MAX_TURNS.
 * Invalid values are reported and ignored; the built-in defaults apply.
 */
export function loadAgentDefaults(
  env: Record<string, string | undefined> = process.env,
  logger?: ILogger,
): AgentDefaults {
  const defaults: AgentDefaults = {
    modelId: AUTONOMOUS_CONFIG.defaultModelId,
    maxTurns: AUTONOMOUS_CONFIG.defaultMaxTurns,
  };

  const parsed = AgentEnvSchema.safeParse({
    [ENV_KEYS.modelId]: env[ENV_KEYS.modelId] || undefined,
    [ENV_KEYS.maxTurns]: env[ENV_KEYS.maxTurns] || undefined,
  });

  if (!parsed.success) {
    logger?.warn('Ignoring invalid agent environment overrides', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return defaults;
  }

  return {
    modelId: parsed.data.LOOPWRIGHT_MODEL_ID ?? defaults.modelId,
    maxTurns: parsed.data.LOOPWRIGHT_MAX_TURNS ?? defaults.maxTurns,
  };
}

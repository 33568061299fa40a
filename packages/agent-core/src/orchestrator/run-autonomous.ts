/**
 * Autonomous runs: runAgent with unattended defaults and a closing summary line.
 */

import type { AgentRunResult, ProgressCallback } from '@loopwright/agent-contracts';
import { AutonomousRunOptionsSchema, isFailedRun } from '@loopwright/agent-contracts';
import { loadAgentDefaults } from '../config.js';
import { AgentRunError } from '../errors.js';
import { countAssistantTurns } from '../history/conversation-history.js';
import { createLogger } from '../logger.js';
import { runAgent, type AgentDeps } from './conversation-orchestrator.js';

export interface AutonomousOptions {
  modelId?: string;
  maxTurns?: number;
  toolIds?: string[];
  systemPrompt?: string;
  progressCallback?: ProgressCallback;
  /** Source of LOOPWRIGHT_* overrides; defaults to process.env */
  env?: Record<string, string | undefined>;
}

const SUMMARY_LABELS: Record<string, string> = {
  'task-complete': 'COMPLETED successfully!',
  'max-turns-reached': 'reached max turns',
  'agent-finished': 'finished',
};

/**
 * One-line summary of a finished run.
 */
export function formatRunSummary(result: AgentRunResult): string {
  if (isFailedRun(result)) {
    return `❌ Model error: ${result.errorMessage}`;
  }
  const label = SUMMARY_LABELS[result.reason] ?? 'ended unexpectedly';
  const turns = countAssistantTurns(result.history);
  return `🎯 Agentic task ${label} (${turns} turns, ${result.history.length} conversation steps)`;
}

/**
 * Start an autonomous conversation toward a goal.
 *
 * Defaults: model and turn budget from LOOPWRIGHT_MODEL_ID / LOOPWRIGHT_MAX_TURNS,
 * else gpt-4o-mini and 6 turns; no tools.
 */
export async function runAutonomous(
  deps: AgentDeps,
  goal: string,
  options: AutonomousOptions = {},
): Promise<AgentRunResult> {
  const logger = deps.logger ?? createLogger({ name: 'agent' });
  const defaults = loadAgentDefaults(options.env ?? process.env, logger);

  const parsed = AutonomousRunOptionsSchema.safeParse({
    goal,
    modelId: options.modelId ?? defaults.modelId,
    maxTurns: options.maxTurns ?? defaults.maxTurns,
    toolIds: options.toolIds,
    systemPrompt: options.systemPrompt,
  });
  if (!parsed.success) {
    throw AgentRunError.invalidOptions(parsed.error);
  }

  const progress = options.progressCallback ?? ((step: string) => logger.info(step));
  const result = await runAgent({ ...deps, logger }, { ...parsed.data, progressCallback: progress });

  progress(formatRunSummary(result));
  return result;
}

/**
 * Picks the tools enabled for a run out of a capability's catalog.
 */

import type { ILogger, ToolInfo, ToolRequestOptions } from '@loopwright/agent-contracts';
import { AGENT_CONFIG } from '../constants.js';

/**
 * Enable only the tools named in `toolIds`, in catalog order.
 * Unknown ids are reported and skipped.
 */
export function selectTools(
  available: readonly ToolInfo[],
  toolIds: readonly string[],
  logger?: ILogger,
): ToolRequestOptions {
  const wanted = new Set(toolIds);
  const tools = available.filter((tool) => wanted.has(tool.name));

  const known = new Set(available.map((tool) => tool.name));
  const unknown = [...wanted].filter((id) => !known.has(id));
  if (unknown.length > 0) {
    logger?.warn('Requested tools are not available', { unknown });
  }

  return { tools, toolMode: AGENT_CONFIG.toolMode };
}

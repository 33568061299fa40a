/**
 * Tool types and interfaces
 */

import type { ToolInfo } from '@loopwright/agent-contracts';

/**
 * Tool executor function. Throw to fail the call; the error message is
 * what the model sees.
 */
export type ToolExecutor = (input: Record<string, unknown>) => Promise<unknown> | unknown;

/**
 * Tool registration
 */
export interface Tool {
  definition: ToolInfo;
  executor: ToolExecutor;
}

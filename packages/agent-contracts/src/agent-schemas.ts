/**
 * Zod Schemas for Run Option Validation
 *
 * Provides runtime validation for options coming from callers, tool input
 * produced by the model, and environment overrides.
 */

import { z } from 'zod';

/**
 * Options of a single agent run
 */
export const AgentRunOptionsSchema = z.object({
  goal: z.string().min(1),
  modelId: z.string().min(1),
  toolIds: z.array(z.string()).default([]),
  maxTurns: z.number().int().positive().default(10),
  systemPrompt: z.string().optional(),
});

/**
 * Options of an autonomous run (everything but the goal has a default)
 */
export const AutonomousRunOptionsSchema = z.object({
  goal: z.string().min(1),
  modelId: z.string().min(1).default('gpt-4o-mini'),
  toolIds: z.array(z.string()).default([]),
  maxTurns: z.number().int().positive().default(6),
  systemPrompt: z.string().optional(),
});

/**
 * Caller-supplied choice: a bare label or a labelled item
 */
export const QueryItemSchema = z.union([
  z.string(),
  z.object({
    label: z.string().min(1),
    description: z.string().optional(),
    detail: z.string().optional(),
  }),
]);

/**
 * Options of one human query
 */
export const HumanQueryOptionsSchema = z.object({
  question: z.string().min(1),
  context: z.string().default(''),
  items: z.array(QueryItemSchema),
  timeoutSeconds: z.number().positive(),
  canSelectMany: z.boolean().default(false),
});

/**
 * Input of the ask_human tool, as generated by the model
 */
export const AskHumanInputSchema = z.object({
  question: z.string().min(1),
  context: z.string().optional(),
  items: z.array(z.string()).default([]),
  timeoutSeconds: z.number().positive().max(600).default(60),
});

/**
 * Environment overrides for run defaults
 */
export const AgentEnvSchema = z.object({
  LOOPWRIGHT_MODEL_ID: z.string().min(1).optional(),
  LOOPWRIGHT_MAX_TURNS: z.coerce.number().int().positive().optional(),
});

// Type exports (inferred from schemas)
export type AgentRunOptionsInput = z.input<typeof AgentRunOptionsSchema>;
export type AgentRunOptions = z.output<typeof AgentRunOptionsSchema>;
export type AutonomousRunOptionsInput = z.input<typeof AutonomousRunOptionsSchema>;
export type AutonomousRunOptions = z.output<typeof AutonomousRunOptionsSchema>;
export type HumanQueryOptionsInput = z.input<typeof HumanQueryOptionsSchema>;
export type HumanQueryOptions = z.output<typeof HumanQueryOptionsSchema>;
export type AskHumanInput = z.output<typeof AskHumanInputSchema>;
export type AgentEnv = z.output<typeof AgentEnvSchema>;

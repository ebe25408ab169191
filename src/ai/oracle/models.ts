/**
 * Oracle Model Configuration
 *
 * Default model per task and provider. Environment variables take
 * precedence over these defaults.
 */

import type { OracleTask } from './types';

export type OracleProvider = 'openrouter' | 'openai';

/**
 * Environment variable names for each oracle task.
 * Set these env vars to override the default models.
 */
export const ORACLE_ENV_KEYS = {
  discover: 'AI_MODEL_DISCOVER',
  vote: 'AI_MODEL_VOTE',
  research: 'AI_MODEL_RESEARCH',
  write: 'AI_MODEL_WRITE',
  edit: 'AI_MODEL_EDIT',
} as const satisfies Record<OracleTask, string>;

/**
 * Default models for each task.
 *
 * Voting runs once per (voter, topic) pair, so it gets the cheaper model.
 */
export const ORACLE_DEFAULT_MODELS = {
  openrouter: {
    discover: 'deepseek/deepseek-v3.2',
    vote: 'deepseek/deepseek-v3.2',
    research: 'anthropic/claude-sonnet-4',
    write: 'anthropic/claude-sonnet-4',
    edit: 'anthropic/claude-sonnet-4',
  },
  openai: {
    discover: 'gpt-4o-mini',
    vote: 'gpt-4o-mini',
    research: 'gpt-4o',
    write: 'gpt-4o',
    edit: 'gpt-4o',
  },
} as const satisfies Record<OracleProvider, Record<OracleTask, string>>;

/**
 * Get the model for a task.
 * Checks explicit overrides, then the environment, then the provider default.
 *
 * @example
 * getModelId('openrouter', 'vote');
 * // Returns env var AI_MODEL_VOTE if set, otherwise 'deepseek/deepseek-v3.2'
 */
export function getModelId(
  provider: OracleProvider,
  task: OracleTask,
  overrides: Partial<Record<OracleTask, string>> = {},
  env: NodeJS.ProcessEnv = process.env
): string {
  return overrides[task] || env[ORACLE_ENV_KEYS[task]] || ORACLE_DEFAULT_MODELS[provider][task];
}

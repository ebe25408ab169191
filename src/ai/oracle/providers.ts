/**
 * Oracle Providers
 *
 * Resolves the provider once, at construction, into a function from task to
 * language model. Nothing downstream branches on the provider name.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import type { LanguageModel } from 'ai';

import { ConfigValidationError } from '../articles/config';
import { getModelId, type OracleProvider } from './models';
import type { OracleTask } from './types';

export type ModelResolver = (task: OracleTask) => LanguageModel;

export interface ProviderSettings {
  readonly provider: OracleProvider;
  readonly apiKey: string;
  /** Custom base URL for proxies */
  readonly baseURL?: string;
  /** Per-task model ids; env vars and provider defaults fill the rest */
  readonly models?: Partial<Record<OracleTask, string>>;
}

/**
 * Builds the task → model function for one provider.
 */
export function createModelResolver(settings: ProviderSettings, env: NodeJS.ProcessEnv = process.env): ModelResolver {
  const { provider, apiKey, baseURL, models = {} } = settings;

  switch (provider) {
    case 'openrouter': {
      const openrouter = createOpenRouter({ apiKey, ...(baseURL ? { baseURL } : {}) });
      return (task) => openrouter(getModelId('openrouter', task, models, env));
    }
    case 'openai': {
      const openai = createOpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) });
      return (task) => openai(getModelId('openai', task, models, env));
    }
  }
}

function isProvider(value: string): value is OracleProvider {
  return value === 'openrouter' || value === 'openai';
}

/**
 * Reads provider settings from the environment.
 *
 * AI_PROVIDER selects the provider (default: openrouter); the matching
 * OPENROUTER_API_KEY or OPENAI_API_KEY is required.
 */
export function resolveProviderSettings(env: NodeJS.ProcessEnv = process.env): ProviderSettings {
  const provider = (env.AI_PROVIDER ?? 'openrouter').toLowerCase();
  if (!isProvider(provider)) {
    throw new ConfigValidationError(`AI_PROVIDER must be "openrouter" or "openai" (got "${provider}")`);
  }

  const keyName = provider === 'openrouter' ? 'OPENROUTER_API_KEY' : 'OPENAI_API_KEY';
  const apiKey = env[keyName];
  if (!apiKey) {
    throw new ConfigValidationError(`${keyName} environment variable is required`);
  }

  const baseURL = provider === 'openrouter' ? env.OPENROUTER_BASE_URL : env.OPENAI_BASE_URL;
  return { provider, apiKey, ...(baseURL ? { baseURL } : {}) };
}

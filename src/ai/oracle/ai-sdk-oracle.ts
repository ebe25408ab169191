/**
 * AI SDK Oracle
 *
 * GenerationOracle backed by the Vercel AI SDK. Each call hands the request
 * schema to `generateObject`, so the SDK asks for structured output and
 * validates it. Failures are classified before they leave this module.
 */

import type { LanguageModel } from 'ai';
import type { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { classifyOracleError } from './classify';
import { createModelResolver, type ModelResolver, type ProviderSettings } from './providers';
import {
  MalformedResponseError,
  type GenerationOracle,
  type OracleRequest,
  type OracleResponse,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface AiSdkOracleDeps {
  readonly generateObject: typeof import('ai').generateObject;
  readonly resolveModel: ModelResolver;
  /** Per-call timeout; the call is aborted and classified transient after this */
  readonly timeoutMs: number;
  readonly logger?: Logger;
}

function describeModel(model: LanguageModel): string {
  return typeof model === 'string' ? model : model.modelId;
}

// ============================================================================
// Oracle
// ============================================================================

export class AiSdkOracle implements GenerationOracle {
  private readonly log: Logger;

  constructor(private readonly deps: AiSdkOracleDeps) {
    this.log = deps.logger ?? createPrefixedLogger('[Oracle]');
  }

  async generate<T>(request: OracleRequest<T>): Promise<OracleResponse<T>> {
    const model = this.deps.resolveModel(request.task);
    const modelId = describeModel(model);
    const startTime = Date.now();

    // The SDK validates against the same schema; parsing again recovers T
    const schema: z.ZodType<unknown> = request.schema;
    let object: unknown;
    try {
      const result = await this.deps.generateObject({
        model,
        output: 'object',
        schema,
        system: request.system,
        prompt: request.prompt,
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
        abortSignal: AbortSignal.timeout(this.deps.timeoutMs),
      });
      object = result.object;
    } catch (error) {
      const classified = classifyOracleError(error);
      this.log.warn(`${request.task} call to ${modelId} failed (${classified.kind}): ${classified.message}`);
      throw classified;
    }

    const parsed = request.schema.safeParse(object);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new MalformedResponseError(
        `${request.task} response did not match schema: ${issues.slice(0, 3).join('; ')}`,
        parsed.error,
        issues
      );
    }

    this.log.debug(`${request.task} call to ${modelId} completed in ${Date.now() - startTime}ms`);
    return { content: parsed.data, model: modelId };
  }
}

/**
 * Oracle for the configured provider, resolved once.
 *
 * @example
 * const oracle = createGenerationOracle(resolveProviderSettings(), { generateObject, timeoutMs: 90000 });
 */
export function createGenerationOracle(
  settings: ProviderSettings,
  deps: Omit<AiSdkOracleDeps, 'resolveModel'>
): GenerationOracle {
  return new AiSdkOracle({ ...deps, resolveModel: createModelResolver(settings) });
}

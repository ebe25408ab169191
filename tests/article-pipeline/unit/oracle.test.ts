import { JSONParseError, TypeValidationError } from 'ai';
import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';

import {
  AiSdkOracle,
  classifyOracleError,
  FatalOracleError,
  getModelId,
  getStatusCode,
  MalformedResponseError,
  resolveProviderSettings,
  TransientOracleError,
} from '../../../src/ai/oracle';
import { silentLogger } from '../../../src/utils/logger';

describe('classifyOracleError', () => {
  it('passes classified errors through unchanged', () => {
    const error = new TransientOracleError('rate limited');
    expect(classifyOracleError(error)).toBe(error);
  });

  it('treats 408, 429 and 5xx statuses as transient', () => {
    for (const status of [408, 429, 500, 503]) {
      const classified = classifyOracleError(Object.assign(new Error('boom'), { statusCode: status }));
      expect(classified).toBeInstanceOf(TransientOracleError);
      expect(classified.message).toBe(`Provider returned ${status}: boom`);
    }
  });

  it('treats auth and request errors as fatal', () => {
    const classified = classifyOracleError(Object.assign(new Error('invalid key'), { status: 401 }));
    expect(classified).toBeInstanceOf(FatalOracleError);
    expect(classified).toMatchObject({ reason: 'non-retryable', attempts: 1 });
  });

  it('treats timeouts as transient', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    expect(classifyOracleError(timeout)).toBeInstanceOf(TransientOracleError);
  });

  it('treats unparseable output as malformed', () => {
    expect(classifyOracleError(new Error('No object generated: could not parse the response'))).toBeInstanceOf(
      MalformedResponseError
    );
  });

  it('treats structured-output errors from the SDK as malformed', () => {
    const schema = z.object({ score: z.number().int() });
    const result = schema.safeParse({ score: 8.5 });
    if (result.success) throw new Error('expected a schema failure');

    const classified = classifyOracleError(new TypeValidationError({ value: { score: 8.5 }, cause: result.error }));

    expect(classified).toBeInstanceOf(MalformedResponseError);
    expect(classified instanceof MalformedResponseError && classified.issues).toEqual([
      'score: Expected integer, received float',
    ]);
    expect(classifyOracleError(new JSONParseError({ text: '{"score": 8', cause: new Error('eof') }))).toBeInstanceOf(
      MalformedResponseError
    );
  });

  it('matches transient message patterns', () => {
    expect(classifyOracleError(new Error('ECONNRESET'))).toBeInstanceOf(TransientOracleError);
    expect(classifyOracleError(new Error('Model is overloaded'))).toBeInstanceOf(TransientOracleError);
  });

  it('treats anything else as fatal', () => {
    expect(classifyOracleError('something odd')).toBeInstanceOf(FatalOracleError);
    expect(classifyOracleError(new Error('Unsupported parameter'))).toBeInstanceOf(FatalOracleError);
  });
});

describe('getStatusCode', () => {
  it('prefers statusCode over status', () => {
    expect(getStatusCode({ statusCode: 429, status: 500 })).toBe(429);
    expect(getStatusCode({ status: 503 })).toBe(503);
    expect(getStatusCode(new Error('no status'))).toBeUndefined();
    expect(getStatusCode(null)).toBeUndefined();
  });
});

describe('getModelId', () => {
  it('prefers overrides, then the environment, then the default', () => {
    expect(getModelId('openai', 'vote', { vote: 'override-model' }, {})).toBe('override-model');
    expect(getModelId('openai', 'vote', {}, { AI_MODEL_VOTE: 'env-model' })).toBe('env-model');
    expect(getModelId('openai', 'vote', {}, {})).toBe('gpt-4o-mini');
    expect(getModelId('openrouter', 'edit', {}, {})).toBe('anthropic/claude-sonnet-4');
  });
});

describe('resolveProviderSettings', () => {
  it('defaults to openrouter', () => {
    expect(resolveProviderSettings({ OPENROUTER_API_KEY: 'test-secret' })).toEqual({
      provider: 'openrouter',
      apiKey: 'test-secret',
    });
  });

  it('reads the matching key and base URL', () => {
    expect(
      resolveProviderSettings({
        AI_PROVIDER: 'OpenAI',
        OPENAI_API_KEY: 'test-secret',
        OPENAI_BASE_URL: 'https://proxy.test/v1',
      })
    ).toEqual({ provider: 'openai', apiKey: 'test-secret', baseURL: 'https://proxy.test/v1' });
  });

  it('rejects unknown providers and missing keys', () => {
    expect(() => resolveProviderSettings({ AI_PROVIDER: 'acme' })).toThrow(
      'AI_PROVIDER must be "openrouter" or "openai" (got "acme")'
    );
    expect(() => resolveProviderSettings({ AI_PROVIDER: 'openai' })).toThrow(
      'OPENAI_API_KEY environment variable is required'
    );
  });
});

describe('AiSdkOracle', () => {
  const schema = z.object({ score: z.number().int(), rationale: z.string() });

  function createOracle(generateObject: ReturnType<typeof vi.fn>) {
    const resolveModel = vi.fn().mockReturnValue('test-model');
    const oracle = new AiSdkOracle({ generateObject, resolveModel, timeoutMs: 1000, logger: silentLogger });
    return { oracle, resolveModel };
  }

  it('asks the SDK for an object matching the request schema', async () => {
    const generateObject = vi.fn().mockResolvedValue({ object: { score: 8, rationale: 'Strong' } });
    const { oracle, resolveModel } = createOracle(generateObject);

    const response = await oracle.generate({ task: 'vote', system: 'sys', prompt: 'p', schema, temperature: 0.3 });

    expect(response).toEqual({ content: { score: 8, rationale: 'Strong' }, model: 'test-model' });
    expect(resolveModel).toHaveBeenCalledWith('vote');
    expect(generateObject.mock.calls[0][0]).toMatchObject({
      model: 'test-model',
      output: 'object',
      schema,
      system: 'sys',
      prompt: 'p',
      temperature: 0.3,
    });
  });

  it('reports schema mismatches as malformed responses', async () => {
    const generateObject = vi.fn().mockResolvedValue({ object: { score: 8.5, rationale: 'Strong' } });
    const { oracle } = createOracle(generateObject);

    const error = await oracle
      .generate({ task: 'vote', system: 'sys', prompt: 'p', schema })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error instanceof MalformedResponseError && error.issues).toEqual(['score: Expected integer, received float']);
  });

  it('reports objects the SDK could not validate as malformed responses', async () => {
    const generateObject = vi
      .fn()
      .mockRejectedValue(new TypeValidationError({ value: { score: 'high' }, cause: new Error('bad score') }));
    const { oracle } = createOracle(generateObject);

    await expect(oracle.generate({ task: 'vote', system: 'sys', prompt: 'p', schema })).rejects.toBeInstanceOf(
      MalformedResponseError
    );
  });

  it('classifies provider failures', async () => {
    const generateObject = vi
      .fn()
      .mockRejectedValue(Object.assign(new Error('Too Many Requests'), { statusCode: 429 }));
    const { oracle } = createOracle(generateObject);

    await expect(oracle.generate({ task: 'research', system: 's', prompt: 'p', schema })).rejects.toBeInstanceOf(
      TransientOracleError
    );
  });
});

import { APIConnectionError, APIError } from 'openai';
import { OpenAiProvider } from './openai.provider';
import { ENRICHMENT_SYSTEM_INSTRUCTION } from '../interfaces/completion-service.interface';
import { CompletionConfig } from '../../config/enrichment.config';
import { CompletionProviderName } from '../../config/env.validation';
import { ServiceErrorKind } from '../../common/errors/service.error';

describe('OpenAiProvider', () => {
  const config: CompletionConfig = {
    provider: CompletionProviderName.GROQ,
    apiKey: 'test-secret',
    model: 'llama-test',
    baseUrl: 'https://api.groq.com/openai/v1',
    timeoutMs: 1000,
    temperature: 0.2,
  };

  let create: jest.Mock;
  let provider: OpenAiProvider;

  beforeEach(() => {
    create = jest.fn();
    provider = new OpenAiProvider(config, { create });
  });

  it('should be named after the configured provider', () => {
    expect(provider.name).toBe('groq');
  });

  it('should send a system and user message with the token budget', async () => {
    create.mockResolvedValue({
      choices: [{ message: { content: 'industry: AI' } }],
    });

    await expect(provider.complete('Describe Acme', 64)).resolves.toBe(
      'industry: AI',
    );
    expect(create).toHaveBeenCalledWith({
      model: 'llama-test',
      messages: [
        { role: 'system', content: ENRICHMENT_SYSTEM_INSTRUCTION },
        { role: 'user', content: 'Describe Acme' },
      ],
      max_tokens: 64,
      temperature: 0.2,
    });
  });

  it('should report HTTP 429 as rate limited', async () => {
    create.mockRejectedValue(
      new APIError(429, undefined, 'Rate limit reached', undefined),
    );

    await expect(provider.complete('Describe Acme', 64)).rejects.toMatchObject({
      kind: ServiceErrorKind.RATE_LIMITED,
      message: 'rate limited',
      statusCode: 429,
    });
  });

  it('should report HTTP 401 as an authentication failure', async () => {
    create.mockRejectedValue(
      new APIError(401, undefined, 'Invalid API Key', undefined),
    );

    await expect(provider.complete('Describe Acme', 64)).rejects.toMatchObject({
      kind: ServiceErrorKind.AUTHENTICATION,
    });
  });

  it('should report connection failures as network errors', async () => {
    create.mockRejectedValue(
      new APIConnectionError({ message: 'Connection error.' }),
    );

    await expect(provider.complete('Describe Acme', 64)).rejects.toMatchObject({
      kind: ServiceErrorKind.NETWORK,
      message: 'network error: Connection error.',
    });
  });

  it('should reject a reply without content', async () => {
    create.mockResolvedValue({ choices: [] });

    await expect(provider.complete('Describe Acme', 64)).rejects.toMatchObject({
      kind: ServiceErrorKind.MALFORMED_RESPONSE,
      message: 'malformed response: empty completion',
    });
  });

  it.each([
    [CompletionProviderName.GROQ, 'GROQ_API_KEY is not configured'],
    [CompletionProviderName.OPENAI, 'OPENAI_API_KEY is not configured'],
  ])(
    'should fail every %s call when no API key is configured',
    async (providerName, message) => {
      const unconfigured = new OpenAiProvider({
        ...config,
        provider: providerName,
        apiKey: undefined,
      });

      await expect(
        unconfigured.complete('Describe Acme', 64),
      ).rejects.toMatchObject({
        kind: ServiceErrorKind.AUTHENTICATION,
        message,
      });
    },
  );
});

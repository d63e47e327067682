import { Logger } from '@nestjs/common';
import OpenAI, { APIConnectionError, APIError } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import {
  CompletionService,
  ENRICHMENT_SYSTEM_INSTRUCTION,
} from '../interfaces/completion-service.interface';
import { CompletionConfig } from '../../config/enrichment.config';
import { CompletionProviderName } from '../../config/env.validation';
import { ServiceError } from '../../common/errors/service.error';

export interface ChatCompletionClient {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

/**
 * Chat-completions provider for OpenAI and OpenAI-compatible endpoints
 * such as Groq. The endpoint is selected through `baseUrl`.
 */
export class OpenAiProvider implements CompletionService {
  readonly name: string;
  private readonly logger = new Logger(OpenAiProvider.name);
  private readonly completions: ChatCompletionClient | null;
  private readonly apiKeyVariable: string;

  constructor(
    private readonly config: CompletionConfig,
    client?: ChatCompletionClient,
  ) {
    this.name = config.provider.toLowerCase();
    this.apiKeyVariable =
      config.provider === CompletionProviderName.GROQ
        ? 'GROQ_API_KEY'
        : 'OPENAI_API_KEY';

    if (client) {
      this.completions = client;
    } else if (config.apiKey) {
      const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        // One attempt per company; failures are recorded, not retried.
        maxRetries: 0,
      });
      this.completions = openai.chat.completions;
    } else {
      this.logger.warn(
        `${this.apiKeyVariable} is not set; every enrichment call will fail`,
      );
      this.completions = null;
    }
  }

  async complete(prompt: string, maxTokens: number): Promise<string> {
    if (!this.completions) {
      throw ServiceError.missingApiKey(this.apiKeyVariable);
    }

    let completion: ChatCompletion;
    try {
      completion = await this.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: ENRICHMENT_SYSTEM_INSTRUCTION },
          { role: 'user', content: prompt },
        ],
        max_tokens: maxTokens,
        temperature: this.config.temperature,
      });
    } catch (error: unknown) {
      throw this.toServiceError(error);
    }

    const content = completion.choices[0]?.message?.content;
    if (!content || !content.trim()) {
      throw ServiceError.malformed('empty completion');
    }
    return content;
  }

  private toServiceError(error: unknown): ServiceError {
    const tag = this.name.toUpperCase();
    if (error instanceof APIConnectionError) {
      this.logger.error(`${tag}_CONNECTION_ERROR: ${error.message}`);
      return ServiceError.network(error.message);
    }
    if (error instanceof APIError && error.status !== undefined) {
      this.logger.error(`${tag}_API_ERROR: ${error.message}`);
      return ServiceError.fromStatus(error.status);
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.logger.error(`${tag}_REQUEST_ERROR: ${errorMessage}`);
    return ServiceError.network(errorMessage);
  }
}

import { Logger } from '@nestjs/common';
import {
  GenerativeModel,
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import {
  CompletionService,
  ENRICHMENT_SYSTEM_INSTRUCTION,
} from '../interfaces/completion-service.interface';
import { CompletionConfig } from '../../config/enrichment.config';
import { ServiceError } from '../../common/errors/service.error';

export type GeminiModel = Pick<GenerativeModel, 'generateContent'>;

export class GeminiProvider implements CompletionService {
  readonly name = 'gemini';
  private readonly logger = new Logger(GeminiProvider.name);
  private readonly model: GeminiModel | null;

  constructor(
    private readonly config: CompletionConfig,
    model?: GeminiModel,
  ) {
    if (model) {
      this.model = model;
    } else if (config.apiKey) {
      const genAI = new GoogleGenerativeAI(config.apiKey);
      this.model = genAI.getGenerativeModel(
        {
          model: config.model,
          systemInstruction: ENRICHMENT_SYSTEM_INSTRUCTION,
        },
        { timeout: config.timeoutMs },
      );
    } else {
      this.logger.warn(
        'GEMINI_API_KEY is not set; every enrichment call will fail',
      );
      this.model = null;
    }
  }

  async complete(prompt: string, maxTokens: number): Promise<string> {
    if (!this.model) {
      throw ServiceError.missingApiKey('GEMINI_API_KEY');
    }

    let text: string;
    try {
      const result = await this.model.generateContent({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          maxOutputTokens: maxTokens,
          temperature: this.config.temperature,
        },
      });
      text = result.response.text();
    } catch (error: unknown) {
      throw this.toServiceError(error);
    }

    if (!text.trim()) {
      throw ServiceError.malformed('empty completion');
    }
    return text;
  }

  private toServiceError(error: unknown): ServiceError {
    if (error instanceof ServiceError) {
      return error;
    }
    if (error instanceof GoogleGenerativeAIFetchError && error.status) {
      this.logger.error(`GEMINI_FETCH_ERROR: ${error.message}`);
      return ServiceError.fromStatus(error.status);
    }
    if (error instanceof GoogleGenerativeAIResponseError) {
      return ServiceError.malformed(error.message);
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.logger.error(`GEMINI_REQUEST_ERROR: ${errorMessage}`);
    return ServiceError.network(errorMessage);
  }
}

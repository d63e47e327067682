import { ConfigService } from '@nestjs/config';
import {
  CompletionProviderName,
  EnvironmentVariables,
} from './env.validation';

export interface EnrichmentConfig {
  maxTokens: number;
  concurrency: number;
  requestDelayMs: number;
  maxCompanies: number;
}

export interface CompletionConfig {
  provider: CompletionProviderName;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
  temperature: number;
}

export const ENRICHMENT_CONFIG = 'ENRICHMENT_CONFIG';
export const COMPLETION_CONFIG = 'COMPLETION_CONFIG';

export function loadEnrichmentConfig(
  configService: ConfigService<EnvironmentVariables, true>,
): EnrichmentConfig {
  return {
    maxTokens: configService.get('ENRICHMENT_MAX_TOKENS', { infer: true }),
    concurrency: configService.get('ENRICHMENT_CONCURRENCY', { infer: true }),
    requestDelayMs: configService.get('ENRICHMENT_REQUEST_DELAY_MS', {
      infer: true,
    }),
    maxCompanies: configService.get('ENRICHMENT_MAX_COMPANIES', {
      infer: true,
    }),
  };
}

export function loadCompletionConfig(
  configService: ConfigService<EnvironmentVariables, true>,
): CompletionConfig {
  const provider = configService.get('COMPLETION_PROVIDER', { infer: true });
  const shared = {
    timeoutMs: configService.get('COMPLETION_TIMEOUT_MS', { infer: true }),
    temperature: configService.get('COMPLETION_TEMPERATURE', { infer: true }),
  };

  switch (provider) {
    case CompletionProviderName.GROQ:
      return {
        ...shared,
        provider,
        apiKey: configService.get('GROQ_API_KEY', { infer: true }),
        model: configService.get('GROQ_MODEL', { infer: true }),
        baseUrl: configService.get('GROQ_BASE_URL', { infer: true }),
      };
    case CompletionProviderName.OPENAI:
      return {
        ...shared,
        provider,
        apiKey: configService.get('OPENAI_API_KEY', { infer: true }),
        model: configService.get('OPENAI_MODEL', { infer: true }),
        baseUrl: configService.get('OPENAI_BASE_URL', { infer: true }),
      };
    case CompletionProviderName.GEMINI:
    default:
      return {
        ...shared,
        provider: CompletionProviderName.GEMINI,
        apiKey: configService.get('GEMINI_API_KEY', { infer: true }),
        model: configService.get('GEMINI_MODEL', { infer: true }),
      };
  }
}

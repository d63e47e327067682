import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { COMPLETION_SERVICE } from './interfaces/completion-service.interface';
import type { CompletionService } from './interfaces/completion-service.interface';
import { GeminiProvider } from './providers/gemini.provider';
import { OpenAiProvider } from './providers/openai.provider';
import {
  COMPLETION_CONFIG,
  CompletionConfig,
  loadCompletionConfig,
} from '../config/enrichment.config';
import { CompletionProviderName } from '../config/env.validation';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: COMPLETION_CONFIG,
      useFactory: loadCompletionConfig,
      inject: [ConfigService],
    },
    {
      provide: COMPLETION_SERVICE,
      useFactory: (config: CompletionConfig): CompletionService => {
        // Provider switch based on COMPLETION_PROVIDER
        switch (config.provider) {
          case CompletionProviderName.GROQ:
          case CompletionProviderName.OPENAI:
            return new OpenAiProvider(config);
          case CompletionProviderName.GEMINI:
          default:
            return new GeminiProvider(config);
        }
      },
      inject: [COMPLETION_CONFIG],
    },
  ],
  exports: [COMPLETION_SERVICE],
})
export class CompletionModule {}

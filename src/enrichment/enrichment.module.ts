import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { EnrichmentService } from './enrichment.service';
import { EnrichmentController } from './enrichment.controller';
import { CompletionModule } from '../completion/completion.module';
import { CsvModule } from '../csv/csv.module';
import { metricsProviders } from '../common/metrics.providers';
import { InputErrorFilter } from '../common/filters/input-error.filter';
import {
  ENRICHMENT_CONFIG,
  loadEnrichmentConfig,
} from '../config/enrichment.config';

@Module({
  imports: [ConfigModule, CompletionModule, CsvModule],
  controllers: [EnrichmentController],
  providers: [
    EnrichmentService,
    {
      provide: ENRICHMENT_CONFIG,
      useFactory: loadEnrichmentConfig,
      inject: [ConfigService],
    },
    {
      provide: APP_FILTER,
      useClass: InputErrorFilter,
    },
    ...metricsProviders,
  ],
  exports: [EnrichmentService],
})
export class EnrichmentModule {}

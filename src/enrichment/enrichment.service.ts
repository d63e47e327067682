import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import pLimit from 'p-limit';
import { setTimeout as sleep } from 'timers/promises';
import { COMPLETION_SERVICE } from '../completion/interfaces/completion-service.interface';
import type { CompletionService } from '../completion/interfaces/completion-service.interface';
import { ENRICHMENT_CONFIG } from '../config/enrichment.config';
import type { EnrichmentConfig } from '../config/enrichment.config';
import {
  COMPANIES_ENRICHED_TOTAL,
  COMPLETION_DURATION,
} from '../common/metrics.providers';
import { InputError } from '../common/errors/input.error';
import { ServiceError } from '../common/errors/service.error';
import {
  CompanyFields,
  EnrichmentRecord,
  EnrichmentStatus,
  EnrichmentSummary,
} from './interfaces/enrichment-record.interface';
import { buildEnrichmentPrompt } from './prompt.builder';
import {
  hasRecognizedFields,
  parseEnrichmentResponse,
  resolveCompanyFields,
} from './response.parser';

export const MAX_ERROR_MESSAGE_LENGTH = 200;

/**
 * Trims names and drops blank ones. Rejects a batch that is empty after
 * cleaning or larger than `maxCompanies`.
 */
export function normalizeCompanyNames(
  names: readonly string[],
  maxCompanies: number,
): string[] {
  const companies = names
    .map((name) => (typeof name === 'string' ? name.trim() : ''))
    .filter((name) => name.length > 0);

  if (companies.length === 0) {
    throw new InputError('No valid company names were provided');
  }
  if (companies.length > maxCompanies) {
    throw new InputError(
      `Too many companies: ${companies.length} provided, limit is ${maxCompanies}`,
    );
  }
  return companies;
}

export function summarizeRecords(
  records: readonly EnrichmentRecord[],
): EnrichmentSummary {
  const succeeded = records.filter(
    (record) => record.status === EnrichmentStatus.OK,
  ).length;
  const total = records.length;

  return {
    total,
    succeeded,
    failed: total - succeeded,
    successRate: total > 0 ? Math.round((succeeded / total) * 1000) / 10 : 0,
  };
}

@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);

  constructor(
    @Inject(COMPLETION_SERVICE)
    private readonly completionService: CompletionService,
    @Inject(ENRICHMENT_CONFIG) private readonly config: EnrichmentConfig,
    @InjectMetric(COMPANIES_ENRICHED_TOTAL)
    private readonly companiesCounter: Counter<string>,
    @InjectMetric(COMPLETION_DURATION)
    private readonly durationHistogram: Histogram<string>,
  ) {}

  /**
   * Enriches every company name, returning one record per non-blank name in
   * input order. Only input validation can reject; per-company failures are
   * recorded on the company's row.
   */
  async enrich(names: readonly string[]): Promise<EnrichmentRecord[]> {
    const companies = normalizeCompanyNames(names, this.config.maxCompanies);
    const limit = pLimit(this.config.concurrency);

    this.logger.log(
      `Enriching ${companies.length} companies via ${this.completionService.name} (concurrency ${this.config.concurrency})`,
    );

    // Promise.all keeps results keyed by input index, whatever order the calls settle in.
    const records = await Promise.all(
      companies.map((companyName, index) =>
        limit(async () => {
          this.logger.debug(
            `Processing ${index + 1}/${companies.length}: ${companyName}`,
          );
          const record = await this.enrichCompany(companyName);
          // Pause between calls, not after the last one.
          if (this.config.requestDelayMs > 0 && index < companies.length - 1) {
            await sleep(this.config.requestDelayMs);
          }
          return record;
        }),
      ),
    );

    const summary = summarizeRecords(records);
    this.logger.log(
      `Enrichment complete: ${summary.succeeded}/${summary.total} succeeded (${summary.successRate}%)`,
    );
    return records;
  }

  summarize(records: readonly EnrichmentRecord[]): EnrichmentSummary {
    return summarizeRecords(records);
  }

  /**
   * Enriches a single company. Never rejects.
   */
  async enrichCompany(companyName: string): Promise<EnrichmentRecord> {
    const stopTimer = this.durationHistogram.startTimer();

    try {
      const prompt = buildEnrichmentPrompt(companyName);
      const reply = await this.completionService.complete(
        prompt,
        this.config.maxTokens,
      );

      const parsed = parseEnrichmentResponse(reply);
      if (!hasRecognizedFields(parsed)) {
        throw ServiceError.malformed('no recognizable fields');
      }

      stopTimer({ status: 'ok' });
      this.companiesCounter.inc({ status: 'ok' });
      return this.successRecord(companyName, resolveCompanyFields(parsed));
    } catch (error: unknown) {
      stopTimer({ status: 'failed' });
      this.companiesCounter.inc({ status: 'failed' });

      const errorMessage = this.describeError(error);
      this.logger.warn(`Enrichment failed for ${companyName}: ${errorMessage}`);
      return this.failedRecord(companyName, errorMessage);
    }
  }

  private describeError(error: unknown): string {
    const message =
      error instanceof Error && error.message ? error.message : 'Unknown error';
    return message.slice(0, MAX_ERROR_MESSAGE_LENGTH);
  }

  private successRecord(
    companyName: string,
    fields: CompanyFields,
  ): EnrichmentRecord {
    return {
      company_name: companyName,
      ...fields,
      status: EnrichmentStatus.OK,
      error_message: '',
    };
  }

  private failedRecord(
    companyName: string,
    errorMessage: string,
  ): EnrichmentRecord {
    return {
      company_name: companyName,
      website: '',
      industry: '',
      company_size: '',
      hq_location: '',
      status: EnrichmentStatus.FAILED,
      error_message: errorMessage,
    };
  }
}

import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const COMPANIES_ENRICHED_TOTAL = 'companies_enriched_total';
export const COMPLETION_DURATION = 'completion_duration_seconds';

export const metricsProviders = [
  makeCounterProvider({
    name: COMPANIES_ENRICHED_TOTAL,
    help: 'Total number of companies processed by the enrichment engine',
    labelNames: ['status'],
  }),
  makeHistogramProvider({
    name: COMPLETION_DURATION,
    help: 'Duration of completion calls in seconds',
    labelNames: ['status'],
    buckets: [0.1, 0.5, 1, 2, 5, 10, 20],
  }),
];

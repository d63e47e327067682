export enum EnrichmentStatus {
  OK = 'Ok',
  FAILED = 'Failed',
}

export const COMPANY_FIELDS = [
  'website',
  'industry',
  'company_size',
  'hq_location',
] as const;

export type CompanyField = (typeof COMPANY_FIELDS)[number];

export type CompanyFields = Record<CompanyField, string>;

export interface EnrichmentRecord extends Readonly<CompanyFields> {
  readonly company_name: string;
  readonly status: EnrichmentStatus;
  readonly error_message: string;
}

export interface EnrichmentSummary {
  total: number;
  succeeded: number;
  failed: number;
  successRate: number; // Percentage, one decimal place
}

export interface EnrichmentResult {
  records: EnrichmentRecord[];
  summary: EnrichmentSummary;
}

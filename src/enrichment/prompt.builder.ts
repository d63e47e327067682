import { COMPANY_FIELDS, CompanyField } from './interfaces/enrichment-record.interface';

export const EMPLOYEE_BUCKETS = [
  '1-10',
  '11-50',
  '51-200',
  '201-500',
  '501-1000',
  '1001-5000',
  '5001-10000',
  '10000+',
];

export const UNKNOWN_ANSWER = 'unknown';

export const FIELD_INSTRUCTIONS: Record<CompanyField, string> = {
  website: 'primary website domain, e.g. example.com',
  industry: 'primary industry sector in one to three words',
  company_size: `employee count, one of: ${EMPLOYEE_BUCKETS.join(', ')}`,
  hq_location: 'headquarters city and country',
};

/**
 * Builds the completion prompt for one company. Deterministic: the same name
 * always yields the same prompt. The requested keys are exactly the ones the
 * response parser looks for.
 */
export function buildEnrichmentPrompt(companyName: string): string {
  const name = companyName.replace(/\s+/g, ' ').trim();
  const layout = COMPANY_FIELDS.map(
    (field) => `${field}: <${FIELD_INSTRUCTIONS[field]}>`,
  ).join('\n');

  return [
    'Provide firmographic details for the company named below.',
    '',
    `Company: ${name}`,
    '',
    'Respond with exactly these four lines and nothing else:',
    layout,
    '',
    `If you are not confident about a value, write "${UNKNOWN_ANSWER}" for that field instead of guessing.`,
  ].join('\n');
}

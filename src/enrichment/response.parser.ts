import { z } from 'zod';
import {
  COMPANY_FIELDS,
  CompanyField,
  CompanyFields,
} from './interfaces/enrichment-record.interface';
import { FIELD_INSTRUCTIONS } from './prompt.builder';

/**
 * How one requested field was found in a completion reply.
 *
 * - `absent`: no line or key for the field
 * - `empty`: the key is there with nothing after it
 * - `unknown`: the model answered with a placeholder ("unknown", "n/a", ...)
 * - `value`: a usable answer
 */
export type FieldResolution =
  | { state: 'absent' }
  | { state: 'empty' }
  | { state: 'unknown'; placeholder: string }
  | { state: 'value'; value: string };

export type ParsedCompanyResponse = Record<CompanyField, FieldResolution>;

export const MAX_FIELD_LENGTH = 500;

const FIELD_ALIASES: Record<CompanyField, readonly string[]> = {
  website: [
    'website',
    'web_site',
    'company_website',
    'website_url',
    'url',
    'domain',
    'homepage',
  ],
  industry: ['industry', 'sector', 'industry_sector', 'primary_industry'],
  company_size: [
    'company_size',
    'size',
    'employees',
    'employee_count',
    'employee_size',
    'number_of_employees',
    'headcount',
  ],
  hq_location: [
    'hq_location',
    'hq',
    'headquarters',
    'headquarters_location',
    'head_office',
    'location',
  ],
};

const ALIAS_LOOKUP = new Map<string, CompanyField>(
  COMPANY_FIELDS.flatMap((field) =>
    FIELD_ALIASES[field].map((alias): [string, CompanyField] => [alias, field]),
  ),
);

const PLACEHOLDERS = new Set([
  'unknown',
  'n/a',
  'na',
  'none',
  'null',
  'undefined',
  'unavailable',
  'not found',
  'not available',
  'not known',
  'not specified',
  'not applicable',
  'not disclosed',
  '-',
  '--',
  '?',
]);

// "Unknown (private company)", "Not publicly available"
const PLACEHOLDER_PREFIX =
  /^(?:unknown|not (?:found|available|known|specified|disclosed|publicly))\b/;

// Template slots from the prompt, echoed back instead of answered
const TEMPLATE_SLOT = /^<[^<>]*>$/;
const TEMPLATE_INSTRUCTIONS = new Set(
  Object.values(FIELD_INSTRUCTIONS).map((text) => text.toLowerCase()),
);

const STRUCTURED_VALUE = /^[[{]/;

const KEY_VALUE_LINE =
  /^["'`]?([A-Za-z][A-Za-z0-9 _-]{0,40}?)["'`]?\s*[:=]\s*(.*)$/;

const JsonReplySchema = z.record(z.string(), z.unknown());

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function stripLineDecorations(line: string): string {
  return line
    .replace(/\*\*/g, '')
    .replace(/^\s*(?:[-*•>#]+|\d+[.)])\s*/, '')
    .trim();
}

function cleanValue(raw: string): string {
  return raw
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^["'`]+/, '')
    .replace(/["'`]*,?$/, '')
    .trim()
    .slice(0, MAX_FIELD_LENGTH);
}

/**
 * Flattens a JSON value into field text: string arrays become
 * "Retail, E-commerce", objects such as `{city, country}` become
 * "Austin, USA". Booleans have no field text and give undefined.
 */
function flattenJsonValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (value === null) return '';
  if (typeof value !== 'object') return undefined;

  const parts = Object.values(value)
    .map(flattenJsonValue)
    .filter((part): part is string => part !== undefined && part.trim() !== '');
  return parts.join(', ');
}

function resolveStructuredValue(value: string): FieldResolution {
  let candidate: unknown;
  try {
    candidate = JSON.parse(value);
  } catch {
    // Truncated or multi-line structure; only its opening survived the line scan.
    return { state: 'unknown', placeholder: value };
  }

  const flattened = flattenJsonValue(candidate);
  if (flattened === undefined || STRUCTURED_VALUE.test(flattened.trim())) {
    return { state: 'unknown', placeholder: value };
  }
  return resolveValue(flattened);
}

export function resolveValue(raw: string): FieldResolution {
  const value = cleanValue(raw);
  if (!value) {
    return { state: 'empty' };
  }
  if (STRUCTURED_VALUE.test(value)) {
    return resolveStructuredValue(value);
  }

  const normalized = value.toLowerCase().replace(/[.!]+$/, '').trim();
  if (
    PLACEHOLDERS.has(normalized) ||
    PLACEHOLDER_PREFIX.test(normalized) ||
    TEMPLATE_SLOT.test(value) ||
    TEMPLATE_INSTRUCTIONS.has(value.toLowerCase())
  ) {
    return { state: 'unknown', placeholder: value };
  }
  return { state: 'value', value };
}

function emptyResponse(): ParsedCompanyResponse {
  return {
    website: { state: 'absent' },
    industry: { state: 'absent' },
    company_size: { state: 'absent' },
    hq_location: { state: 'absent' },
  };
}

function assign(
  parsed: ParsedCompanyResponse,
  key: string,
  resolution: () => FieldResolution,
): void {
  const field = ALIAS_LOOKUP.get(normalizeKey(key));
  // First occurrence wins
  if (field && parsed[field].state === 'absent') {
    parsed[field] = resolution();
  }
}

function readJsonObject(text: string, parsed: ParsedCompanyResponse): void {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return;

  let candidate: unknown;
  try {
    candidate = JSON.parse(jsonMatch[0]);
  } catch {
    // Not JSON after all; the line scan below still sees the text.
    return;
  }

  const result = JsonReplySchema.safeParse(candidate);
  if (!result.success) return;

  // Every field key in the object is settled here, so the line scan never
  // reads the raw source text of a nested value.
  for (const [key, value] of Object.entries(result.data)) {
    assign(parsed, key, () => {
      const flattened = flattenJsonValue(value);
      return flattened === undefined
        ? { state: 'unknown', placeholder: String(value) }
        : resolveValue(flattened);
    });
  }
}

/**
 * Parses a completion reply into the four company fields. Accepts the
 * requested `key: value` layout in any order, along with the usual model
 * drift: bullets, bold markers, code fences, aliased keys and JSON objects.
 * Never throws.
 */
export function parseEnrichmentResponse(text: string): ParsedCompanyResponse {
  const parsed = emptyResponse();
  if (!text) {
    return parsed;
  }

  readJsonObject(text, parsed);

  for (const rawLine of text.split(/\r?\n/)) {
    const line = stripLineDecorations(rawLine);
    const match = KEY_VALUE_LINE.exec(line);
    if (!match) continue;

    const [, key, value] = match;
    assign(parsed, key, () => resolveValue(value));
  }

  return parsed;
}

export function hasRecognizedFields(parsed: ParsedCompanyResponse): boolean {
  return COMPANY_FIELDS.some((field) => parsed[field].state !== 'absent');
}

export function resolveCompanyFields(
  parsed: ParsedCompanyResponse,
): CompanyFields {
  const fields: CompanyFields = {
    website: '',
    industry: '',
    company_size: '',
    hq_location: '',
  };
  for (const field of COMPANY_FIELDS) {
    const resolution = parsed[field];
    if (resolution.state === 'value') {
      fields[field] = resolution.value;
    }
  }
  return fields;
}

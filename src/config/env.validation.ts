import { z } from 'zod';

export enum CompletionProviderName {
  GEMINI = 'GEMINI',
  GROQ = 'GROQ',
  OPENAI = 'OPENAI',
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const EnvironmentSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  COMPLETION_PROVIDER: z
    .string()
    .default(CompletionProviderName.GEMINI)
    .transform((value) => value.toUpperCase())
    .pipe(z.nativeEnum(CompletionProviderName)),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  COMPLETION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),

  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: z.string().default('llama-3.1-8b-instant'),
  GROQ_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),

  ENRICHMENT_MAX_TOKENS: z.coerce.number().int().min(16).max(4096).default(256),
  ENRICHMENT_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  ENRICHMENT_REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(0),
  ENRICHMENT_MAX_COMPANIES: z.coerce.number().int().positive().default(500),
});

export type EnvironmentVariables = z.infer<typeof EnvironmentSchema>;

/**
 * Validates and coerces `process.env` for `ConfigModule.forRoot({ validate })`.
 * Throws at bootstrap with every offending variable listed.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const result = EnvironmentSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

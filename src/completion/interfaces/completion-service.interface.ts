/**
 * Opaque text-completion capability consumed by the enrichment engine.
 * Implementations reject with `ServiceError` on any failure.
 */
export interface CompletionService {
  readonly name: string;
  complete(prompt: string, maxTokens: number): Promise<string>;
}

export const COMPLETION_SERVICE = 'COMPLETION_SERVICE';

export const ENRICHMENT_SYSTEM_INSTRUCTION =
  'You are a business research assistant. You answer with short factual ' +
  'values in the exact "key: value" layout requested, and you write ' +
  '"unknown" for anything you are not confident about.';

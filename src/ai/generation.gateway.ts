import type { PromptMessage } from './schemas';

export const GENERATION_GATEWAY = Symbol('GENERATION_GATEWAY');

export type GenerateOptions = {
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
};

/**
 * Opaque LLM call. Throws `GenerationError` (or its timeout / rate-limit
 * subclasses) on any provider failure.
 */
export interface GenerationGateway {
  generate(messages: PromptMessage[], options: GenerateOptions): Promise<string>;
}

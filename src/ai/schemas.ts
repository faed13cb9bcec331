import { z } from 'zod';

// Titan text embeddings v1/v2 response body
export const TitanEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number().finite()).min(1),
  inputTextTokenCount: z.number().optional(),
});

export type PromptRole = 'system' | 'user' | 'assistant';

export type PromptMessage = {
  role: PromptRole;
  content: string;
};

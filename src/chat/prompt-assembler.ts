import type { PromptMessage } from '../ai/schemas';
import { excerpt } from '../rag/rag.service';
import type { SearchResult } from '../rag/rag.types';
import { ticketSummary } from '../tickets/ticket-format';
import type { TicketRecord } from '../tickets/ticket.types';
import type { Message } from './chat.types';

export const SUPPORT_SYSTEM_DIRECTIVE = `
You are a helpful and professional customer support agent. Your role is to:

1. Listen to customer issues and concerns
2. Use the knowledge base information provided to you
3. Use the ticket information if provided
4. Give clear, accurate and helpful answers
5. Be empathetic and professional
6. Offer solutions, or escalation when needed

When responding:
- Be concise but thorough
- Cite knowledge base sources as [Source N] when you rely on them
- Keep the context of the conversation
- If you don't know something, say so and offer to help find the answer
`.trim();

export const KB_EXCERPT_LENGTH = 500;

export type AssembleInput = {
  systemDirective: string;
  ticket: TicketRecord | null;
  results: readonly SearchResult[];
  history: readonly Message[];
  userMessage: string;
  /** how many of the most recent history messages to keep */
  historyLimit: number;
};

export function ticketBlock(ticket: TicketRecord): string {
  return `Ticket Information:\n${ticketSummary(ticket)}`;
}

export function knowledgeBaseBlock(results: readonly SearchResult[]): string {
  const entries = results.map(({ chunk, score }, i) =>
    [
      `[Source ${i + 1}] ${chunk.sourceDocument} (Page ${chunk.pageNumber})`,
      `Relevance: ${(score * 100).toFixed(1)}%`,
      `Content: ${excerpt(chunk.text, KB_EXCERPT_LENGTH)}`,
    ].join('\n'),
  );
  return `Relevant Information from Knowledge Base:\n\n${entries.join('\n\n')}`;
}

/**
 * Order is fixed: directive, ticket, knowledge base, history (oldest first),
 * current message. Blocks with nothing to say are left out entirely.
 */
export function assemblePrompt(input: AssembleInput): PromptMessage[] {
  const out: PromptMessage[] = [
    { role: 'system', content: input.systemDirective },
  ];

  if (input.ticket) {
    out.push({ role: 'system', content: ticketBlock(input.ticket) });
  }
  if (input.results.length) {
    out.push({ role: 'system', content: knowledgeBaseBlock(input.results) });
  }

  const limit = Math.max(0, input.historyLimit);
  const recent = limit ? input.history.slice(-limit) : [];
  for (const m of recent) {
    out.push({ role: m.role, content: m.text });
  }

  out.push({ role: 'user', content: input.userMessage });
  return out;
}

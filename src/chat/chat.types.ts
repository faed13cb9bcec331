import type { Citation } from '../rag/rag.types';
import type { TicketRecord } from '../tickets/ticket.types';

export type MessageRole = 'user' | 'assistant';

export type Message = Readonly<{
  role: MessageRole;
  text: string;
  timestamp: string;
  /** set on the fallback reply of a turn whose generation failed */
  failed?: boolean;
}>;

export type Conversation = {
  id: string;
  customerName: string;
  ticketId: string | null;
  messages: Message[];
  createdAt: string;
  updatedAt: string;
};

export type ConversationSummary = {
  id: string;
  customerName: string;
  ticketId: string | null;
  messageCount: number;
  createdAt: string;
  updatedAt: string;
};

export type ChatReply = {
  conversationId: string;
  reply: string;
  sources: Citation[];
  ticket: TicketRecord | null;
  /** true when the reply is the fixed fallback */
  degraded: boolean;
  conversationLength: number;
};

import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  GENERATION_GATEWAY,
  type GenerationGateway,
} from '../ai/generation.gateway';
import {
  InvalidArgumentError,
  NotFoundError,
  RequestTimeoutError,
} from '../common/errors';
import { FailureRecorder } from '../common/failure-recorder.service';
import { KeyedMutex, abortable } from '../common/keyed-mutex';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { RagService } from '../rag/rag.service';
import type { SearchResult } from '../rag/rag.types';
import { TICKET_PROVIDER, type TicketProvider } from '../tickets/ticket-provider';
import type { TicketRecord } from '../tickets/ticket.types';
import type {
  ChatReply,
  Conversation,
  ConversationSummary,
  Message,
} from './chat.types';
import { ConversationStore } from './conversation-store.service';
import { SUPPORT_SYSTEM_DIRECTIVE, assemblePrompt } from './prompt-assembler';

export const FALLBACK_REPLY =
  'I apologize, but I encountered an error processing your request. Please try again.';

export function greetingFor(
  conversation: Pick<Conversation, 'customerName' | 'ticketId'>,
): string {
  const greeting = `Hello ${conversation.customerName}! I'm your AI support agent. How can I help you today?`;
  return conversation.ticketId
    ? `${greeting} I see you have ticket ${conversation.ticketId} associated with this chat.`
    : greeting;
}

export type HandleMessageOptions = {
  /** bounds the whole call, including the wait for the conversation lock */
  timeoutMs?: number;
};

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly turns = new KeyedMutex();

  constructor(
    private readonly conversations: ConversationStore,
    private readonly rag: RagService,
    @Inject(TICKET_PROVIDER) private readonly tickets: TicketProvider,
    @Inject(GENERATION_GATEWAY) private readonly llm: GenerationGateway,
    private readonly failures: FailureRecorder,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  createConversation(customerName: string, ticketId?: string | null): Conversation {
    return this.conversations.create(customerName, ticketId);
  }

  getConversation(conversationId: string): Conversation {
    return this.conversations.get(conversationId);
  }

  getHistory(conversationId: string): Message[] {
    return this.conversations.getHistory(conversationId);
  }

  /** Waits for the turn in flight on this conversation, then empties it. */
  async clearConversation(conversationId: string): Promise<void> {
    await this.turns.runExclusive(conversationId, async () =>
      this.conversations.clear(conversationId),
    );
  }

  async deleteConversation(conversationId: string): Promise<void> {
    await this.turns.runExclusive(conversationId, async () =>
      this.conversations.delete(conversationId),
    );
  }

  listConversations(): ConversationSummary[] {
    return this.conversations.listAll();
  }

  async handleMessage(
    conversationId: string,
    userMessage: string,
    options: HandleMessageOptions = {},
  ): Promise<ChatReply> {
    if (typeof userMessage !== 'string' || !userMessage.trim()) {
      throw new InvalidArgumentError('message', 'must be non-empty');
    }
    const timeoutMs =
      options.timeoutMs ?? this.config.conversations.requestTimeoutMs;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidArgumentError('timeoutMs', 'must be a positive integer');
    }
    if (!this.conversations.has(conversationId)) {
      throw new NotFoundError('conversation', conversationId);
    }

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new RequestTimeoutError(timeoutMs)),
      timeoutMs,
    );

    try {
      return await this.turns.runExclusive(
        conversationId,
        () => this.runTurn(conversationId, userMessage, controller.signal),
        controller.signal,
      );
    } catch (e) {
      if (controller.signal.aborted) {
        this.failures.record('timeout', { conversationId, timeoutMs });
        controller.signal.throwIfAborted();
      }
      throw e;
    } finally {
      clearTimeout(timer);
    }
  }

  private async runTurn(
    conversationId: string,
    userMessage: string,
    signal: AbortSignal,
  ): Promise<ChatReply> {
    const conversation = this.conversations.get(conversationId);
    const priorHistory = conversation.messages;

    this.conversations.appendMessage(conversationId, 'user', userMessage);

    const results = await this.retrieve(conversationId, userMessage, signal);
    signal.throwIfAborted();

    const ticket = conversation.ticketId
      ? await this.lookupTicket(conversationId, conversation.ticketId, signal)
      : null;
    signal.throwIfAborted();

    const prompt = assemblePrompt({
      systemDirective: SUPPORT_SYSTEM_DIRECTIVE,
      ticket,
      results,
      history: priorHistory,
      userMessage,
      historyLimit: this.config.conversations.promptHistoryLimit,
    });

    let reply: string;
    let degraded = false;
    try {
      reply = await abortable(
        this.llm.generate(prompt, {
          temperature: this.config.generation.temperature,
          maxTokens: this.config.generation.maxTokens,
          signal,
        }),
        signal,
      );
    } catch (e) {
      signal.throwIfAborted();
      this.failures.record('generation', { conversationId, error: e });
      reply = FALLBACK_REPLY;
      degraded = true;
    }
    signal.throwIfAborted();

    this.conversations.appendMessage(conversationId, 'assistant', reply, {
      failed: degraded,
    });

    this.logger.log(
      `Turn done for ${conversationId}: ${results.length} sources, ticket=${ticket?.id ?? 'none'}, degraded=${degraded}`,
    );

    return {
      conversationId,
      reply,
      sources: this.rag.toCitations(results),
      ticket,
      degraded,
      conversationLength: this.conversations.getHistory(conversationId).length,
    };
  }

  // best effort: a failed search means an answer without KB context
  private async retrieve(
    conversationId: string,
    query: string,
    signal: AbortSignal,
  ): Promise<SearchResult[]> {
    try {
      return await abortable(
        this.rag.search(query, this.rag.defaultK, signal),
        signal,
      );
    } catch (e) {
      signal.throwIfAborted();
      this.failures.record('retrieval', { conversationId, error: e });
      return [];
    }
  }

  private async lookupTicket(
    conversationId: string,
    ticketId: string,
    signal: AbortSignal,
  ): Promise<TicketRecord | null> {
    try {
      return await abortable(this.tickets.getTicket(ticketId), signal);
    } catch (e) {
      signal.throwIfAborted();
      this.failures.record('ticket_lookup', {
        conversationId,
        ticketId,
        error: e,
      });
      return null;
    }
  }
}

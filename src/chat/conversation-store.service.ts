import { randomUUID } from 'node:crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';

import { InvalidArgumentError, NotFoundError } from '../common/errors';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type {
  Conversation,
  ConversationSummary,
  Message,
  MessageRole,
} from './chat.types';

/**
 * Conversations keyed by id. Every read hands out copies; the only way to
 * change a conversation is through the methods below.
 */
@Injectable()
export class ConversationStore {
  private readonly logger = new Logger(ConversationStore.name);
  private readonly conversations = new Map<string, Conversation>();
  private lastTimestampMs = 0;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  get maxHistory() {
    return this.config.conversations.maxHistory;
  }

  create(customerName: string, ticketId?: string | null): Conversation {
    const name = customerName?.trim();
    if (!name) {
      throw new InvalidArgumentError('customerName', 'must be non-empty');
    }

    const now = this.nextTimestamp();
    const conversation: Conversation = {
      id: randomUUID(),
      customerName: name,
      ticketId: ticketId?.trim() || null,
      messages: [],
      createdAt: now,
      updatedAt: now,
    };
    this.conversations.set(conversation.id, conversation);
    this.logger.log(
      `Created conversation ${conversation.id} for ${name}` +
        (conversation.ticketId ? ` (ticket ${conversation.ticketId})` : ''),
    );
    return copy(conversation);
  }

  get(id: string): Conversation {
    return copy(this.require(id));
  }

  has(id: string): boolean {
    return this.conversations.has(id);
  }

  appendMessage(
    id: string,
    role: MessageRole,
    text: string,
    options: { failed?: boolean } = {},
  ): Message {
    const conversation = this.require(id);
    const message: Message = Object.freeze({
      role,
      text,
      timestamp: this.nextTimestamp(),
      ...(options.failed ? { failed: true } : {}),
    });

    conversation.messages.push(message);
    const overflow = conversation.messages.length - this.maxHistory;
    if (overflow > 0) conversation.messages.splice(0, overflow);
    conversation.updatedAt = message.timestamp;
    return message;
  }

  getHistory(id: string): Message[] {
    return [...this.require(id).messages];
  }

  clear(id: string): void {
    const conversation = this.require(id);
    conversation.messages = [];
    conversation.updatedAt = this.nextTimestamp();
    this.logger.log(`Cleared history of conversation ${id}`);
  }

  delete(id: string): void {
    this.require(id);
    this.conversations.delete(id);
    this.logger.log(`Deleted conversation ${id}`);
  }

  listAll(): ConversationSummary[] {
    return [...this.conversations.values()]
      .map((c) => ({
        id: c.id,
        customerName: c.customerName,
        ticketId: c.ticketId,
        messageCount: c.messages.length,
        createdAt: c.createdAt,
        updatedAt: c.updatedAt,
      }))
      .reverse();
  }

  private require(id: string): Conversation {
    const conversation = this.conversations.get(id);
    if (!conversation) throw new NotFoundError('conversation', id);
    return conversation;
  }

  // wall clock, but never earlier than the previous stamp
  private nextTimestamp(): string {
    this.lastTimestampMs = Math.max(Date.now(), this.lastTimestampMs);
    return new Date(this.lastTimestampMs).toISOString();
  }
}

function copy(c: Conversation): Conversation {
  return { ...c, messages: [...c.messages] };
}

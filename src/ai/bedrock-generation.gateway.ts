import { Logger } from '@nestjs/common';
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  type BaseMessage,
  type MessageContent,
} from '@langchain/core/messages';

import {
  GenerationError,
  GenerationRateLimitError,
  GenerationTimeoutError,
  errorMessage,
} from '../common/errors';
import type { GenerateOptions, GenerationGateway } from './generation.gateway';
import type { ModelSettings } from './langchain.service';
import type { PromptMessage } from './schemas';

export interface ChatModelLike {
  invoke(
    input: BaseMessage[],
    options?: { signal?: AbortSignal },
  ): Promise<{ content: MessageContent }>;
}

export interface ChatModelSource {
  model(settings: ModelSettings): ChatModelLike;
}

/**
 * Generation through a LangChain chat model (Bedrock Converse in production).
 */
export class BedrockGenerationGateway implements GenerationGateway {
  private readonly logger = new Logger(BedrockGenerationGateway.name);

  constructor(private readonly models: ChatModelSource) {}

  async generate(
    messages: PromptMessage[],
    options: GenerateOptions,
  ): Promise<string> {
    const llm = this.models.model({
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    });

    let content: MessageContent;
    try {
      const res = await llm.invoke(toLangchainMessages(messages), {
        signal: options.signal,
      });
      content = res.content;
    } catch (e) {
      this.logger.warn(`Converse call failed: ${errorMessage(e)}`);
      throw classifyGenerationError(e, options.signal);
    }

    const text = contentText(content).trim();
    if (!text) throw new GenerationError('Model returned an empty completion');
    return text;
  }
}

/**
 * Converse wants one system block and strictly alternating user/assistant
 * turns that open with a user turn, so system entries are joined, leading
 * assistant turns dropped and same-role neighbours merged.
 */
export function toLangchainMessages(messages: PromptMessage[]): BaseMessage[] {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');

  const turns: { role: 'user' | 'assistant'; content: string }[] = [];
  for (const m of messages) {
    if (m.role === 'system') continue;
    if (!turns.length && m.role === 'assistant') continue;
    const last = turns[turns.length - 1];
    if (last && last.role === m.role) {
      last.content = `${last.content}\n\n${m.content}`;
    } else {
      turns.push({ role: m.role, content: m.content });
    }
  }

  const out: BaseMessage[] = [];
  if (system) out.push(new SystemMessage(system));
  for (const t of turns) {
    out.push(
      t.role === 'user' ? new HumanMessage(t.content) : new AIMessage(t.content),
    );
  }
  return out;
}

export function contentText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((block) =>
      block.type === 'text' && 'text' in block && typeof block.text === 'string'
        ? block.text
        : '',
    )
    .join('');
}

export function classifyGenerationError(
  e: unknown,
  signal?: AbortSignal,
): GenerationError {
  const name = e instanceof Error ? e.name : '';
  const message = errorMessage(e);

  if (
    signal?.aborted ||
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    /timed?\s?out/i.test(message)
  ) {
    return new GenerationTimeoutError(`Generation timed out: ${message}`, {
      cause: e,
    });
  }
  if (
    name === 'ThrottlingException' ||
    name === 'TooManyRequestsException' ||
    /throttl|rate limit|too many requests/i.test(message)
  ) {
    return new GenerationRateLimitError(`Generation rate limited: ${message}`, {
      cause: e,
    });
  }
  return new GenerationError(`Generation failed: ${message}`, { cause: e });
}

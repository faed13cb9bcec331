import { Logger } from '@nestjs/common';
import {
  BedrockRuntimeClient,
  InvokeModelCommand,
} from '@aws-sdk/client-bedrock-runtime';

import { TitanEmbeddingResponseSchema } from '../ai/schemas';
import { EmbeddingError, errorMessage } from '../common/errors';
import { abortable } from '../common/keyed-mutex';
import type { AppConfig } from '../config/app.config';
import type { EmbeddingGateway } from '../embedding/embedding.gateway';

/**
 * Amazon Titan embeddings over the Bedrock runtime.
 */
export class BedrockService implements EmbeddingGateway {
  private readonly logger = new Logger(BedrockService.name);
  private readonly embedModel: string;

  constructor(
    config: AppConfig,
    private readonly client = new BedrockRuntimeClient({
      region: config.aws.region,
    }),
  ) {
    this.embedModel = config.embedding.bedrockModel;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const cmd = new InvokeModelCommand({
      modelId: this.embedModel,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify({ inputText: text }),
    });

    let raw: string;
    try {
      const res = await abortable(this.client.send(cmd), signal);
      raw = new TextDecoder().decode(res.body);
    } catch (e) {
      this.logger.warn(`Titan embed failed: ${errorMessage(e)}`);
      throw new EmbeddingError(
        `Embedding model ${this.embedModel} unreachable: ${errorMessage(e)}`,
        { cause: e },
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (e) {
      throw new EmbeddingError(
        `Unexpected embedding response: ${raw.slice(0, 500)}`,
        { cause: e },
      );
    }

    const parsed = TitanEmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Unexpected embedding response: ${JSON.stringify(body).slice(0, 500)}`,
      );
    }
    return parsed.data.embedding;
  }
}

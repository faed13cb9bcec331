import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  EmbeddingError,
  IndexBusyError,
  IndexCorruptError,
  InvalidArgumentError,
  NotFoundError,
  SupportError,
  errorMessage,
} from '../common/errors';
import {
  EMBEDDING_GATEWAY,
  type EmbeddingGateway,
} from '../embedding/embedding.gateway';
import type {
  Chunk,
  ChunkInput,
  IndexStats,
  SearchResult,
} from './rag.types';
import {
  cosineSimilarity,
  isWellFormedVector,
  similarityToScore,
} from './vector.utils';

/**
 * In-process vector index.
 *
 * Chunks are keyed by their source document: ingesting a document that is
 * already stored replaces its chunks in the same publish.
 *
 * Writers are exclusive: `ingest` and `clear` fail with IndexBusyError while an
 * ingest is running. An ingest embeds the whole batch before publishing it in a
 * single assignment, so a concurrent `query` sees either all of it or none.
 */
@Injectable()
export class SemanticIndexService {
  private readonly logger = new Logger(SemanticIndexService.name);

  private chunks: readonly Chunk[] = [];
  private byId = new Map<string, Chunk>();
  private dimension: number | null = null;
  private nextId = 0;
  private ingesting = false;

  constructor(
    @Inject(EMBEDDING_GATEWAY) private readonly embedder: EmbeddingGateway,
  ) {}

  get isIngesting() {
    return this.ingesting;
  }

  /**
   * With `replace`, the batch supersedes the current contents in the same
   * atomic publish (a rebuild that fails leaves the old index in place).
   */
  async ingest(
    inputs: readonly ChunkInput[],
    options: { replace?: boolean } = {},
  ): Promise<number> {
    if (this.ingesting) throw new IndexBusyError('ingest');
    inputs.forEach((c, i) => this.assertValidInput(c, i));
    const replace = Boolean(options.replace);
    if (!inputs.length) {
      if (replace) this.clear();
      return 0;
    }

    this.ingesting = true;
    try {
      const vectors: number[][] = [];
      for (const c of inputs) {
        vectors.push(
          await this.embedOrThrow(
            c.text,
            `chunk ${c.chunkIndex} of "${c.sourceDocument}"`,
          ),
        );
      }

      const incoming = new Set(inputs.map((c) => c.sourceDocument));
      const kept = replace
        ? []
        : this.chunks.filter((c) => !incoming.has(c.sourceDocument));
      let dimension = kept.length ? this.dimension : null;
      vectors.forEach((v, i) => {
        if (dimension === null) {
          dimension = v.length;
        } else if (v.length !== dimension) {
          throw new IndexCorruptError(
            `Embedding dimension mismatch for chunk ${inputs[i].chunkIndex} of "${inputs[i].sourceDocument}": expected ${dimension}, got ${v.length}`,
          );
        }
      });

      const firstId = replace ? 0 : this.nextId;
      const staged = inputs.map(
        (c, i): Chunk =>
          Object.freeze({
            id: `chunk-${firstId + i}`,
            text: c.text,
            sourceDocument: c.sourceDocument,
            pageNumber: c.pageNumber,
            chunkIndex: c.chunkIndex,
            embedding: Object.freeze([...vectors[i]]),
          }),
      );

      // publish
      const superseded = this.chunks.length - kept.length;
      this.chunks = [...kept, ...staged];
      this.byId = new Map(this.chunks.map((c) => [c.id, c]));
      this.nextId = firstId + staged.length;
      this.dimension = dimension;

      this.logger.log(
        `Ingested ${staged.length} chunks, replaced ${superseded} (index size ${this.chunks.length})`,
      );
      return staged.length;
    } finally {
      this.ingesting = false;
    }
  }

  async query(
    text: string,
    k: number,
    signal?: AbortSignal,
  ): Promise<SearchResult[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError('k', 'must be a positive integer');
    }

    const snapshot = this.chunks;
    const dimension = this.dimension;
    if (!snapshot.length) return [];

    const q = await this.embedOrThrow(text, 'query', signal);
    if (q.length !== dimension) {
      throw new IndexCorruptError(
        `Query embedding has dimension ${q.length}, index holds ${dimension}`,
      );
    }

    const scored = snapshot.map((chunk) => ({
      chunk,
      score: similarityToScore(cosineSimilarity(q, chunk.embedding)),
    }));
    // Array#sort is stable, so equal scores keep insertion order
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k);
  }

  getChunk(id: string): Chunk {
    const chunk = this.byId.get(id);
    if (!chunk) throw new NotFoundError('chunk', id);
    return chunk;
  }

  stats(): IndexStats {
    const sources = [...new Set(this.chunks.map((c) => c.sourceDocument))];
    return {
      chunkCount: this.chunks.length,
      sourceDocumentCount: sources.length,
      dimension: this.dimension,
      sources,
    };
  }

  clear(): void {
    if (this.ingesting) throw new IndexBusyError('clear');
    const removed = this.chunks.length;
    this.chunks = [];
    this.byId = new Map();
    this.dimension = null;
    this.nextId = 0;
    this.logger.log(`Cleared index (${removed} chunks removed)`);
  }

  private assertValidInput(c: ChunkInput, i: number) {
    if (typeof c.text !== 'string' || !c.text.length) {
      throw new InvalidArgumentError(`chunks[${i}].text`, 'must be non-empty');
    }
    if (!c.sourceDocument?.trim()) {
      throw new InvalidArgumentError(
        `chunks[${i}].sourceDocument`,
        'must be non-empty',
      );
    }
    if (!Number.isInteger(c.pageNumber) || c.pageNumber < 1) {
      throw new InvalidArgumentError(
        `chunks[${i}].pageNumber`,
        'must be a positive integer',
      );
    }
    if (!Number.isInteger(c.chunkIndex) || c.chunkIndex < 0) {
      throw new InvalidArgumentError(
        `chunks[${i}].chunkIndex`,
        'must be a non-negative integer',
      );
    }
  }

  private async embedOrThrow(
    text: string,
    what: string,
    signal?: AbortSignal,
  ): Promise<number[]> {
    let v: unknown;
    try {
      v = await this.embedder.embed(text, signal);
    } catch (e) {
      if (e instanceof SupportError) throw e;
      throw new EmbeddingError(`Embedding ${what} failed: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    if (!isWellFormedVector(v)) {
      throw new EmbeddingError(`Malformed embedding for ${what}`);
    }
    return v;
  }
}

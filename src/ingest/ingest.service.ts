import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
} from '@nestjs/common';

import { InvalidArgumentError } from '../common/errors';
import { FailureRecorder } from '../common/failure-recorder.service';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type { ChunkInput, IndexStats } from '../rag/rag.types';
import { SemanticIndexService } from '../rag/semantic-index.service';
import { DocumentChunker, type SourceDocument } from './chunker';
import { DocumentLoader } from './document-loader';

export type IngestResult = {
  documents: number;
  chunks: number;
  cleared: boolean;
  stats: IndexStats;
};

@Injectable()
export class IngestService implements OnApplicationBootstrap {
  private readonly logger = new Logger(IngestService.name);

  constructor(
    private readonly index: SemanticIndexService,
    private readonly chunker: DocumentChunker,
    private readonly loader: DocumentLoader,
    private readonly failures: FailureRecorder,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async onApplicationBootstrap() {
    if (!this.config.knowledgeBase.autoIngest) return;
    try {
      const res = await this.ingestDataFolder({ clearExisting: true });
      this.logger.log(
        `Auto-ingest: ${res.documents} documents, ${res.chunks} chunks`,
      );
    } catch (e) {
      // the service still answers without a knowledge base
      this.failures.record('startup', { error: e });
    }
  }

  /**
   * Chunks and indexes the given documents as one batch: either every chunk
   * lands in the index or none does.
   */
  async ingestDocuments(
    docs: readonly SourceDocument[],
    opts: { clearExisting?: boolean } = {},
  ): Promise<IngestResult> {
    const names = new Set<string>();
    const chunks: ChunkInput[] = [];
    for (const doc of docs) {
      const name = doc.name?.trim();
      if (name && names.has(name)) {
        throw new InvalidArgumentError('name', `duplicate document "${name}"`);
      }
      if (name) names.add(name);
      chunks.push(...this.chunker.chunk(doc));
    }

    const cleared = Boolean(opts.clearExisting);
    try {
      const count = await this.index.ingest(chunks, { replace: cleared });
      this.logger.log(
        `Ingested ${docs.length} documents as ${count} chunks` +
          (cleared ? ' (rebuilt)' : ''),
      );
      return {
        documents: docs.length,
        chunks: count,
        cleared,
        stats: this.index.stats(),
      };
    } catch (e) {
      this.failures.record('ingest', {
        documents: docs.length,
        chunks: chunks.length,
        error: e,
      });
      throw e;
    }
  }

  async ingestDataFolder(
    opts: { clearExisting?: boolean } = {},
  ): Promise<IngestResult> {
    const docs = await this.loader.loadFolder();
    return this.ingestDocuments(docs, opts);
  }

  clearKnowledgeBase(): IndexStats {
    this.index.clear();
    return this.index.stats();
  }
}

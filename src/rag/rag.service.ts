import { Inject, Injectable } from '@nestjs/common';
import { InvalidArgumentError } from '../common/errors';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type { Citation, SearchResult } from './rag.types';
import { SemanticIndexService } from './semantic-index.service';

export const EXCERPT_LENGTH = 200;

@Injectable()
export class RagService {
  constructor(
    private readonly index: SemanticIndexService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  get defaultK() {
    return this.config.knowledgeBase.searchResults;
  }

  async search(
    query: string,
    k = this.defaultK,
    signal?: AbortSignal,
  ): Promise<SearchResult[]> {
    if (!query?.trim()) {
      throw new InvalidArgumentError('query', 'must be non-empty');
    }
    return this.index.query(query, k, signal);
  }

  toCitations(results: readonly SearchResult[]): Citation[] {
    return results.map(toCitation);
  }
}

export function toCitation({ chunk, score }: SearchResult): Citation {
  return {
    chunkId: chunk.id,
    source: chunk.sourceDocument,
    page: chunk.pageNumber,
    chunkIndex: chunk.chunkIndex,
    score,
    similarity: Math.round(score * 1000) / 10,
    excerpt: excerpt(chunk.text, EXCERPT_LENGTH),
  };
}

export function excerpt(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

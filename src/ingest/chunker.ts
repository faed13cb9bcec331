import { Inject, Injectable } from '@nestjs/common';
import { InvalidArgumentError } from '../common/errors';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type { ChunkInput } from '../rag/rag.types';

export const PAGE_BREAK = '\f';

/**
 * Raw document handed to ingestion. `pages` wins over `text`; plain text may
 * mark page boundaries with form feeds.
 */
export type SourceDocument = {
  name: string;
  text?: string;
  pages?: string[];
};

export type TextWindow = {
  text: string;
  pageNumber: number;
  chunkIndex: number;
};

export type ChunkOptions = {
  chunkSize: number;
  overlap: number;
};

export function documentPages(doc: SourceDocument): string[] {
  if (doc.pages) return doc.pages;
  return (doc.text ?? '').split(PAGE_BREAK);
}

/**
 * Fixed windows of `chunkSize` characters advancing by `chunkSize - overlap`.
 * Pages are windowed separately; `chunkIndex` counts across the document.
 */
export function chunkDocument(
  doc: SourceDocument,
  { chunkSize, overlap }: ChunkOptions,
): TextWindow[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidArgumentError('chunkSize', 'must be a positive integer');
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new InvalidArgumentError(
      'overlap',
      'must be a non-negative integer smaller than chunkSize',
    );
  }

  const out: TextWindow[] = [];
  const pages = documentPages(doc);

  pages.forEach((page, i) => {
    if (!page) return;
    let start = 0;
    while (start < page.length) {
      const end = Math.min(page.length, start + chunkSize);
      out.push({
        text: page.slice(start, end),
        pageNumber: i + 1,
        chunkIndex: out.length,
      });
      if (end === page.length) break;
      start = end - overlap;
    }
  });

  return out;
}

@Injectable()
export class DocumentChunker {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  get options(): ChunkOptions {
    return {
      chunkSize: this.config.knowledgeBase.chunkSize,
      overlap: this.config.knowledgeBase.chunkOverlap,
    };
  }

  chunk(doc: SourceDocument): ChunkInput[] {
    const name = doc.name?.trim();
    if (!name) throw new InvalidArgumentError('name', 'document name is required');

    return chunkDocument(doc, this.options).map((w) => ({
      text: w.text,
      sourceDocument: name,
      pageNumber: w.pageNumber,
      chunkIndex: w.chunkIndex,
    }));
  }
}

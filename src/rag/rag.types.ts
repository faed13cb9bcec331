export type ChunkInput = {
  text: string;
  sourceDocument: string;
  pageNumber: number;
  chunkIndex: number;
};

export type Chunk = Readonly<
  ChunkInput & {
    id: string;
    embedding: readonly number[];
  }
>;

export type SearchResult = {
  chunk: Chunk;
  /** cosine similarity mapped onto [0, 1] */
  score: number;
};

export type IndexStats = {
  chunkCount: number;
  sourceDocumentCount: number;
  dimension: number | null;
  sources: string[];
};

export type Citation = {
  chunkId: string;
  source: string;
  page: number;
  chunkIndex: number;
  score: number;
  /** percentage, one decimal */
  similarity: number;
  excerpt: string;
};

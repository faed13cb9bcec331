import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { InvalidArgumentError } from '../common/errors';
import { FailureRecorder } from '../common/failure-recorder.service';
import { SemanticIndexService } from '../rag/semantic-index.service';
import { FlakyEmbeddingGateway, testConfig } from '../testing/fakes';
import { DocumentChunker } from './chunker';
import { DocumentLoader } from './document-loader';
import { IngestService } from './ingest.service';

describe('IngestService', () => {
  let folder: string;
  let embedder: FlakyEmbeddingGateway;
  let index: SemanticIndexService;
  let failures: FailureRecorder;
  let loader: DocumentLoader;

  const service = (env: NodeJS.ProcessEnv = {}) => {
    const config = testConfig({
      DATA_FOLDER: folder,
      KB_CHUNK_SIZE: '40',
      KB_CHUNK_OVERLAP: '10',
      ...env,
    });
    loader = new DocumentLoader(config);
    return new IngestService(
      index,
      new DocumentChunker(config),
      loader,
      failures,
      config,
    );
  };

  beforeEach(async () => {
    folder = await mkdtemp(join(tmpdir(), 'kb-'));
    embedder = new FlakyEmbeddingGateway();
    index = new SemanticIndexService(embedder);
    failures = new FailureRecorder();
  });

  afterEach(async () => {
    await rm(folder, { recursive: true, force: true });
  });

  it('ingests documents as chunks', async () => {
    const res = await service().ingestDocuments([
      { name: 'faq.md', text: 'Password reset: click Forgot Password link.' },
      { name: 'short.txt', text: 'Refunds take 5 days.' },
    ]);

    expect(res).toEqual({
      documents: 2,
      chunks: 3,
      cleared: false,
      stats: {
        chunkCount: 3,
        sourceDocumentCount: 2,
        dimension: 64,
        sources: ['faq.md', 'short.txt'],
      },
    });
  });

  it('rejects duplicate document names in one batch', async () => {
    await expect(
      service().ingestDocuments([
        { name: 'faq.md', text: 'one' },
        { name: ' faq.md', text: 'two' },
      ]),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(index.stats().chunkCount).toBe(0);
  });

  it('records a failed ingest and leaves the index as it was', async () => {
    const ingest = service();
    await ingest.ingestDocuments([{ name: 'a.md', text: 'kept' }]);
    embedder.failing = true;

    await expect(
      ingest.ingestDocuments([{ name: 'b.md', text: 'lost' }], {
        clearExisting: true,
      }),
    ).rejects.toThrow('embedding service down');
    expect(index.stats().sources).toEqual(['a.md']);
    expect(failures.count('ingest')).toBe(1);
  });

  it('rebuilds from the data folder', async () => {
    await writeFile(join(folder, 'b-guide.txt'), 'Page one.\fPage two.');
    await writeFile(join(folder, 'a-faq.md'), 'Reset passwords from the sign-in page.');
    await writeFile(join(folder, 'notes.pdf'), 'binary');
    const ingest = service();
    await ingest.ingestDocuments([{ name: 'old.md', text: 'stale' }]);

    const res = await ingest.ingestDataFolder({ clearExisting: true });

    expect(res.cleared).toBe(true);
    expect(res.stats.sources).toEqual(['a-faq.md', 'b-guide.txt']);
    expect(index.getChunk('chunk-2')).toMatchObject({
      sourceDocument: 'b-guide.txt',
      pageNumber: 2,
      text: 'Page two.',
    });
  });

  it('ingests the same folder twice without duplicating chunks', async () => {
    await writeFile(join(folder, 'b-guide.txt'), 'Page one.\fPage two.');
    await writeFile(join(folder, 'a-faq.md'), 'Reset passwords from the sign-in page.');
    const ingest = service();
    await ingest.ingestDocuments([{ name: 'old.md', text: 'stale' }]);

    const first = await ingest.ingestDataFolder();
    const second = await ingest.ingestDataFolder();

    expect(second.chunks).toBe(first.chunks);
    expect(second.stats.chunkCount).toBe(first.stats.chunkCount);
    expect(second.stats.sources).toEqual(['old.md', 'a-faq.md', 'b-guide.txt']);
    const hits = await index.query('Reset passwords from the sign-in page.', 10);
    expect(hits.filter((h) => h.chunk.sourceDocument === 'a-faq.md')).toHaveLength(1);
  });

  it('auto-ingests on bootstrap when enabled', async () => {
    await writeFile(join(folder, 'faq.md'), 'Password reset: click Forgot Password link.');

    await service({ KB_AUTO_INGEST: 'true' }).onApplicationBootstrap();
    expect(index.stats().sources).toEqual(['faq.md']);
  });

  it('records a failed auto-ingest without throwing', async () => {
    await writeFile(join(folder, 'faq.md'), 'Password reset.');
    embedder.failing = true;

    await expect(
      service({ KB_AUTO_INGEST: 'true' }).onApplicationBootstrap(),
    ).resolves.toBeUndefined();
    expect(failures.count('startup')).toBe(1);
  });

  it('skips auto-ingest when disabled', async () => {
    await writeFile(join(folder, 'faq.md'), 'Password reset.');

    await service().onApplicationBootstrap();
    expect(index.stats().chunkCount).toBe(0);
  });

  it('clears the knowledge base', async () => {
    const ingest = service();
    await ingest.ingestDocuments([{ name: 'a.md', text: 'something' }]);

    expect(ingest.clearKnowledgeBase()).toMatchObject({ chunkCount: 0 });
  });

  describe('DocumentLoader', () => {
    it('returns nothing for a missing folder', async () => {
      service();
      await expect(loader.loadFolder(join(folder, 'nope'))).resolves.toEqual([]);
    });

    it('reads text and markdown files sorted by name', async () => {
      await writeFile(join(folder, 'z.md'), 'last');
      await writeFile(join(folder, 'A.TXT'), 'first');
      await writeFile(join(folder, 'skip.json'), '{}');
      service();

      await expect(loader.loadFolder()).resolves.toEqual([
        { name: 'A.TXT', text: 'first' },
        { name: 'z.md', text: 'last' },
      ]);
    });
  });
});

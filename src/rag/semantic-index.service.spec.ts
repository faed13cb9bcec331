import {
  EmbeddingError,
  IndexBusyError,
  IndexCorruptError,
  InvalidArgumentError,
  NotFoundError,
} from '../common/errors';
import type { EmbeddingGateway } from '../embedding/embedding.gateway';
import { HashingEmbeddingGateway } from '../embedding/hashing-embedding.gateway';
import { StubEmbeddingGateway, chunkInput, deferred } from '../testing/fakes';
import { SemanticIndexService } from './semantic-index.service';

describe('SemanticIndexService', () => {
  const vectors: Record<string, number[]> = {
    alpha: [1, 0],
    beta: [0, 1],
    gamma: [1, 1],
    'dup-1': [0, 1],
    'dup-2': [0, 1],
    'find alpha': [1, 0],
    'find beta': [0, 1],
    wide: [1, 0, 0],
  };

  let embedder: StubEmbeddingGateway;
  let index: SemanticIndexService;

  beforeEach(() => {
    embedder = new StubEmbeddingGateway(vectors);
    index = new SemanticIndexService(embedder);
  });

  let batch = 0;
  const ingestTexts = (...texts: string[]) => {
    const source = `doc-${batch++}.md`;
    return index.ingest(texts.map((t, i) => chunkInput(t, source, i)));
  };

  describe('query', () => {
    it('returns nothing on an empty index without embedding the query', async () => {
      await expect(index.query('find alpha', 3)).resolves.toEqual([]);
      expect(embedder.calls).toEqual([]);
    });

    it('orders by descending score and cuts at k', async () => {
      await ingestTexts('beta', 'alpha', 'gamma');

      const all = await index.query('find alpha', 10);
      expect(all.map((r) => r.chunk.text)).toEqual(['alpha', 'gamma', 'beta']);
      expect(all[0].score).toBe(1);
      expect(all[1].score).toBeCloseTo((1 + Math.SQRT1_2) / 2, 10);
      expect(all[2].score).toBe(0.5);

      const top = await index.query('find alpha', 2);
      expect(top.map((r) => r.chunk.text)).toEqual(['alpha', 'gamma']);
    });

    it('keeps insertion order between equal scores', async () => {
      await ingestTexts('dup-1', 'alpha', 'dup-2');

      const results = await index.query('find beta', 2);
      expect(results.map((r) => r.chunk.id)).toEqual(['chunk-0', 'chunk-2']);
      expect(results[0].score).toBe(results[1].score);
    });

    it.each([0, -1, 1.5])('rejects k = %p', async (k) => {
      await ingestTexts('alpha');
      await expect(index.query('find alpha', k)).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
    });

    it('fails as corrupt when the query vector has another dimension', async () => {
      await ingestTexts('alpha');
      await expect(index.query('wide', 1)).rejects.toBeInstanceOf(
        IndexCorruptError,
      );
    });

    it('wraps a failing query embedding as EmbeddingError', async () => {
      await ingestTexts('alpha');
      await expect(index.query('unknown text', 1)).rejects.toBeInstanceOf(
        EmbeddingError,
      );
    });

    it('finds a stored chunk when queried with its own text', async () => {
      const hashed = new SemanticIndexService(new HashingEmbeddingGateway(256));
      const texts = [
        'To reset your password open the sign-in page.',
        'Refunds are issued to the original payment method.',
        'Clear the browser cache if pages fail to load.',
      ];
      await hashed.ingest(texts.map((t, i) => chunkInput(t, 'kb.md', i)));

      for (const text of texts) {
        const [top] = await hashed.query(text, 1);
        expect(top.chunk.text).toBe(text);
        expect(top.score).toBeGreaterThanOrEqual(0.99);
      }
    });
  });

  describe('ingest', () => {
    it('assigns sequential ids and reports stats', async () => {
      await expect(
        index.ingest([
          chunkInput('alpha', 'a.md', 0),
          chunkInput('beta', 'b.md', 0, 2),
        ]),
      ).resolves.toBe(2);
      await index.ingest([chunkInput('gamma', 'c.md', 1)]);

      expect(index.getChunk('chunk-2')).toMatchObject({
        text: 'gamma',
        sourceDocument: 'c.md',
        chunkIndex: 1,
        embedding: [1, 1],
      });
      expect(index.getChunk('chunk-1').pageNumber).toBe(2);
      expect(index.stats()).toEqual({
        chunkCount: 3,
        sourceDocumentCount: 3,
        dimension: 2,
        sources: ['a.md', 'b.md', 'c.md'],
      });
    });

    it('replaces the chunks of a document ingested again', async () => {
      await index.ingest([
        chunkInput('alpha', 'a.md', 0),
        chunkInput('beta', 'a.md', 1),
        chunkInput('gamma', 'b.md', 0),
      ]);

      await expect(
        index.ingest([chunkInput('dup-1', 'a.md', 0)]),
      ).resolves.toBe(1);

      expect(index.stats()).toEqual({
        chunkCount: 2,
        sourceDocumentCount: 2,
        dimension: 2,
        sources: ['b.md', 'a.md'],
      });
      expect(() => index.getChunk('chunk-0')).toThrow(NotFoundError);
      expect(index.getChunk('chunk-3').text).toBe('dup-1');
      expect(
        (await index.query('find alpha', 5)).map((r) => r.chunk.text),
      ).toEqual(['gamma', 'dup-1']);
    });

    it('lets a replaced document change the dimension only when it was alone', async () => {
      await index.ingest([chunkInput('alpha', 'a.md')]);
      await index.ingest([chunkInput('wide', 'a.md')]);
      expect(index.stats()).toMatchObject({ chunkCount: 1, dimension: 3 });

      await index.ingest([chunkInput('wide', 'b.md')]);
      await expect(
        index.ingest([chunkInput('alpha', 'a.md')]),
      ).rejects.toBeInstanceOf(IndexCorruptError);
      expect(index.stats()).toMatchObject({ chunkCount: 2, dimension: 3 });
    });

    it('hands out frozen chunks', async () => {
      await ingestTexts('alpha');
      const chunk = index.getChunk('chunk-0');
      expect(Object.isFrozen(chunk)).toBe(true);
      expect(Object.isFrozen(chunk.embedding)).toBe(true);
    });

    it('stores nothing when one embedding in the batch fails', async () => {
      await ingestTexts('alpha');

      await expect(ingestTexts('beta', 'no vector here', 'gamma')).rejects.toBeInstanceOf(
        EmbeddingError,
      );
      expect(index.stats().chunkCount).toBe(1);
      expect((await index.query('find beta', 5)).map((r) => r.chunk.text)).toEqual([
        'alpha',
      ]);
    });

    it.each([[[]], [[1, Number.NaN]], [['1', '2']]])(
      'rejects the malformed embedding %p',
      async (bad) => {
        const malformed: EmbeddingGateway = {
          embed: async () => JSON.parse(JSON.stringify(bad)),
        };
        const idx = new SemanticIndexService(malformed);
        await expect(idx.ingest([chunkInput('x')])).rejects.toBeInstanceOf(
          EmbeddingError,
        );
        expect(idx.stats().chunkCount).toBe(0);
      },
    );

    it('rejects mixed dimensions within a batch and against the index', async () => {
      await expect(ingestTexts('alpha', 'wide')).rejects.toBeInstanceOf(
        IndexCorruptError,
      );
      expect(index.stats().chunkCount).toBe(0);

      await ingestTexts('alpha');
      await expect(ingestTexts('wide')).rejects.toBeInstanceOf(IndexCorruptError);
      expect(index.stats()).toMatchObject({ chunkCount: 1, dimension: 2 });
    });

    it('validates chunk metadata before embedding anything', async () => {
      await expect(
        index.ingest([{ ...chunkInput('alpha'), pageNumber: 0 }]),
      ).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(index.ingest([chunkInput('')])).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
      expect(embedder.calls).toEqual([]);
    });

    it('replaces the contents atomically and restarts ids', async () => {
      await ingestTexts('alpha', 'beta');

      await index.ingest([chunkInput('wide', 'new.md')], { replace: true });
      expect(index.stats()).toEqual({
        chunkCount: 1,
        sourceDocumentCount: 1,
        dimension: 3,
        sources: ['new.md'],
      });
      expect(index.getChunk('chunk-0').text).toBe('wide');

      await expect(
        index.ingest([chunkInput('no vector here')], { replace: true }),
      ).rejects.toBeInstanceOf(EmbeddingError);
      expect(index.getChunk('chunk-0').text).toBe('wide');
    });

    it('rejects a second writer while an ingest is running', async () => {
      const gate = deferred<void>();
      const slow: EmbeddingGateway = {
        embed: async (text) => {
          if (text === 'slow') await gate.promise;
          return [1, 0];
        },
      };
      const idx = new SemanticIndexService(slow);
      await idx.ingest([chunkInput('before', 'before.md')]);

      const pending = idx.ingest([chunkInput('next'), chunkInput('slow')]);
      expect(idx.isIngesting).toBe(true);
      await expect(idx.ingest([chunkInput('other')])).rejects.toBeInstanceOf(
        IndexBusyError,
      );
      expect(() => idx.clear()).toThrow(IndexBusyError);

      const during = await idx.query('lookup', 5);
      expect(during.map((r) => r.chunk.text)).toEqual(['before']);

      gate.resolve();
      await expect(pending).resolves.toBe(2);
      expect(idx.isIngesting).toBe(false);
      expect(idx.stats().chunkCount).toBe(3);
    });
  });

  describe('clear', () => {
    it('empties the index and resets ids', async () => {
      await ingestTexts('alpha', 'beta');
      index.clear();

      await expect(index.query('find alpha', 5)).resolves.toEqual([]);
      expect(index.stats()).toEqual({
        chunkCount: 0,
        sourceDocumentCount: 0,
        dimension: null,
        sources: [],
      });
      expect(() => index.getChunk('chunk-0')).toThrow(NotFoundError);

      await ingestTexts('gamma');
      expect(index.getChunk('chunk-0').text).toBe('gamma');
    });
  });
});

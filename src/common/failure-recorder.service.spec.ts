import { EmbeddingError } from './errors';
import { FailureRecorder } from './failure-recorder.service';

describe('FailureRecorder', () => {
  it('records the error message and context per kind', () => {
    const failures = new FailureRecorder();

    const entry = failures.record('retrieval', {
      conversationId: 'c-1',
      error: new EmbeddingError('embedding service down'),
    });

    expect(entry).toMatchObject({
      kind: 'retrieval',
      message: 'embedding service down',
      context: { conversationId: 'c-1' },
    });
    expect(failures.count('retrieval')).toBe(1);
    expect(failures.count('generation')).toBe(0);
  });

  it('falls back to the kind when there is no error', () => {
    expect(new FailureRecorder().record('timeout', {}).message).toBe('timeout');
  });

  it('keeps the most recent hundred entries', () => {
    const failures = new FailureRecorder();
    for (let i = 0; i < 105; i++) {
      failures.record('ingest', { batch: i });
    }

    const recent = failures.recent();
    expect(recent).toHaveLength(100);
    expect(recent[0].context).toEqual({ batch: 5 });
    expect(failures.count('ingest')).toBe(105);
  });
});

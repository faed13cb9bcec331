import { createHash } from 'node:crypto';
import { InvalidArgumentError } from '../common/errors';
import type { EmbeddingGateway } from './embedding.gateway';

/**
 * Deterministic bag-of-words embedder (feature hashing, signed buckets, L2
 * normalized). Needs no network; identical text always maps to the same vector.
 */
export class HashingEmbeddingGateway implements EmbeddingGateway {
  constructor(readonly dimensions = 256) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new InvalidArgumentError('dimensions', 'must be a positive integer');
    }
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of tokenize(text)) {
      const digest = createHash('sha1').update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }

    const norm = Math.sqrt(vector.reduce((acc, v) => acc + v * v, 0));
    if (norm === 0) return vector;
    return vector.map((v) => v / norm);
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

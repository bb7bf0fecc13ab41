import { describe, it, expect } from 'vitest';
import {
  cosineSimilarity,
  deserializeEmbedding,
  dot,
  norm,
  serializeEmbedding,
  similarityScore,
} from '../../src/utils/embedding-utils.js';

describe('embedding-utils', () => {
  describe('serializeEmbedding', () => {
    it('uses 4 bytes per dimension (Float32)', () => {
      const embedding = [1.0, 2.0, 3.0];
      const result = serializeEmbedding(embedding);
      expect(Buffer.isBuffer(result)).toBe(true);
      expect(result.length).toBe(embedding.length * 4);
    });

    it('handles empty embedding', () => {
      expect(serializeEmbedding([]).length).toBe(0);
    });
  });

  describe('deserializeEmbedding', () => {
    it('preserves values to Float32 precision', () => {
      const original = [0.1, 0.5, -0.3, 1.0, 0.0];
      const restored = deserializeEmbedding(serializeEmbedding(original));

      expect(restored.length).toBe(original.length);
      for (let i = 0; i < original.length; i++) {
        expect(restored[i]).toBeCloseTo(original[i], 5);
      }
    });

    it('reads from a buffer slice with a non-zero byte offset', () => {
      const padded = Buffer.alloc(16);
      serializeEmbedding([1, 2]).copy(padded, 8);
      const slice = padded.subarray(8, 16);

      expect(deserializeEmbedding(slice)).toEqual([1, 2]);
    });
  });

  describe('dot and norm', () => {
    it('computes the dot product', () => {
      expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    });

    it('computes the L2 norm', () => {
      expect(norm([3, 4])).toBe(5);
    });
  });

  describe('cosineSimilarity', () => {
    it('is 1 for identical directions regardless of magnitude', () => {
      expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    });

    it('is 0 for orthogonal vectors', () => {
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('is -1 for opposite vectors', () => {
      expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    });

    it('is 0 for zero vectors and mismatched dimensions', () => {
      expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
      expect(cosineSimilarity([1, 0, 0], [1, 0])).toBe(0);
    });
  });

  describe('similarityScore', () => {
    it('floors negative similarity at 0', () => {
      expect(similarityScore([1, 0], [-1, 0])).toBe(0);
    });

    it('passes positive similarity through', () => {
      expect(similarityScore([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
    });
  });
});

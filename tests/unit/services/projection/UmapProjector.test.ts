/**
 * Unit tests for UmapProjector
 */

import { describe, it, expect } from 'vitest';
import { mulberry32, UmapProjector } from '../../../../src/services/projection/Projector.js';

/**
 * Two well separated clusters of ten points each
 */
function clusteredVectors(): number[][] {
  const random = mulberry32(7);
  const vectors: number[][] = [];
  for (let i = 0; i < 20; i++) {
    const offset = i < 10 ? 0 : 10;
    vectors.push([offset + random(), offset + random(), offset + random(), random()]);
  }
  return vectors;
}

describe('mulberry32', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);

    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  it('should stay within [0, 1)', () => {
    const random = mulberry32(1);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('UmapProjector', () => {
  it('should return one finite point per input row', async () => {
    const projector = new UmapProjector({ nNeighbors: 5, seed: 3 });

    const points = await projector.project(clusteredVectors());

    expect(points).toHaveLength(20);
    for (const [x, y] of points) {
      expect(Number.isFinite(x)).toBe(true);
      expect(Number.isFinite(y)).toBe(true);
    }
  });

  it('should give identical output for identical input and seed', async () => {
    const projector = new UmapProjector({ nNeighbors: 5, seed: 3 });
    const vectors = clusteredVectors();

    const first = await projector.project(vectors);
    const second = await projector.project(vectors);

    expect(second).toEqual(first);
  });

  it('should expose its neighbourhood size', () => {
    expect(new UmapProjector({ nNeighbors: 8 }).nNeighbors).toBe(8);
    expect(new UmapProjector().nNeighbors).toBe(15);
  });
});

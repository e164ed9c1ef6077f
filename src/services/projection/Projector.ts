/**
 * Projection collaborator
 *
 * Reduces an embedding matrix to 2D coordinates. Output is deterministic for
 * a fixed seed and fixed hyperparameters.
 */

import { UMAP } from 'umap-js';
import { PROJECTION_DEFAULTS } from '../../constants/calibration-constants.js';
import type { ProjectionConfig } from '../../lib/env-config.js';

export interface Projector {
  /** Neighbourhood size; inputs need at least nNeighbors + 1 rows */
  readonly nNeighbors: number;

  /**
   * One [x, y] pair per input row, in input order
   */
  project(vectors: number[][]): Promise<Array<[number, number]>>;
}

/**
 * Small seeded PRNG returning floats in [0, 1)
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class UmapProjector implements Projector {
  readonly nNeighbors: number;
  private minDist: number;
  private seed: number;

  constructor(config: Partial<ProjectionConfig> = {}) {
    this.nNeighbors = config.nNeighbors ?? PROJECTION_DEFAULTS.N_NEIGHBORS;
    this.minDist = config.minDist ?? PROJECTION_DEFAULTS.MIN_DIST;
    this.seed = config.seed ?? PROJECTION_DEFAULTS.SEED;
  }

  async project(vectors: number[][]): Promise<Array<[number, number]>> {
    // Fresh generator per run so equal inputs give equal outputs
    const umap = new UMAP({
      nComponents: PROJECTION_DEFAULTS.N_COMPONENTS,
      nNeighbors: this.nNeighbors,
      minDist: this.minDist,
      random: mulberry32(this.seed)
    });

    const embedding = await umap.fitAsync(vectors);
    return embedding.map((row): [number, number] => [row[0], row[1]]);
  }
}

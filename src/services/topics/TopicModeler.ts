/**
 * Topic modeler
 *
 * Groups papers by their embeddings with seeded spherical k-means and
 * describes each group by the terms that set it apart from the others
 * (class-based TF-IDF over title and abstract).
 */

import stopwordList from '../../constants/stopwords.json' with { type: 'json' };
import { PROJECTION_DEFAULTS, TOPIC_DEFAULTS } from '../../constants/calibration-constants.js';
import { cosineSimilarity, normalizeVector, roundTo } from '../../lib/vector-math.js';
import { mulberry32 } from '../projection/Projector.js';

export interface TopicDocument {
  arxivId: string;
  embedding: number[];
  text: string;
}

export interface TopicTerm {
  term: string;
  weight: number;
}

export interface Topic {
  id: number;
  terms: TopicTerm[];
  docCount: number;
}

export interface TopicAssignment {
  arxivId: string;
  /** Cosine similarity to every topic centroid */
  weights: number[];
  dominant: number;
}

export interface TopicModel {
  topics: Topic[];
  assignments: TopicAssignment[];
}

export interface TopicModeler {
  /**
   * `nComponents` topics over the documents; needs at least that many documents
   */
  extract(documents: readonly TopicDocument[], nComponents: number): Promise<TopicModel>;
}

export interface KMeansTopicModelerOptions {
  seed?: number;
  topTerms?: number;
  maxIterations?: number;
}

const STOPWORDS = new Set<string>(stopwordList);
const TOKEN_PATTERN = /[a-z][a-z0-9-]{2,}/g;

/**
 * Lower-cased word tokens of three or more characters, stopwords removed
 */
export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(TOKEN_PATTERN) ?? []).filter((token) => !STOPWORDS.has(token));
}

function nearestCentroid(point: readonly number[], centroids: readonly number[][]): number {
  let best = 0;
  let bestScore = -Infinity;
  centroids.forEach((centroid, c) => {
    const score = cosineSimilarity(point, centroid);
    if (score > bestScore) {
      best = c;
      bestScore = score;
    }
  });
  return best;
}

/**
 * k-means++ seeding on cosine distance
 */
function seedCentroids(points: readonly number[][], k: number, random: () => number): number[][] {
  const first = Math.floor(random() * points.length);
  const chosen = new Set<number>([first]);
  const centroids = [points[first]];

  while (centroids.length < k) {
    const distances = points.map((point, i) => {
      if (chosen.has(i)) return 0;
      const closest = Math.max(...centroids.map((centroid) => cosineSimilarity(point, centroid)));
      return Math.max(0, 1 - closest) ** 2;
    });
    const total = distances.reduce((sum, d) => sum + d, 0);

    let next = -1;
    if (total === 0) {
      // Every remaining point duplicates a centroid
      next = points.findIndex((_, i) => !chosen.has(i));
    } else {
      let target = random() * total;
      for (let i = 0; i < distances.length; i++) {
        if (distances[i] === 0) continue;
        next = i;
        target -= distances[i];
        if (target < 0) break;
      }
    }

    chosen.add(next);
    centroids.push(points[next]);
  }
  return centroids;
}

/**
 * Spherical k-means: unit vectors, cosine assignment, re-normalized means.
 * A cluster that loses every member keeps its previous centroid.
 */
export function sphericalKMeans(
  vectors: readonly number[][],
  k: number,
  random: () => number,
  maxIterations: number = TOPIC_DEFAULTS.MAX_ITERATIONS
): { centroids: number[][]; labels: number[] } {
  if (k < 1 || k > vectors.length) {
    throw new Error(`cannot form ${k} clusters from ${vectors.length} vectors`);
  }
  const points = vectors.map(normalizeVector);
  let centroids = seedCentroids(points, k, random);
  let labels = points.map((point) => nearestCentroid(point, centroids));

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    centroids = centroids.map((centroid, c) => {
      const members = points.filter((_, i) => labels[i] === c);
      if (members.length === 0) return centroid;
      const sum = centroid.map((_, d) => members.reduce((total, member) => total + member[d], 0));
      return normalizeVector(sum);
    });

    const next = points.map((point) => nearestCentroid(point, centroids));
    const changed = next.some((label, i) => label !== labels[i]);
    labels = next;
    if (!changed) break;
  }

  return { centroids, labels };
}

/**
 * Highest-weighted terms per cluster: term frequency within the cluster
 * scaled by log(1 + average cluster size / corpus frequency)
 */
export function topTermsPerCluster(
  texts: readonly string[],
  labels: readonly number[],
  k: number,
  topN: number = TOPIC_DEFAULTS.TOP_TERMS
): TopicTerm[][] {
  const counts = Array.from({ length: k }, () => new Map<string, number>());
  const totals = Array.from({ length: k }, () => 0);
  const frequency = new Map<string, number>();

  texts.forEach((text, i) => {
    const cluster = labels[i];
    for (const token of tokenize(text)) {
      counts[cluster].set(token, (counts[cluster].get(token) ?? 0) + 1);
      totals[cluster] += 1;
      frequency.set(token, (frequency.get(token) ?? 0) + 1);
    }
  });

  const averageTokens = totals.reduce((sum, total) => sum + total, 0) / k;

  return counts.map((termCounts, c) =>
    [...termCounts]
      .map(([term, count]) => ({
        term,
        weight: (count / totals[c]) * Math.log(1 + averageTokens / (frequency.get(term) ?? count))
      }))
      .sort((a, b) => b.weight - a.weight || a.term.localeCompare(b.term))
      .slice(0, topN)
      .map(({ term, weight }) => ({ term, weight: roundTo(weight) }))
  );
}

export class KMeansTopicModeler implements TopicModeler {
  private seed: number;
  private topTerms: number;
  private maxIterations: number;

  constructor(options: KMeansTopicModelerOptions = {}) {
    this.seed = options.seed ?? PROJECTION_DEFAULTS.SEED;
    this.topTerms = options.topTerms ?? TOPIC_DEFAULTS.TOP_TERMS;
    this.maxIterations = options.maxIterations ?? TOPIC_DEFAULTS.MAX_ITERATIONS;
  }

  async extract(documents: readonly TopicDocument[], nComponents: number): Promise<TopicModel> {
    if (!Number.isInteger(nComponents) || nComponents < 1 || nComponents > documents.length) {
      throw new Error(`cannot form ${nComponents} topics from ${documents.length} papers`);
    }

    const { centroids, labels } = sphericalKMeans(
      documents.map((doc) => doc.embedding),
      nComponents,
      mulberry32(this.seed),
      this.maxIterations
    );
    const terms = topTermsPerCluster(
      documents.map((doc) => doc.text),
      labels,
      nComponents,
      this.topTerms
    );

    const topics: Topic[] = terms.map((topicTerms, id) => ({
      id,
      terms: topicTerms,
      docCount: labels.filter((label) => label === id).length
    }));

    const assignments: TopicAssignment[] = documents.map((doc, i) => ({
      arxivId: doc.arxivId,
      weights: centroids.map((centroid) => roundTo(cosineSimilarity(doc.embedding, centroid))),
      dominant: labels[i]
    }));

    return { topics, assignments };
  }
}

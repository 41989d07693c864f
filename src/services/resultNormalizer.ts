import { SearchMode, SearchResponse, SearchResult, SearchResultId, StoreBatch, StoreHit } from '../types';

const RESERVED_KEYS = new Set(['id', 'distance', 'score', 'entity']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hitId(hit: StoreHit): SearchResultId {
  const { id } = hit;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

function hitScore(hit: StoreHit): number {
  if (typeof hit.distance === 'number') return hit.distance;
  if (typeof hit.score === 'number') return hit.score;
  return 0;
}

function hitEntity(hit: StoreHit): Record<string, unknown> {
  if (isRecord(hit.entity)) return hit.entity;
  const entity: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(hit)) {
    if (!RESERVED_KEYS.has(key)) entity[key] = value;
  }
  return entity;
}

export function normalizeHit(hit: StoreHit): SearchResult {
  return { id: hitId(hit), distance: hitScore(hit), entity: hitEntity(hit) };
}

// Batches arrive in ranking order; no deduplication across them.
export function normalizeHits(batches: StoreBatch[]): SearchResult[] {
  return batches.flat().map(normalizeHit);
}

export function buildSearchResponse(query: string, mode: SearchMode, batches: StoreBatch[]): SearchResponse {
  const results = normalizeHits(batches);
  return {
    query,
    search_type: mode,
    results,
    count: results.length
  };
}

import type { SEARCH_MODES } from '../config/search/constants';

export type SearchMode = (typeof SEARCH_MODES)[number];

export interface SearchFilter {
  title?: string;
}

export interface SearchRequest {
  query: string;
  mode: SearchMode;
  limit: number;
  returnText: boolean;
  filter?: SearchFilter;
}

export type SearchResultId = string | number | null;

export interface SearchResult {
  id: SearchResultId;
  distance: number;
  entity: Record<string, unknown>;
}

export interface SearchResponse {
  query: string;
  search_type: SearchMode;
  results: SearchResult[];
  count: number;
}

/** Collection and field names a query is built against. */
export interface SearchTarget {
  collection: string;
  lexicalField: string;
  denseField: string;
  textField: string;
}

export interface QueryOptions {
  limit: number;
  filter?: string;
  includeText: boolean;
}

export interface StoreSearchRequest {
  collection: string;
  annsField: string;
  data: string | number[];
  limit: number;
  filter?: string;
  outputFields: string[];
  params?: Record<string, number>;
}

export type StoreSubSearch = Omit<StoreSearchRequest, 'collection' | 'outputFields'>;

export interface RrfRanker {
  strategy: 'rrf';
  k: number;
}

export interface StoreHybridRequest {
  collection: string;
  requests: StoreSubSearch[];
  ranker: RrfRanker;
  limit: number;
  outputFields: string[];
}

export type StoreHit = Record<string, unknown>;
export type StoreBatch = StoreHit[];

export interface SearchStore {
  search(request: StoreSearchRequest): Promise<StoreBatch[]>;
  /** Fused search; the store ranks the sub-searches with the given ranker. */
  hybridSearch(request: StoreHybridRequest): Promise<StoreBatch[]>;
  checkHealth(): Promise<boolean>;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

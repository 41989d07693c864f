export const SEARCH_MODES = ['hybrid', 'bm25', 'semantic', 'exact'] as const;

export const DEFAULT_SEARCH_MODE = 'hybrid';

export const SEARCH_LIMITS = {
  default: 10,
  max: 100
};

// Field names in the collection schema; the sparse field keeps the name it was indexed under.
export const SEARCH_FIELDS = {
  lexical: 'sparce_vector',
  dense: 'dense_vector',
  text: 'text'
};

// Milvus' RRFRanker default.
export const RRF_DEFAULT_K = 60;

export const SPARSE_DROP_RATIO = 0.2;

export const SEARCH_MODE_DESCRIPTIONS = {
  hybrid: 'Combined BM25 + semantic search (default)',
  bm25: 'Keyword-based search',
  semantic: 'Meaning-based search',
  exact: 'Exact phrase matching'
} as const;

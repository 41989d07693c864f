/**
 * Hybrid search: a lexical and a dense ranking fused with Reciprocal Rank Fusion.
 *
 * score(d) = Σ 1/(k + rank(d)). A document missing from one ranking gets
 * nothing from it. Both sub-searches go to the store in one request, each
 * with the same limit and filter, and the store applies the ranker.
 */
import { QueryOptions, SearchStore, SearchTarget, StoreBatch, StoreSearchRequest, StoreSubSearch } from '../types';
import { buildLexicalQuery, buildSemanticQuery } from './queryBuilders';

export interface HybridFuserOptions {
  rrfK: number;
  sparseDropRatio: number;
}

function toSubSearch(request: StoreSearchRequest): StoreSubSearch {
  const { collection: _collection, outputFields: _outputFields, ...sub } = request;
  return sub;
}

export class HybridFuser {
  constructor(private readonly store: SearchStore, private readonly options: HybridFuserOptions) {}

  search(target: SearchTarget, query: string, vector: number[], options: QueryOptions): Promise<StoreBatch[]> {
    const lexical: StoreSearchRequest = {
      ...buildLexicalQuery(target, query, options),
      params: { drop_ratio_search: this.options.sparseDropRatio }
    };
    const semantic = buildSemanticQuery(target, vector, options);

    return this.store.hybridSearch({
      collection: target.collection,
      requests: [toSubSearch(lexical), toSubSearch(semantic)],
      ranker: { strategy: 'rrf', k: this.options.rrfK },
      limit: options.limit,
      outputFields: lexical.outputFields
    });
  }
}

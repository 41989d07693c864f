import { z } from 'zod';
import { config } from '../config/env';
import { DEFAULT_SEARCH_MODE, SEARCH_MODES } from '../config/search/constants';
import { SEARCH_RULES } from '../config/search/validationRules';
import { BackendQueryError, EmbeddingProviderError, ValidationError, errorMessage } from '../errors';
import { Logger, logger as defaultLogger } from '../logger';
import {
  EmbeddingProvider,
  QueryOptions,
  SearchMode,
  SearchRequest,
  SearchResponse,
  SearchStore,
  SearchTarget,
  StoreBatch,
  StoreSearchRequest
} from '../types';
import { compileFilter } from './filterCompiler';
import { HybridFuser } from './hybridFuser';
import { buildExactQuery, buildLexicalQuery, buildSemanticQuery } from './queryBuilders';
import { buildSearchResponse } from './resultNormalizer';

const searchBodySchema = z.object({
  query: z.string().min(SEARCH_RULES.queryMinLength),
  search_type: z.string().default(DEFAULT_SEARCH_MODE),
  limit: z.number().int().min(SEARCH_RULES.limitMin).max(SEARCH_RULES.limitMax).default(SEARCH_RULES.limitDefault),
  return_text: z.boolean().default(true),
  filter: z
    .object({
      title: z.string().nullish()
    })
    .nullish()
});

/** Validates a raw request body. This is the only place a raw mode string is accepted. */
export function parseSearchRequest(body: unknown): SearchRequest {
  const parsed = searchBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid search request', parsed.error.flatten());
  }

  const requested = parsed.data.search_type.toLowerCase();
  const mode = SEARCH_MODES.find((m) => m === requested);
  if (!mode) {
    throw new ValidationError(`Invalid search_type. Must be one of: ${SEARCH_MODES.join(', ')}`);
  }

  const title = parsed.data.filter?.title ?? undefined;
  return {
    query: parsed.data.query,
    mode,
    limit: parsed.data.limit,
    returnText: parsed.data.return_text,
    filter: title === undefined ? undefined : { title }
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled search mode: ${String(value)}`);
}

export interface SearchServiceOptions {
  store: SearchStore;
  embedder: EmbeddingProvider;
  target: SearchTarget;
  rrfK: number;
  sparseDropRatio: number;
  logger?: Logger;
}

export class SearchService {
  private readonly store: SearchStore;
  private readonly embedder: EmbeddingProvider;
  private readonly target: SearchTarget;
  private readonly fuser: HybridFuser;
  private readonly log: Logger;

  constructor(options: SearchServiceOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.target = options.target;
    this.fuser = new HybridFuser(options.store, {
      rrfK: options.rrfK,
      sparseDropRatio: options.sparseDropRatio
    });
    this.log = options.logger ?? defaultLogger;
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const options: QueryOptions = {
      limit: request.limit,
      filter: compileFilter(request.filter),
      includeText: request.returnText
    };

    const batches = await this.dispatch(request.mode, request.query, options);
    return buildSearchResponse(request.query, request.mode, batches);
  }

  private async dispatch(mode: SearchMode, query: string, options: QueryOptions): Promise<StoreBatch[]> {
    switch (mode) {
      case 'bm25':
        return this.query(buildLexicalQuery(this.target, query, options));
      case 'exact':
        return this.query(buildExactQuery(this.target, query, options));
      case 'semantic': {
        const vector = await this.embed(query);
        return this.query(buildSemanticQuery(this.target, vector, options));
      }
      case 'hybrid': {
        const vector = await this.embed(query);
        this.log.debug({ mode, limit: options.limit, filter: options.filter }, 'hybrid search');
        return this.run(() => this.fuser.search(this.target, query, vector, options));
      }
      default:
        return assertNever(mode);
    }
  }

  private async embed(query: string): Promise<number[]> {
    try {
      return await this.embedder.embed(query);
    } catch (err) {
      if (err instanceof EmbeddingProviderError) throw err;
      throw new EmbeddingProviderError(`Error generating embedding: ${errorMessage(err)}`, err);
    }
  }

  private query(request: StoreSearchRequest): Promise<StoreBatch[]> {
    this.log.debug(
      { field: request.annsField, limit: request.limit, filter: request.filter, outputFields: request.outputFields },
      'store search'
    );
    return this.run(() => this.store.search(request));
  }

  private async run(call: () => Promise<StoreBatch[]>): Promise<StoreBatch[]> {
    try {
      return await call();
    } catch (err) {
      throw new BackendQueryError(`Search failed: ${errorMessage(err)}`, err);
    }
  }
}

export function createSearchService(
  deps: { store: SearchStore; embedder: EmbeddingProvider; logger?: Logger }
): SearchService {
  return new SearchService({
    ...deps,
    target: {
      collection: config.MILVUS_COLLECTION_NAME,
      lexicalField: config.MILVUS_LEXICAL_FIELD,
      denseField: config.MILVUS_DENSE_FIELD,
      textField: config.MILVUS_TEXT_FIELD
    },
    rrfK: config.RRF_K,
    sparseDropRatio: config.SPARSE_DROP_RATIO
  });
}

import {
  ErrorCode,
  HasCollectionReq,
  HybridSearchReq,
  MilvusClient,
  RRFRanker,
  SearchSimpleReq
} from '@zilliz/milvus2-sdk-node';
import { z } from 'zod';
import { config } from '../config/env';
import { BackendQueryError, errorMessage } from '../errors';
import {
  SearchStore,
  StoreBatch,
  StoreHybridRequest,
  StoreSearchRequest,
  StoreSubSearch
} from '../types';

interface MilvusStatus {
  error_code: string | number;
  reason: string;
}

/** The part of `MilvusClient` the store calls. */
export interface MilvusSearchClient {
  search(request: SearchSimpleReq): Promise<{ status: MilvusStatus; results: unknown }>;
  hybridSearch(request: HybridSearchReq): Promise<{ status: MilvusStatus; results: unknown }>;
  hasCollection(request: HasCollectionReq): Promise<{ status: MilvusStatus; value: Boolean }>;
}

const hitSchema = z.record(z.unknown());
const batchSchema = z.array(hitSchema);
const batchesSchema = z.array(batchSchema);

function subSearch(sub: StoreSubSearch) {
  return {
    anns_field: sub.annsField,
    data: sub.data,
    limit: sub.limit,
    ...(sub.filter ? { expr: sub.filter } : {}),
    ...(sub.params ? { params: sub.params } : {})
  };
}

export class MilvusStore implements SearchStore {
  constructor(private readonly client: MilvusSearchClient, private readonly collection: string) {}

  async search(request: StoreSearchRequest): Promise<StoreBatch[]> {
    const req: SearchSimpleReq = {
      collection_name: request.collection,
      data: request.data,
      anns_field: request.annsField,
      limit: request.limit,
      output_fields: request.outputFields
    };
    if (request.filter) req.filter = request.filter;
    if (request.params) req.params = request.params;

    const res = await this.call('search', () => this.client.search(req));
    return this.toBatches('search', res.results);
  }

  async hybridSearch(request: StoreHybridRequest): Promise<StoreBatch[]> {
    const searches = request.requests.map(subSearch);
    const res = await this.call('hybrid_search', () =>
      this.client.hybridSearch({
        collection_name: request.collection,
        data: searches,
        rerank: RRFRanker(request.ranker.k),
        limit: request.limit,
        output_fields: request.outputFields
      })
    );
    return this.toBatches('hybrid_search', res.results);
  }

  async checkHealth(): Promise<boolean> {
    const res = await this.call('has_collection', () => this.client.hasCollection({ collection_name: this.collection }));
    return res.value.valueOf();
  }

  private async call<T extends { status: MilvusStatus }>(operation: string, run: () => Promise<T>): Promise<T> {
    let res: T;
    try {
      res = await run();
    } catch (err) {
      throw new BackendQueryError(`milvus ${operation}: ${errorMessage(err)}`, err);
    }
    if (res.status.error_code !== ErrorCode.SUCCESS) {
      throw new BackendQueryError(`milvus ${operation} (${res.status.error_code}): ${res.status.reason}`);
    }
    return res;
  }

  // One batch per query vector; a single-vector search comes back flat.
  private toBatches(operation: string, results: unknown): StoreBatch[] {
    const nested = batchesSchema.safeParse(results ?? []);
    if (nested.success) {
      return nested.data.length ? nested.data : [[]];
    }
    const flat = batchSchema.safeParse(results);
    if (flat.success) {
      return [flat.data];
    }
    throw new BackendQueryError(`milvus ${operation}: malformed hit list`, flat.error);
  }
}

export function createMilvusStore(): MilvusStore {
  const client = new MilvusClient({ address: config.MILVUS_URI, token: config.MILVUS_TOKEN });
  return new MilvusStore(client, config.MILVUS_COLLECTION_NAME);
}

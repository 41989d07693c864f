import { z } from 'zod';
import { config } from '../config/env';
import { EmbeddingProviderError, errorMessage } from '../errors';
import { EmbeddingProvider } from '../types';
import { fetchJson } from './httpClient';

const valuesSchema = z.object({ values: z.array(z.number()) });

const embeddingResponseSchema = z.union([
  z.object({ embedding: valuesSchema }),
  z.object({ embeddings: z.array(valuesSchema) })
]);

export interface GeminiEmbeddingOptions {
  apiKey: string;
  endpoint: string;
  model: string;
  dimensions: number;
  taskType: string;
}

/**
 * Embeds one text per call through the Gemini `embedContent` endpoint.
 * When the response holds several embeddings only the first is used.
 */
export class GeminiEmbeddingClient implements EmbeddingProvider {
  constructor(private readonly options: GeminiEmbeddingOptions) {}

  async embed(text: string): Promise<number[]> {
    const { apiKey, endpoint, model, dimensions, taskType } = this.options;

    let raw: unknown;
    try {
      raw = await fetchJson(
        `${endpoint.replace(/\/$/, '')}/models/${model}:embedContent`,
        {
          headers: { 'x-goog-api-key': apiKey },
          body: {
            model: `models/${model}`,
            content: { parts: [{ text }] },
            taskType,
            outputDimensionality: dimensions
          }
        },
        'embedContent'
      );
    } catch (err) {
      throw new EmbeddingProviderError(`Error generating embedding: ${errorMessage(err)}`, err);
    }

    const parsed = embeddingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingProviderError('Error generating embedding: unsupported embedding response shape', parsed.error);
    }

    const vector = 'embedding' in parsed.data ? parsed.data.embedding.values : parsed.data.embeddings[0]?.values;
    if (!vector) {
      throw new EmbeddingProviderError('Error generating embedding: provider returned no embeddings');
    }
    if (vector.length !== dimensions) {
      throw new EmbeddingProviderError(
        `Error generating embedding: expected ${dimensions} dimensions, got ${vector.length}`
      );
    }
    return vector;
  }
}

export function createEmbeddingClient(): GeminiEmbeddingClient {
  return new GeminiEmbeddingClient({
    apiKey: config.GEMINI_API_KEY,
    endpoint: config.EMBEDDING_ENDPOINT,
    model: config.EMBEDDING_MODEL,
    dimensions: config.EMBEDDING_DIMENSIONS,
    taskType: config.EMBEDDING_TASK_TYPE
  });
}

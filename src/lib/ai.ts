import OpenAI from 'openai';
import type { EmbeddingProvider } from '@/types';

export const DEFAULT_EMBEDDING_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_EMBEDDING_MODEL = 'openai/text-embedding-3-small';

/** The slice of the openai SDK the provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[] }): Promise<{
      data: Array<{ index: number; embedding: number[] }>;
    }>;
  };
}

export interface EmbeddingOptions {
  apiKey: string;
  baseURL?: string;
  model?: string;
  /** Pre-built client; tests pass a fake. */
  client?: EmbeddingsClient;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: EmbeddingsClient;
  readonly model: string;

  constructor(options: EmbeddingOptions) {
    this.model = options.model || DEFAULT_EMBEDDING_MODEL;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL || DEFAULT_EMBEDDING_BASE_URL,
      });
  }

  async embed(text: string) {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]) {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create({ model: this.model, input: texts });
    // Providers may answer out of order; `index` points back into the input.
    const data = [...response.data].sort((a, b) => a.index - b.index);
    if (data.length !== texts.length) {
      throw new Error(`Embedding API returned ${data.length} vectors for ${texts.length} inputs`);
    }
    return data.map((item) => item.embedding);
  }
}

import { createOpenAI } from '@ai-sdk/openai';
import { embedMany } from 'ai';
import { DEFAULT_EMBEDDING_MODEL, SearchErrorCode, createSearchError } from '@transcut/core';
import type { EmbeddingProvider, Logger } from '@transcut/core';

export interface AiEmbeddingProviderOptions {
  /** Falls back to `OPENAI_API_KEY`. */
  apiKey?: string;
  model?: string;
  logger?: Partial<Logger>;
}

/**
 * EmbeddingProvider over the AI SDK's `embedMany` with an OpenAI embedding
 * model. The client is created on first use so that constructing the
 * provider never requires a key.
 */
export function createAiEmbeddingProvider(options: AiEmbeddingProviderOptions = {}): EmbeddingProvider {
  const modelId = options.model ?? DEFAULT_EMBEDDING_MODEL;
  const logger = options.logger ?? {};
  let client: ReturnType<typeof createOpenAI> | null = null;

  const ensure = (): ReturnType<typeof createOpenAI> => {
    if (client) {
      return client;
    }
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw createSearchError(SearchErrorCode.CAPABILITY_UNAVAILABLE, 'OPENAI_API_KEY is required for semantic search', {
        suggestion: 'Set OPENAI_API_KEY in your environment or .env file.',
      });
    }
    client = createOpenAI({ apiKey });
    return client;
  };

  return {
    name: `openai:${modelId}`,
    async embed(texts) {
      if (texts.length === 0) {
        return [];
      }
      const openai = ensure();
      logger.debug?.('embeddings.request', { model: modelId, values: texts.length });
      const { embeddings } = await embedMany({
        model: openai.embedding(modelId),
        values: texts,
      });
      return embeddings;
    },
  };
}

// src/services/llm/LangChainTextEmbedder.ts
import { Embeddings } from '@langchain/core/embeddings';
import { TextEmbedder } from '../../types/rag.types';

/** TextEmbedder over a LangChain Embeddings implementation. */
export class LangChainTextEmbedder implements TextEmbedder {
  constructor(private embeddings: Embeddings) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    signal?.throwIfAborted();
    const vector = await this.embeddings.embedQuery(text);
    signal?.throwIfAborted();
    return vector;
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    signal?.throwIfAborted();
    if (texts.length === 0) return [];
    const vectors = await this.embeddings.embedDocuments(texts);
    signal?.throwIfAborted();
    return vectors;
  }
}

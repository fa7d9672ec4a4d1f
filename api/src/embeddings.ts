// api/src/embeddings.ts
import type OpenAI from "openai";
import { config } from "./config.js";
import type { EmbeddingBackend } from "./knowledgeRetriever.js";
import { errorMessage } from "./middleware/errorHandler.js";

// knowledge_chunks.embedding is vector(1536)
export const EMBEDDING_DIMENSIONS = 1536;

export class OpenAIEmbeddingBackend implements EmbeddingBackend {
  constructor(
    private readonly client: OpenAI | null,
    private readonly model: string = config.embeddingModel
  ) {}

  isConfigured(): boolean {
    return this.client !== null;
  }

  async embed(text: string): Promise<number[] | null> {
    if (!this.client) return null;
    const input = text.trim();
    if (!input) return null;
    try {
      const res = await this.client.embeddings.create({ model: this.model, input });
      const vector = res.data[0]?.embedding ?? null;
      if (!vector || vector.length !== EMBEDDING_DIMENSIONS) {
        console.warn(`[EMBED] unexpected vector size ${vector?.length ?? 0} from ${this.model}`);
        return null;
      }
      return vector;
    } catch (err) {
      console.warn("[EMBED] embedding request failed:", errorMessage(err));
      return null;
    }
  }
}

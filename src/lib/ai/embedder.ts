// lib/ai/embedder.ts
import type { OpenAIProvider } from "@ai-sdk/openai";
import { embed } from "ai";

export interface Embedder {
  readonly modelName: string;
  embedText(text: string): Promise<number[]>;
}

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly provider: OpenAIProvider,
    readonly modelName: string
  ) {}

  async embedText(text: string): Promise<number[]> {
    const { embedding } = await embed({
      model: this.provider.textEmbeddingModel(this.modelName),
      value: text,
      maxRetries: 2,
    });
    return embedding;
  }
}

import OpenAI from "openai";
import { IEmbedder } from "../../application/contracts/ILongTermMemory";

export class OpenAIEmbedder implements IEmbedder {
  private client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string = "text-embedding-3-small",
    private readonly dimensions?: number
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
      ...(this.dimensions ? { dimensions: this.dimensions } : {})
    });

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }
}

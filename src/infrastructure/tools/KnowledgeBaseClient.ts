import fetch, { RequestInit, Response } from "node-fetch";
import { z } from "zod";
import type { Logger } from "pino";
import { describeCause } from "../../domain/errors/AgentErrors";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface KnowledgeBaseConfig {
  baseUrl: string;
  apiKey: string;
  chatId: string;
  timeoutMs?: number;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional()
      })
    )
    .optional()
});

/**
 * Retrieval against a RAGFlow assistant through its OpenAI-compatible chat
 * endpoint. Failures come back as text so the model can tell the user.
 */
export class KnowledgeBaseClient {
  private readonly baseUrl: string;

  constructor(
    private readonly config: KnowledgeBaseConfig,
    private readonly logger: Logger,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
  }

  isConfigured(): boolean {
    return this.config.apiKey !== "" && this.config.chatId !== "";
  }

  async retrieve(query: string): Promise<string> {
    if (!this.isConfigured()) {
      this.logger.warn(
        { apiKeySet: this.config.apiKey !== "", chatIdSet: this.config.chatId !== "" },
        "knowledge_base_not_configured"
      );
      return "Knowledge base is not configured. Please provide API key and chat id.";
    }

    const url = `${this.baseUrl}/chats_openai/${this.config.chatId}/chat/completions`;

    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          model: "ragflow",
          messages: [{ role: "user", content: query }],
          stream: false
        }),
        timeout: this.config.timeoutMs ?? 30_000
      });

      if (!response.ok) {
        this.logger.error({ status: response.status }, "knowledge_base_api_error");
        return `Error communicating with knowledge base: ${response.status} ${response.statusText}`;
      }

      const data = completionSchema.parse(await response.json());
      const choice = data.choices?.at(0);
      if (!choice) {
        return "No response from knowledge base.";
      }

      this.logger.info({ query }, "knowledge_base_retrieval_successful");
      return choice.message?.content ?? "";
    } catch (error) {
      this.logger.error({ err: error }, "knowledge_base_unexpected_error");
      return `An unexpected error occurred while querying the knowledge base: ${describeCause(error)}`;
    }
  }
}

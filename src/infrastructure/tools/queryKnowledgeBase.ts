import { z } from "zod";
import type { Logger } from "pino";
import { ITool } from "../../application/contracts/ITool";
import { KnowledgeBaseClient } from "./KnowledgeBaseClient";

const schema = z.object({
  query: z.string().min(1).describe("The search query to look up in the knowledge base.")
});

export function createQueryKnowledgeBaseTool(client: KnowledgeBaseClient, logger: Logger): ITool<typeof schema> {
  return {
    name: "query_knowledge_base",
    description:
      "Searches the unified knowledge base for information related to the query. " +
      "Use it whenever you need factual information, documentation or domain knowledge " +
      "that might be stored in the internal knowledge base.",
    schema,
    async invoke({ query }) {
      logger.info({ query }, "query_knowledge_base_tool_called");
      return client.retrieve(query);
    }
  };
}

import { Pool } from "pg";
import { env, validateEnv } from "./config/env";
import { MEMORY_EXTRACTION_PROMPT_ID, PromptManager } from "./config/PromptManager";
import { buildServer } from "./server";

// Application
import { AgentStateMachine } from "./application/agent/AgentStateMachine";
import { GenerateResponse } from "./application/use-cases/GenerateResponse";
import { StreamResponse } from "./application/use-cases/StreamResponse";
import { GetChatHistory } from "./application/use-cases/GetChatHistory";
import { ClearChatHistory } from "./application/use-cases/ClearChatHistory";
import { ICheckpointStore } from "./application/contracts/ICheckpointStore";
import { IVectorStore } from "./application/contracts/ILongTermMemory";

// Infrastructure
import { createLogger } from "./infrastructure/logging/logger";
import { KeyedMutex } from "./infrastructure/concurrency/KeyedMutex";
import { GracefulShutdown } from "./infrastructure/lifecycle/GracefulShutdown";
import { LLMRouter } from "./infrastructure/llm/LLMRouter";
import { OpenAIAdapter } from "./infrastructure/llm/OpenAIAdapter";
import { buildModelBackends } from "./infrastructure/llm/modelRegistry";
import { InMemoryVectorStore } from "./infrastructure/memory/InMemoryVectorStore";
import { LLMFactExtractor } from "./infrastructure/memory/LLMFactExtractor";
import { LongTermMemory } from "./infrastructure/memory/LongTermMemory";
import { MemoryUpdateQueue } from "./infrastructure/memory/MemoryUpdateQueue";
import { OpenAIEmbedder } from "./infrastructure/memory/OpenAIEmbedder";
import { PgVectorStore } from "./infrastructure/memory/PgVectorStore";
import { createPool } from "./infrastructure/persistence/pgPool";
import { InMemoryCheckpointStore } from "./infrastructure/persistence/InMemoryCheckpointStore";
import { PgCheckpointStore } from "./infrastructure/persistence/PgCheckpointStore";
import { KnowledgeBaseClient } from "./infrastructure/tools/KnowledgeBaseClient";
import { ToolRegistry } from "./infrastructure/tools/ToolRegistry";
import { createQueryKnowledgeBaseTool } from "./infrastructure/tools/queryKnowledgeBase";

async function bootstrap() {
  const logger = createLogger({ level: env.LOG_LEVEL, pretty: env.NODE_ENV === "development" });

  try {
    validateEnv(env, logger);

    const shutdown = new GracefulShutdown({ logger, timeoutMs: env.SHUTDOWN_TIMEOUT_MS });
    const prompts = new PromptManager(logger);

    // Storage: Postgres when configured, process memory otherwise
    let pool: Pool | null = null;
    let checkpoints: ICheckpointStore;
    let vectorStore: IVectorStore;
    if (env.DATABASE_URL) {
      pool = createPool(
        {
          connectionString: env.DATABASE_URL,
          maxConnections: env.POSTGRES_POOL_SIZE,
          acquireTimeoutMs: env.POSTGRES_POOL_TIMEOUT_MS
        },
        logger
      );
      const pgCheckpoints = new PgCheckpointStore(pool, logger);
      const pgVectors = new PgVectorStore(pool, env.LONG_TERM_MEMORY_EMBEDDING_DIMS, logger);
      await pgCheckpoints.initialize();
      await pgVectors.initialize();
      checkpoints = pgCheckpoints;
      vectorStore = pgVectors;
    } else {
      checkpoints = new InMemoryCheckpointStore();
      vectorStore = new InMemoryVectorStore();
    }

    // Tools
    const knowledgeBase = new KnowledgeBaseClient(
      { baseUrl: env.RAGFLOW_BASE_URL, apiKey: env.RAGFLOW_API_KEY, chatId: env.RAGFLOW_CHAT_ID },
      logger
    );
    const tools = new ToolRegistry([createQueryKnowledgeBaseTool(knowledgeBase, logger)], logger);

    // Model dispatch
    const router = new LLMRouter(buildModelBackends(env, logger), {
      logger,
      defaultBackend: env.DEFAULT_LLM_MODEL,
      maxAttempts: env.MAX_LLM_CALL_RETRIES,
      baseDelayMs: env.LLM_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.LLM_RETRY_MAX_DELAY_MS
    }).bindTools(tools.specs());

    // Long-term memory
    const memoryModel = new OpenAIAdapter(
      {
        name: env.LONG_TERM_MEMORY_MODEL,
        provider: "openai",
        params: { maxTokens: 1000, temperature: 0 },
        priority: 0
      },
      { apiKey: env.OPENAI_API_KEY, timeoutMs: env.LLM_TIMEOUT_MS }
    );
    const memory = new LongTermMemory(
      new LLMFactExtractor(memoryModel, prompts.render(MEMORY_EXTRACTION_PROMPT_ID), logger),
      new OpenAIEmbedder(env.OPENAI_API_KEY, env.LONG_TERM_MEMORY_EMBEDDER_MODEL, env.LONG_TERM_MEMORY_EMBEDDING_DIMS),
      vectorStore,
      { topK: env.LONG_TERM_MEMORY_TOP_K, logger }
    );
    const memoryQueue = new MemoryUpdateQueue({
      logger,
      maxQueueSize: env.MEMORY_QUEUE_SIZE,
      concurrency: env.MEMORY_QUEUE_CONCURRENCY
    });

    const agent = new AgentStateMachine({
      model: router,
      tools,
      checkpoints,
      prompts,
      locks: new KeyedMutex(),
      logger,
      maxContextTokens: env.MAX_CONTEXT_TOKENS
    });

    const app = await buildServer({
      generateResponse: new GenerateResponse(agent, memory, memoryQueue, logger),
      streamResponse: new StreamResponse(agent, memory, memoryQueue, logger),
      getChatHistory: new GetChatHistory(agent),
      clearChatHistory: new ClearChatHistory(agent),
      logger,
      rateLimit: { max: env.RATE_LIMIT_MAX, timeWindow: env.RATE_LIMIT_WINDOW }
    });

    // Tasks run in registration order, so the server stops before the queue drains
    shutdown.addCleanupTask("http_server", () => app.close());
    shutdown.addCleanupTask("memory_update_queue", () => memoryQueue.close());
    if (pool) {
      const database = pool;
      shutdown.addCleanupTask("postgres_pool", () => database.end());
    }
    shutdown.listen();

    await app.listen({ port: env.PORT, host: "0.0.0.0" });
    logger.info({ port: env.PORT, backends: router.backendNames }, "server_started");
  } catch (err) {
    logger.fatal({ err }, "bootstrap_failed");
    process.exit(1);
  }
}

void bootstrap();

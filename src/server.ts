import Fastify from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { z, ZodError } from "zod";
import type { Logger } from "pino";
import { GenerateResponse } from "./application/use-cases/GenerateResponse";
import { StreamResponse } from "./application/use-cases/StreamResponse";
import { GetChatHistory } from "./application/use-cases/GetChatHistory";
import { ClearChatHistory } from "./application/use-cases/ClearChatHistory";
import {
  AllBackendsExhaustedError,
  CheckpointWriteError,
  describeCause,
  ResourceExhaustedError
} from "./domain/errors/AgentErrors";

export interface ServerDeps {
  generateResponse: GenerateResponse;
  streamResponse: StreamResponse;
  getChatHistory: GetChatHistory;
  clearChatHistory: ClearChatHistory;
  logger: Logger;
  rateLimit?: { max: number; timeWindow: string };
}

const messageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string().min(1).max(3000)
});

const chatRequestSchema = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  messages: z.array(messageSchema).min(1)
});

const sessionQuerySchema = z.object({
  sessionId: z.string().min(1)
});

const PREFIX = "/api/v1/chatbot";

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({ logger: deps.logger });

  await app.register(cors);
  await app.register(rateLimit, {
    max: deps.rateLimit?.max ?? 100,
    timeWindow: deps.rateLimit?.timeWindow ?? "1 minute"
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(422).send({ error: "Validation Error", issues: error.issues });
    }
    if (error instanceof AllBackendsExhaustedError || error instanceof ResourceExhaustedError) {
      request.log.error({ err: error }, "service_unavailable");
      return reply.status(503).send({ error: "Service Unavailable", message: error.message });
    }
    if (error instanceof CheckpointWriteError) {
      request.log.error({ err: error }, "checkpoint_failed");
      return reply.status(500).send({ error: "Checkpoint Error", message: error.message });
    }

    const status = error.statusCode ?? 500;
    if (status >= 500) request.log.error({ err: error }, "request_failed");
    return reply.status(status).send({
      error: status >= 500 ? "Internal Server Error" : "Request Error",
      message: error.message
    });
  });

  app.get("/health", async () => ({ status: "ok" }));

  app.post(`${PREFIX}/chat`, async request => {
    const body = chatRequestSchema.parse(request.body);
    return deps.generateResponse.execute({
      threadId: body.sessionId,
      userId: body.userId,
      messages: body.messages
    });
  });

  app.post(`${PREFIX}/chat/stream`, async (request, reply) => {
    const body = chatRequestSchema.parse(request.body);

    reply.hijack();
    reply.raw.writeHead(200, {
      ...reply.getHeaders(),
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive"
    });

    try {
      const fragments = deps.streamResponse.execute({
        threadId: body.sessionId,
        userId: body.userId,
        messages: body.messages
      });
      for await (const fragment of fragments) {
        reply.raw.write(`data: ${JSON.stringify(fragment)}\n\n`);
      }
    } catch (error) {
      request.log.error({ err: error }, "stream_failed");
      reply.raw.write(`data: ${JSON.stringify({ content: "", done: true, error: describeCause(error) })}\n\n`);
    } finally {
      reply.raw.end();
    }
  });

  app.get(`${PREFIX}/messages`, async request => {
    const { sessionId } = sessionQuerySchema.parse(request.query);
    return { messages: await deps.getChatHistory.execute(sessionId) };
  });

  app.delete(`${PREFIX}/messages`, async request => {
    const { sessionId } = sessionQuerySchema.parse(request.query);
    await deps.clearChatHistory.execute(sessionId);
    return { message: "Chat history cleared" };
  });

  return app;
}

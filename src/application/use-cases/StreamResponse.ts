import type { Logger } from "pino";
import { Message } from "../../domain/entities/Message";
import { AgentStateMachine } from "../agent/AgentStateMachine";
import { IBackgroundQueue } from "../contracts/IBackgroundQueue";
import { ILongTermMemory } from "../contracts/ILongTermMemory";
import { ChatInput } from "./GenerateResponse";
import { resolveMemoryContext } from "./resolveMemoryContext";

export type StreamFragment =
  | { content: string; done: false }
  | { content: ""; done: true };

export class StreamResponse {
  private readonly logger: Logger;

  constructor(
    private agent: AgentStateMachine,
    private memory: ILongTermMemory,
    private memoryQueue: IBackgroundQueue,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "stream-response" });
  }

  /** Assistant text as it is produced, closed by a single `done` fragment. */
  async *execute(input: ChatInput): AsyncGenerator<StreamFragment> {
    const longTermMemoryContext = await resolveMemoryContext(this.memory, input.userId, input.messages, this.logger);

    let conversation: Message[] = [];
    for await (const event of this.agent.stream(input.threadId, { messages: input.messages, longTermMemoryContext })) {
      if (event.type === "completed") {
        conversation = event.result.state.messages;
      } else if (event.message.role === "assistant" && event.message.content.trim().length > 0) {
        yield { content: event.message.content, done: false };
      }
    }

    this.memoryQueue.enqueue({
      name: "long_term_memory_add",
      meta: { userId: input.userId, threadId: input.threadId },
      run: () => this.memory.add(conversation, input.userId)
    });

    yield { content: "", done: true };
  }
}

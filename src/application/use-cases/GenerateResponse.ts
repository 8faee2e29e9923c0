import type { Logger } from "pino";
import { Message, toTranscript } from "../../domain/entities/Message";
import { AgentStateMachine } from "../agent/AgentStateMachine";
import { IBackgroundQueue } from "../contracts/IBackgroundQueue";
import { ILongTermMemory } from "../contracts/ILongTermMemory";
import { resolveMemoryContext } from "./resolveMemoryContext";

export interface ChatInput {
  threadId: string;
  userId: string;
  messages: Message[];
}

export interface ChatOutput {
  messages: Message[];
}

export class GenerateResponse {
  private readonly logger: Logger;

  constructor(
    private agent: AgentStateMachine,
    private memory: ILongTermMemory,
    private memoryQueue: IBackgroundQueue,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "generate-response" });
  }

  async execute(input: ChatInput): Promise<ChatOutput> {
    // 1. Recall long-term facts about the user
    const longTermMemoryContext = await resolveMemoryContext(this.memory, input.userId, input.messages, this.logger);

    // 2. Run the turn loop on the thread
    const result = await this.agent.invoke(input.threadId, {
      messages: input.messages,
      longTermMemoryContext
    });

    // 3. Learn from the conversation off the request path
    const conversation = result.state.messages;
    this.memoryQueue.enqueue({
      name: "long_term_memory_add",
      meta: { userId: input.userId, threadId: input.threadId },
      run: () => this.memory.add(conversation, input.userId)
    });

    this.logger.info(
      { threadId: input.threadId, produced: result.newMessages.length },
      "turn_completed"
    );

    return { messages: toTranscript(result.newMessages) };
  }
}

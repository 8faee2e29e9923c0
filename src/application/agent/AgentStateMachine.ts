import type { Logger } from "pino";
import { CheckpointSnapshot, NextNode } from "../../domain/entities/CheckpointRecord";
import { applyUpdate, ConversationState, emptyState } from "../../domain/entities/ConversationState";
import { hasToolCalls, Message } from "../../domain/entities/Message";
import {
  AgentError,
  CheckpointWriteError,
  describeCause,
  ResourceExhaustedError
} from "../../domain/errors/AgentErrors";
import { trimMessages } from "../../domain/services/ContextTrimmer";
import { ICheckpointStore } from "../contracts/ICheckpointStore";
import { IChatModel } from "../contracts/IModelBackend";
import { ISystemPromptProvider } from "../contracts/ISystemPromptProvider";
import { IThreadLock } from "../contracts/IThreadLock";
import { IToolExecutor } from "../contracts/ITool";
import { AgentStep, Transition } from "./transitions";

export interface AgentStateMachineDeps {
  model: IChatModel;
  tools: IToolExecutor;
  checkpoints: ICheckpointStore;
  prompts: ISystemPromptProvider;
  locks: IThreadLock;
  logger: Logger;
  /** Token budget of the short-term window, system prompt included. */
  maxContextTokens: number;
}

export interface AgentInput {
  messages: Message[];
  longTermMemoryContext: string;
}

export interface TurnResult {
  state: ConversationState;
  /** Messages the nodes produced during this call, in order. */
  newMessages: Message[];
}

export type AgentStreamEvent =
  | { type: "message"; message: Message }
  | { type: "completed"; result: TurnResult };

/**
 * The turn loop: RESPOND asks the model for a reply, TOOLCALL answers every
 * tool call in it, and the loop returns to RESPOND until the model answers
 * without tools. State is checkpointed after every node so a thread can be
 * resumed from its last step.
 *
 * RESPOND/TOOLCALL round trips are not capped.
 */
export class AgentStateMachine {
  private readonly logger: Logger;

  constructor(private readonly deps: AgentStateMachineDeps) {
    this.logger = deps.logger.child({ component: "agent" });
  }

  async invoke(threadId: string, input: AgentInput): Promise<TurnResult> {
    return this.deps.locks.runExclusive(threadId, () => this.drain(this.run(threadId, input)));
  }

  /**
   * Yields each message a node produces once its step is checkpointed, then a
   * final `completed` event. The thread stays locked until the consumer is done.
   */
  async *stream(threadId: string, input: AgentInput): AsyncGenerator<AgentStreamEvent> {
    const release = await this.deps.locks.acquire(threadId);
    try {
      const steps = this.run(threadId, input);
      let next = await steps.next();
      while (!next.done) {
        for (const message of next.value.transition.update.messages) {
          yield { type: "message", message };
        }
        next = await steps.next();
      }
      yield { type: "completed", result: next.value };
    } finally {
      release();
    }
  }

  /** Continues a thread interrupted between steps; a finished thread is returned as is. */
  async resume(threadId: string): Promise<TurnResult> {
    return this.deps.locks.runExclusive(threadId, () => this.drain(this.run(threadId, null)));
  }

  async getState(threadId: string): Promise<ConversationState> {
    const latest = await this.deps.checkpoints.getLatest(threadId);
    return latest?.state ?? emptyState();
  }

  /** Starts the thread over. Earlier checkpoints stay in the log. */
  async clear(threadId: string): Promise<void> {
    await this.deps.locks.runExclusive(threadId, async () => {
      const latest = await this.deps.checkpoints.getLatest(threadId);
      if (!latest) return;
      await this.persist(threadId, { state: emptyState(), next: "TERMINAL" }, latest.sequenceNo);
      this.logger.info({ threadId }, "thread_cleared");
    });
  }

  private async drain(steps: AsyncGenerator<AgentStep, TurnResult>): Promise<TurnResult> {
    let next = await steps.next();
    while (!next.done) {
      next = await steps.next();
    }
    return next.value;
  }

  private async *run(threadId: string, input: AgentInput | null): AsyncGenerator<AgentStep, TurnResult> {
    const latest = await this.deps.checkpoints.getLatest(threadId);
    let state = latest?.state ?? emptyState();
    let sequenceNo = latest?.sequenceNo ?? null;
    let pendingInput = input;
    const produced: Message[] = [];

    // A snapshot still waiting on TOOLCALL finishes that step before new input is merged.
    let node: NextNode = latest?.next ?? (input ? "RESPOND" : "TERMINAL");
    if (node === "TERMINAL" && input) node = "RESPOND";

    while (node !== "TERMINAL") {
      if (node === "RESPOND" && pendingInput) {
        state = applyUpdate(state, pendingInput);
        pendingInput = null;
      }

      const transition = node === "RESPOND" ? await this.respond(state) : await this.callTools(state);
      state = applyUpdate(state, transition.update);
      sequenceNo = await this.persist(threadId, { state, next: transition.next }, sequenceNo);
      produced.push(...transition.update.messages);

      this.logger.debug({ threadId, node, next: transition.next, sequenceNo }, "agent_step_completed");
      yield { node, sequenceNo, transition };
      node = transition.next;
    }

    return { state, newMessages: produced };
  }

  private async respond(state: ConversationState): Promise<Transition> {
    const systemPrompt: Message = {
      role: "system",
      content: this.deps.prompts.buildSystemPrompt(state.longTermMemoryContext)
    };

    const window = trimMessages(state.messages, systemPrompt, {
      maxTokens: this.deps.maxContextTokens,
      countTokens: messages => this.deps.model.countTokens(messages),
      onFallback: error => {
        this.logger.warn({ error: describeCause(error) }, "context_trim_failed_using_full_history");
      }
    });

    const reply = await this.deps.model.call(window);
    const update = { messages: [reply] };
    return hasToolCalls(reply) ? { next: "TOOLCALL", update } : { next: "TERMINAL", update };
  }

  private async callTools(state: ConversationState): Promise<Transition> {
    const last = state.messages.at(-1);
    if (!last || !hasToolCalls(last)) {
      throw new AgentError("TOOLCALL step reached without pending tool calls");
    }

    const results = await Promise.all((last.toolCalls ?? []).map(call => this.deps.tools.execute(call)));
    return { next: "RESPOND", update: { messages: results } };
  }

  private async persist(threadId: string, snapshot: CheckpointSnapshot, previous: number | null): Promise<number> {
    try {
      return await this.deps.checkpoints.append(threadId, snapshot, previous);
    } catch (error) {
      this.logger.error({ threadId, err: error }, "checkpoint_write_failed");
      if (error instanceof CheckpointWriteError || error instanceof ResourceExhaustedError) {
        throw error;
      }
      throw new CheckpointWriteError(threadId, describeCause(error), { cause: error });
    }
  }
}

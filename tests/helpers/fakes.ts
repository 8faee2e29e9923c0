import { z } from "zod";
import { BoundModel, IChatModel, IModelBackend } from "../../src/application/contracts/IModelBackend";
import { ITool, ToolSpec } from "../../src/application/contracts/ITool";
import { ISystemPromptProvider } from "../../src/application/contracts/ISystemPromptProvider";
import { BackgroundJob, IBackgroundQueue } from "../../src/application/contracts/IBackgroundQueue";
import { Message, ToolCall } from "../../src/domain/entities/Message";
import { ModelBackendConfig } from "../../src/domain/entities/ModelBackendConfig";
import { StructuralBackendError } from "../../src/domain/errors/AgentErrors";

export type ScriptStep = Message | Error;

export const user = (content: string): Message => ({ role: "user", content });
export const assistant = (content: string): Message => ({ role: "assistant", content });
export const toolCalls = (...calls: ToolCall[]): Message => ({ role: "assistant", content: "", toolCalls: calls });

/** Error shaped like the provider SDKs' HTTP errors. */
export function httpError(status: number, message = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { status });
}

/** Counts one token per character so windows are easy to reason about. */
export const countChars = (messages: Message[]): number =>
  messages.reduce((total, message) => total + message.content.length, 0);

/** Backend that answers from a script and records every request. */
export class StubBackend implements IModelBackend {
  readonly config: ModelBackendConfig;
  readonly calls: Array<{ messages: Message[]; tools: ToolSpec[] }> = [];
  readonly bindings: ToolSpec[][] = [];
  private readonly script: ScriptStep[];
  private fallback: (() => Error) | null = null;

  constructor(name: string, script: ScriptStep[] = [], priority = 0) {
    this.config = { name, provider: "openai", params: { maxTokens: 100, temperature: 0 }, priority };
    this.script = [...script];
  }

  /** Fails every call with the given error. */
  static failing(name: string, error: () => Error, priority = 0): StubBackend {
    const backend = new StubBackend(name, [], priority);
    backend.fallback = error;
    return backend;
  }

  bindTools(tools: ToolSpec[]): BoundModel {
    this.bindings.push(tools);
    return { invoke: messages => this.invoke(messages, tools) };
  }

  async invoke(messages: Message[], tools: ToolSpec[]): Promise<Message> {
    this.calls.push({ messages, tools });
    const step = this.script.shift();
    if (step instanceof Error) throw step;
    if (step) return step;
    if (this.fallback) throw this.fallback();
    throw new StructuralBackendError(this.config.name, "script exhausted");
  }

  countTokens(messages: Message[]): number {
    return countChars(messages);
  }
}

/** The agent's view of the router, driven by a script. */
export class ScriptedChatModel implements IChatModel {
  readonly calls: Message[][] = [];
  private readonly script: ScriptStep[];

  constructor(script: ScriptStep[] = []) {
    this.script = [...script];
  }

  push(...steps: ScriptStep[]): void {
    this.script.push(...steps);
  }

  async call(messages: Message[]): Promise<Message> {
    this.calls.push(messages);
    const step = this.script.shift();
    if (!step) throw new Error("script exhausted");
    if (step instanceof Error) throw step;
    return step;
  }

  countTokens(messages: Message[]): number {
    return countChars(messages);
  }
}

export const fixedPrompts: ISystemPromptProvider = {
  buildSystemPrompt: context => `system | ${context}`
};

const addSchema = z.object({ a: z.number(), b: z.number() });

export const addTool: ITool<typeof addSchema> = {
  name: "add",
  description: "Adds two numbers.",
  schema: addSchema,
  async invoke({ a, b }) {
    return String(a + b);
  }
};

const explodeSchema = z.object({});

export const explodingTool: ITool<typeof explodeSchema> = {
  name: "explode",
  description: "Always fails.",
  schema: explodeSchema,
  async invoke() {
    throw new Error("boom");
  }
};

/** Holds jobs until a test runs them. */
export class RecordingQueue implements IBackgroundQueue {
  readonly jobs: BackgroundJob[] = [];

  enqueue(job: BackgroundJob): boolean {
    this.jobs.push(job);
    return true;
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Lets every pending promise callback run. */
export const flush = () => new Promise<void>(resolve => setImmediate(resolve));

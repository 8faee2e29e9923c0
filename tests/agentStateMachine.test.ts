import { AgentStateMachine, AgentStreamEvent } from "../src/application/agent/AgentStateMachine";
import { ICheckpointStore } from "../src/application/contracts/ICheckpointStore";
import { Message } from "../src/domain/entities/Message";
import {
  AllBackendsExhaustedError,
  CheckpointWriteError,
  ResourceExhaustedError
} from "../src/domain/errors/AgentErrors";
import { KeyedMutex } from "../src/infrastructure/concurrency/KeyedMutex";
import { silentLogger } from "../src/infrastructure/logging/logger";
import { InMemoryCheckpointStore } from "../src/infrastructure/persistence/InMemoryCheckpointStore";
import { ToolRegistry } from "../src/infrastructure/tools/ToolRegistry";
import {
  addTool,
  assistant,
  explodingTool,
  fixedPrompts,
  ScriptedChatModel,
  toolCalls,
  user
} from "./helpers/fakes";

const CONTEXT = "No relevant memory found.";
const SYSTEM: Message = { role: "system", content: `system | ${CONTEXT}` };

const addCall = toolCalls({ id: "call_1", name: "add", arguments: { a: 2, b: 3 } });
const addResult: Message = { role: "tool", content: "5", toolCallId: "call_1", name: "add" };

describe("AgentStateMachine", () => {
  let store: InMemoryCheckpointStore;
  let model: ScriptedChatModel;
  let locks: KeyedMutex;

  const createAgent = (checkpoints: ICheckpointStore = store) =>
    new AgentStateMachine({
      model,
      tools: new ToolRegistry([addTool, explodingTool], silentLogger()),
      checkpoints,
      prompts: fixedPrompts,
      locks,
      logger: silentLogger(),
      maxContextTokens: 10_000
    });

  const input = (...messages: Message[]) => ({ messages, longTermMemoryContext: CONTEXT });

  beforeEach(() => {
    store = new InMemoryCheckpointStore();
    model = new ScriptedChatModel();
    locks = new KeyedMutex();
  });

  it("answers a plain question in one step", async () => {
    model.push(assistant("4"));
    const agent = createAgent();

    const result = await agent.invoke("t1", input(user("What is 2+2?")));

    expect(result.newMessages).toEqual([assistant("4")]);
    expect(result.state).toEqual({
      messages: [user("What is 2+2?"), assistant("4")],
      longTermMemoryContext: CONTEXT
    });
    expect(model.calls).toEqual([[SYSTEM, user("What is 2+2?")]]);

    const history = store.history("t1");
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ sequenceNo: 1, next: "TERMINAL" });
  });

  it("runs requested tools and answers with their results", async () => {
    model.push(addCall, assistant("The sum is 5"));
    const agent = createAgent();

    const result = await agent.invoke("t1", input(user("Add 2 and 3")));

    expect(result.newMessages).toEqual([addCall, addResult, assistant("The sum is 5")]);
    expect(model.calls[1]).toEqual([SYSTEM, user("Add 2 and 3"), addCall, addResult]);
    expect(store.history("t1").map(r => r.next)).toEqual(["TOOLCALL", "RESPOND", "TERMINAL"]);
  });

  it("answers every tool call of a step in order", async () => {
    const twoCalls = toolCalls(
      { id: "call_1", name: "add", arguments: { a: 1, b: 1 } },
      { id: "call_2", name: "add", arguments: { a: 2, b: 2 } }
    );
    model.push(twoCalls, assistant("2 and 4"));

    const result = await createAgent().invoke("t1", input(user("two sums")));

    expect(result.newMessages.slice(1, 3)).toEqual([
      { role: "tool", content: "2", toolCallId: "call_1", name: "add" },
      { role: "tool", content: "4", toolCallId: "call_2", name: "add" }
    ]);
  });

  it("reports a failing tool to the model and keeps going", async () => {
    model.push(toolCalls({ id: "call_9", name: "explode", arguments: {} }), assistant("Sorry, that failed"));

    const result = await createAgent().invoke("t1", input(user("try it")));

    expect(result.newMessages[1]).toEqual({
      role: "tool",
      content: "Error: boom",
      toolCallId: "call_9",
      name: "explode"
    });
    expect(result.newMessages[2]).toEqual(assistant("Sorry, that failed"));
  });

  it("appends checkpoints without rewriting earlier ones", async () => {
    model.push(assistant("first"), assistant("second"));
    const agent = createAgent();

    await agent.invoke("t1", input(user("a")));
    await agent.invoke("t1", input(user("b")));

    const history = store.history("t1");
    expect(history.map(r => r.sequenceNo)).toEqual([1, 2]);
    expect(history[0].state.messages).toEqual([user("a"), assistant("first")]);
    expect(history[1].state.messages).toEqual([user("a"), assistant("first"), user("b"), assistant("second")]);
  });

  it("resumes an interrupted turn from its last checkpoint", async () => {
    await store.append(
      "t1",
      { state: { messages: [user("Add 2 and 3"), addCall], longTermMemoryContext: CONTEXT }, next: "TOOLCALL" },
      null
    );
    model.push(assistant("The sum is 5"));

    const result = await createAgent().resume("t1");

    expect(result.newMessages).toEqual([addResult, assistant("The sum is 5")]);
    expect(store.history("t1").map(r => r.sequenceNo)).toEqual([1, 2, 3]);
  });

  it("finishes a pending tool step before taking new input", async () => {
    await store.append(
      "t1",
      { state: { messages: [user("Add 2 and 3"), addCall], longTermMemoryContext: CONTEXT }, next: "TOOLCALL" },
      null
    );
    model.push(assistant("5, and hello"));

    const result = await createAgent().invoke("t1", input(user("also, hi")));

    expect(result.state.messages.map(m => m.role)).toEqual(["user", "assistant", "tool", "user", "assistant"]);
    expect(model.calls[0]).toEqual([SYSTEM, user("Add 2 and 3"), addCall, addResult, user("also, hi")]);
  });

  it("leaves a finished thread alone on resume", async () => {
    model.push(assistant("4"));
    const agent = createAgent();
    await agent.invoke("t1", input(user("What is 2+2?")));

    const result = await agent.resume("t1");

    expect(result.newMessages).toEqual([]);
    expect(model.calls).toHaveLength(1);
    expect(store.history("t1")).toHaveLength(1);
  });

  it("resumes an unknown thread to an empty state", async () => {
    const result = await createAgent().resume("nobody");

    expect(result).toEqual({ state: { messages: [], longTermMemoryContext: "" }, newMessages: [] });
  });

  it("fails the turn when a checkpoint cannot be written", async () => {
    const broken: ICheckpointStore = {
      getLatest: async () => null,
      append: async () => {
        throw new Error("disk full");
      }
    };
    model.push(assistant("4"));

    const turn = createAgent(broken).invoke("t1", input(user("What is 2+2?")));

    await expect(turn).rejects.toBeInstanceOf(CheckpointWriteError);
    await expect(turn).rejects.toThrow("Checkpoint write failed for thread t1: disk full");
  });

  it("passes pool exhaustion through unchanged", async () => {
    const exhausted: ICheckpointStore = {
      getLatest: async () => null,
      append: async () => {
        throw new ResourceExhaustedError("Database connection pool exhausted");
      }
    };
    model.push(assistant("4"));

    await expect(createAgent(exhausted).invoke("t1", input(user("hi")))).rejects.toBeInstanceOf(
      ResourceExhaustedError
    );
  });

  it("writes nothing when the model is unavailable", async () => {
    model.push(new AllBackendsExhaustedError(["a"]));

    await expect(createAgent().invoke("t1", input(user("hi")))).rejects.toBeInstanceOf(AllBackendsExhaustedError);
    expect(store.history("t1")).toEqual([]);
  });

  it("serializes concurrent turns on the same thread", async () => {
    model.push(assistant("first"), assistant("second"));
    const agent = createAgent();

    await Promise.all([agent.invoke("t1", input(user("a"))), agent.invoke("t1", input(user("b")))]);

    expect(store.history("t1").at(-1)?.state.messages).toEqual([
      user("a"),
      assistant("first"),
      user("b"),
      assistant("second")
    ]);
  });

  it("streams each produced message and then the result", async () => {
    model.push(addCall, assistant("The sum is 5"));
    const events: AgentStreamEvent[] = [];

    for await (const event of createAgent().stream("t1", input(user("Add 2 and 3")))) {
      events.push(event);
    }

    expect(events.map(e => (e.type === "message" ? e.message.role : e.type))).toEqual([
      "assistant",
      "tool",
      "assistant",
      "completed"
    ]);
    const last = events.at(-1);
    expect(last?.type === "completed" ? last.result.newMessages : []).toHaveLength(3);
  });

  it("releases the thread when a stream consumer stops early", async () => {
    model.push(addCall, assistant("The sum is 5"));
    const agent = createAgent();

    for await (const event of agent.stream("t1", input(user("Add 2 and 3")))) {
      if (event.type === "message") break;
    }

    expect(locks.isLocked("t1")).toBe(false);
    expect(store.history("t1").map(r => r.next)).toEqual(["TOOLCALL"]);

    const resumed = await agent.resume("t1");
    expect(resumed.newMessages).toEqual([addResult, assistant("The sum is 5")]);
  });

  it("clears a thread by appending an empty state", async () => {
    model.push(assistant("4"));
    const agent = createAgent();
    await agent.invoke("t1", input(user("What is 2+2?")));

    await agent.clear("t1");

    await expect(agent.getState("t1")).resolves.toEqual({ messages: [], longTermMemoryContext: "" });
    expect(store.history("t1")).toHaveLength(2);
  });

  it("does not write a checkpoint when clearing an unknown thread", async () => {
    await createAgent().clear("t1");

    expect(store.history("t1")).toEqual([]);
  });
});

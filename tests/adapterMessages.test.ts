import { toClaudeTurns } from "../src/infrastructure/llm/ClaudeAdapter";
import { toGeminiContents } from "../src/infrastructure/llm/GeminiAdapter";
import { toOpenAIMessage } from "../src/infrastructure/llm/OpenAIAdapter";
import { Message } from "../src/domain/entities/Message";
import { assistant, toolCalls, user } from "./helpers/fakes";

const system: Message = { role: "system", content: "Be brief." };
const call = toolCalls({ id: "call_1", name: "add", arguments: { a: 2, b: 3 } });
const result: Message = { role: "tool", content: "5", toolCallId: "call_1", name: "add" };

describe("toOpenAIMessage", () => {
  it("sends tool calls with JSON arguments and no empty content", () => {
    expect(toOpenAIMessage(call)).toEqual({
      role: "assistant",
      content: null,
      tool_calls: [{ id: "call_1", type: "function", function: { name: "add", arguments: '{"a":2,"b":3}' } }]
    });
  });

  it("pairs tool results with their call", () => {
    expect(toOpenAIMessage(result)).toEqual({ role: "tool", tool_call_id: "call_1", content: "5" });
  });
});

describe("toClaudeTurns", () => {
  it("drops system messages and carries tool results in user turns", () => {
    expect(toClaudeTurns([system, user("Add 2 and 3"), call, result, assistant("It is 5")])).toEqual([
      { role: "user", content: [{ type: "text", text: "Add 2 and 3" }] },
      { role: "assistant", content: [{ type: "tool_use", id: "call_1", name: "add", input: { a: 2, b: 3 } }] },
      { role: "user", content: [{ type: "tool_result", tool_use_id: "call_1", content: "5" }] },
      { role: "assistant", content: [{ type: "text", text: "It is 5" }] }
    ]);
  });

  it("merges consecutive turns of the same role", () => {
    expect(toClaudeTurns([user("one"), user("two")])).toEqual([
      {
        role: "user",
        content: [
          { type: "text", text: "one" },
          { type: "text", text: "two" }
        ]
      }
    ]);
  });
});

describe("toGeminiContents", () => {
  it("maps roles and function traffic", () => {
    expect(toGeminiContents([system, user("Add 2 and 3"), call, result, assistant("It is 5")])).toEqual([
      { role: "user", parts: [{ text: "Add 2 and 3" }] },
      { role: "model", parts: [{ functionCall: { name: "add", args: { a: 2, b: 3 } } }] },
      { role: "function", parts: [{ functionResponse: { name: "add", response: { content: "5" } } }] },
      { role: "model", parts: [{ text: "It is 5" }] }
    ]);
  });

  it("starts the history on a user turn", () => {
    expect(toGeminiContents([assistant("Welcome back"), user("hi")])).toEqual([
      { role: "user", parts: [{ text: "hi" }] }
    ]);
  });
});

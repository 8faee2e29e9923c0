import Anthropic from "@anthropic-ai/sdk";
import { IModelBackend, BoundModel } from "../../application/contracts/IModelBackend";
import { ToolSpec } from "../../application/contracts/ITool";
import { Message } from "../../domain/entities/Message";
import { ModelBackendConfig } from "../../domain/entities/ModelBackendConfig";
import { TiktokenCounter } from "./TiktokenCounter";
import { parseToolArguments } from "./toolArguments";
import { zodToJsonSchema } from "./toolSchema";

export type ClaudeBlock = Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam | Anthropic.ToolResultBlockParam;

export interface ClaudeTurn {
  role: "user" | "assistant";
  content: ClaudeBlock[];
}

export class ClaudeAdapter implements IModelBackend {
  private client: Anthropic;
  private readonly counter: TiktokenCounter;

  constructor(readonly config: ModelBackendConfig, options: { apiKey: string; timeoutMs?: number }) {
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
    this.counter = new TiktokenCounter(config.name);
  }

  bindTools(tools: ToolSpec[]): BoundModel {
    return { invoke: messages => this.invoke(messages, tools) };
  }

  countTokens(messages: Message[]): number {
    return this.counter.count(messages);
  }

  async invoke(messages: Message[], tools: ToolSpec[]): Promise<Message> {
    const system = messages
      .filter(m => m.role === "system")
      .map(m => m.content)
      .join("\n\n");

    const response = await this.client.messages.create({
      model: this.config.name,
      max_tokens: this.config.params.maxTokens,
      temperature: this.config.params.temperature,
      ...(system ? { system } : {}),
      messages: toClaudeTurns(messages),
      ...(tools.length > 0 ? { tools: tools.map(toClaudeTool) } : {})
    });

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map(block => block.text)
      .join("");

    const toolCalls = response.content
      .filter((block): block is Anthropic.ToolUseBlock => block.type === "tool_use")
      .map(block => ({ id: block.id, name: block.name, arguments: parseToolArguments(block.input) }));

    return {
      role: "assistant",
      content: text,
      ...(toolCalls.length > 0 && { toolCalls })
    };
  }
}

// Claude wants strictly alternating turns; tool results travel inside user turns.
export function toClaudeTurns(messages: Message[]): ClaudeTurn[] {
  const turns: ClaudeTurn[] = [];

  const push = (role: ClaudeTurn["role"], blocks: ClaudeBlock[]) => {
    if (blocks.length === 0) return;
    const last = turns.at(-1);
    if (last && last.role === role) {
      last.content.push(...blocks);
    } else {
      turns.push({ role, content: blocks });
    }
  };

  for (const message of messages) {
    switch (message.role) {
      case "system":
        break;
      case "user":
        push("user", [{ type: "text", text: message.content }]);
        break;
      case "tool":
        push("user", [{ type: "tool_result", tool_use_id: message.toolCallId ?? "", content: message.content }]);
        break;
      case "assistant": {
        const blocks: ClaudeBlock[] = [];
        if (message.content) blocks.push({ type: "text", text: message.content });
        for (const call of message.toolCalls ?? []) {
          blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.arguments });
        }
        push("assistant", blocks);
        break;
      }
    }
  }

  return turns;
}

function toClaudeTool(tool: ToolSpec): Anthropic.Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: { ...zodToJsonSchema(tool.schema), type: "object" }
  };
}

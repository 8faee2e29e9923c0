import OpenAI from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool
} from "openai/resources/chat/completions";
import { IModelBackend, BoundModel } from "../../application/contracts/IModelBackend";
import { ToolSpec } from "../../application/contracts/ITool";
import { Message } from "../../domain/entities/Message";
import { ModelBackendConfig } from "../../domain/entities/ModelBackendConfig";
import { StructuralBackendError } from "../../domain/errors/AgentErrors";
import { TiktokenCounter } from "./TiktokenCounter";
import { parseToolArguments } from "./toolArguments";
import { zodToJsonSchema } from "./toolSchema";

export interface OpenAIAdapterOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
}

export class OpenAIAdapter implements IModelBackend {
  protected client: OpenAI;
  private readonly counter: TiktokenCounter;

  constructor(readonly config: ModelBackendConfig, options: OpenAIAdapterOptions) {
    // LLMRouter owns retries and backoff.
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0
    });
    this.counter = new TiktokenCounter(config.name);
  }

  bindTools(tools: ToolSpec[]): BoundModel {
    return { invoke: messages => this.invoke(messages, tools) };
  }

  countTokens(messages: Message[]): number {
    return this.counter.count(messages);
  }

  async invoke(messages: Message[], tools: ToolSpec[]): Promise<Message> {
    const { maxTokens, temperature, reasoningEffort } = this.config.params;

    const response = await this.client.chat.completions.create({
      model: this.config.name,
      messages: messages.map(toOpenAIMessage),
      max_tokens: maxTokens,
      temperature,
      ...(reasoningEffort ? { reasoning_effort: reasoningEffort } : {}),
      ...(tools.length > 0 ? { tools: tools.map(toOpenAITool) } : {})
    });

    const choice = response.choices.at(0);
    if (!choice) {
      throw new StructuralBackendError(this.config.name, "Response contained no choices");
    }

    const toolCalls = (choice.message.tool_calls ?? []).map(call => ({
      id: call.id,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments)
    }));

    return {
      role: "assistant",
      content: choice.message.content ?? "",
      ...(toolCalls.length > 0 && { toolCalls })
    };
  }
}

export function toOpenAIMessage(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId ?? "", content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content || null,
          tool_calls: message.toolCalls.map(call => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) }
          }))
        };
      }
      return { role: "assistant", content: message.content };
  }
}

function toOpenAITool(tool: ToolSpec): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: zodToJsonSchema(tool.schema)
    }
  };
}

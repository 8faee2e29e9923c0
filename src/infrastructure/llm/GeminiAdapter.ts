import { Content, GoogleGenerativeAI, Part, Tool } from "@google/generative-ai";
import { v4 as uuidv4 } from "uuid";
import { IModelBackend, BoundModel } from "../../application/contracts/IModelBackend";
import { ToolSpec } from "../../application/contracts/ITool";
import { Message } from "../../domain/entities/Message";
import { ModelBackendConfig } from "../../domain/entities/ModelBackendConfig";
import { TiktokenCounter } from "./TiktokenCounter";
import { parseToolArguments } from "./toolArguments";
import { toGeminiParameters } from "./toolSchema";

export class GeminiAdapter implements IModelBackend {
  private genAI: GoogleGenerativeAI;
  private readonly counter: TiktokenCounter;
  private readonly timeoutMs?: number;

  constructor(readonly config: ModelBackendConfig, options: { apiKey: string; timeoutMs?: number }) {
    this.genAI = new GoogleGenerativeAI(options.apiKey);
    this.counter = new TiktokenCounter(config.name);
    this.timeoutMs = options.timeoutMs;
  }

  bindTools(tools: ToolSpec[]): BoundModel {
    return { invoke: messages => this.invoke(messages, tools) };
  }

  countTokens(messages: Message[]): number {
    return this.counter.count(messages);
  }

  async invoke(messages: Message[], tools: ToolSpec[]): Promise<Message> {
    const systemInstruction = messages
      .filter(m => m.role === "system")
      .map(m => m.content)
      .join("\n\n");

    const geminiTools: Tool[] = tools.length > 0
      ? [{
          functionDeclarations: tools.map(tool => ({
            name: tool.name,
            description: tool.description,
            parameters: toGeminiParameters(tool.schema)
          }))
        }]
      : [];

    const model = this.genAI.getGenerativeModel(
      {
        model: this.config.name,
        ...(systemInstruction ? { systemInstruction } : {}),
        ...(geminiTools.length > 0 ? { tools: geminiTools } : {}),
        generationConfig: {
          maxOutputTokens: this.config.params.maxTokens,
          temperature: this.config.params.temperature
        }
      },
      { timeout: this.timeoutMs }
    );

    const result = await model.generateContent({ contents: toGeminiContents(messages) });
    const response = result.response;

    // Gemini does not number its function calls; the transcript needs ids to pair results.
    const toolCalls = (response.functionCalls() ?? []).map(call => ({
      id: `call_${uuidv4()}`,
      name: call.name,
      arguments: parseToolArguments(call.args)
    }));

    return {
      role: "assistant",
      content: toolCalls.length > 0 ? "" : response.text(),
      ...(toolCalls.length > 0 && { toolCalls })
    };
  }
}

export function toGeminiContents(messages: Message[]): Content[] {
  const contents: Content[] = [];

  const push = (role: string, parts: Part[]) => {
    if (parts.length === 0) return;
    const last = contents.at(-1);
    if (last && last.role === role) {
      last.parts.push(...parts);
    } else {
      contents.push({ role, parts });
    }
  };

  for (const message of messages) {
    switch (message.role) {
      case "system":
        break;
      case "user":
        push("user", [{ text: message.content }]);
        break;
      case "tool":
        push("function", [{
          functionResponse: {
            name: message.name ?? "",
            response: { content: message.content }
          }
        }]);
        break;
      case "assistant": {
        const parts: Part[] = [];
        if (message.content) parts.push({ text: message.content });
        for (const call of message.toolCalls ?? []) {
          parts.push({ functionCall: { name: call.name, args: call.arguments } });
        }
        push("model", parts);
        break;
      }
    }
  }

  // Gemini rejects a history that opens with a model turn.
  while (contents.length > 0 && contents[0].role !== "user") {
    contents.shift();
  }

  return contents;
}

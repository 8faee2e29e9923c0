import type { Logger } from "pino";
import { ITool, IToolExecutor, ToolSpec } from "../../application/contracts/ITool";
import { Message, ToolCall } from "../../domain/entities/Message";
import { ConfigurationError, describeCause, ToolExecutionError } from "../../domain/errors/AgentErrors";

/**
 * Name-keyed set of tools fixed at startup. Every call produces exactly one
 * tool message; failures are reported to the model as content.
 */
export class ToolRegistry implements IToolExecutor {
  private readonly tools = new Map<string, ITool>();
  private readonly logger: Logger;

  constructor(tools: ITool[], logger: Logger) {
    this.logger = logger.child({ component: "tool-registry" });
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new ConfigurationError(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  get(name: string): ITool | undefined {
    return this.tools.get(name);
  }

  specs(): ToolSpec[] {
    return Array.from(this.tools.values()).map(({ name, description, schema }) => ({ name, description, schema }));
  }

  async execute(call: ToolCall): Promise<Message> {
    const reply = (content: string): Message => ({
      role: "tool",
      content,
      toolCallId: call.id,
      name: call.name
    });

    const tool = this.tools.get(call.name);
    if (!tool) {
      this.logger.warn({ tool: call.name, callId: call.id }, "unknown_tool_requested");
      return reply(`Error: unknown tool "${call.name}"`);
    }

    const args = tool.schema.safeParse(call.arguments);
    if (!args.success) {
      const issues = args.error.issues.map(i => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; ");
      this.logger.warn({ tool: call.name, callId: call.id, issues }, "invalid_tool_arguments");
      return reply(`Error: invalid arguments for ${call.name}: ${issues}`);
    }

    try {
      const content = await tool.invoke(args.data);
      this.logger.info({ tool: call.name, callId: call.id }, "tool_call_completed");
      return reply(content);
    } catch (cause) {
      const error = new ToolExecutionError(call.name, { cause });
      this.logger.error({ tool: call.name, callId: call.id, err: error }, "tool_call_failed");
      return reply(`Error: ${describeCause(cause)}`);
    }
  }
}

import { z } from "zod";
import { Message, ToolCall } from "../../domain/entities/Message";

export interface ITool<TSchema extends z.AnyZodObject = z.AnyZodObject> {
  readonly name: string;
  readonly description: string;
  readonly schema: TSchema;
  invoke(args: z.infer<TSchema>): Promise<string>;
}

export type ToolSpec = Pick<ITool, "name" | "description" | "schema">;

export interface IToolExecutor {
  /** Runs one call and returns its `tool` message; never rejects for tool failures. */
  execute(call: ToolCall): Promise<Message>;
}

import { Message } from "../../domain/entities/Message";
import { ModelBackendConfig } from "../../domain/entities/ModelBackendConfig";
import { ToolSpec } from "./ITool";

/** A backend with a fixed tool set attached. */
export interface BoundModel {
  invoke(messages: Message[]): Promise<Message>;
}

export interface IModelBackend {
  readonly config: ModelBackendConfig;
  invoke(messages: Message[], tools: ToolSpec[]): Promise<Message>;
  bindTools(tools: ToolSpec[]): BoundModel;
  countTokens(messages: Message[]): number;
}

/** What the agent loop needs from the dispatcher. */
export interface IChatModel {
  call(messages: Message[]): Promise<Message>;
  countTokens(messages: Message[]): number;
}

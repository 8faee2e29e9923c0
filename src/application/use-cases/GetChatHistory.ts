import { Message, toTranscript } from "../../domain/entities/Message";
import { AgentStateMachine } from "../agent/AgentStateMachine";

export class GetChatHistory {
  constructor(private agent: AgentStateMachine) {}

  async execute(threadId: string): Promise<Message[]> {
    const state = await this.agent.getState(threadId);
    return toTranscript(state.messages);
  }
}

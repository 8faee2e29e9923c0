import { AgentStateMachine } from "../agent/AgentStateMachine";

export class ClearChatHistory {
  constructor(private agent: AgentStateMachine) {}

  async execute(threadId: string): Promise<void> {
    await this.agent.clear(threadId);
  }
}

import { AgentNode, NextNode } from "../../domain/entities/CheckpointRecord";
import { StateUpdate } from "../../domain/entities/ConversationState";

export type { AgentNode, NextNode };

/** What a node hands back to the loop: where to go and what to append. */
export type Transition =
  | { next: "TOOLCALL"; update: StateUpdate }
  | { next: "RESPOND"; update: StateUpdate }
  | { next: "TERMINAL"; update: StateUpdate };

export interface AgentStep {
  node: AgentNode;
  sequenceNo: number;
  transition: Transition;
}

import { ConversationState } from "./ConversationState";

export type AgentNode = "RESPOND" | "TOOLCALL";
export type NextNode = AgentNode | "TERMINAL";

export const NEXT_NODES: readonly NextNode[] = ["RESPOND", "TOOLCALL", "TERMINAL"];

export function isNextNode(value: string): value is NextNode {
  return NEXT_NODES.some(node => node === value);
}

export interface CheckpointSnapshot {
  state: ConversationState;
  /** Node the machine runs after this snapshot. */
  next: NextNode;
}

export interface CheckpointRecord extends CheckpointSnapshot {
  threadId: string;
  sequenceNo: number;
  createdAt: Date;
}

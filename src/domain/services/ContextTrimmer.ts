import { Message } from "../entities/Message";

export interface TrimOptions {
  maxTokens: number;
  countTokens: (messages: Message[]) => number;
  /** Called when counting fails and the history is passed through untrimmed. */
  onFallback?: (error: unknown) => void;
}

/**
 * Builds the short-term context window: the system prompt followed by the
 * longest suffix of `history` that fits `maxTokens`, starting on a user turn.
 *
 * When not even the latest user turn fits, that turn and everything after it
 * is kept anyway so the model always sees the message it is answering.
 */
export function trimMessages(history: Message[], systemPrompt: Message, options: TrimOptions): Message[] {
  try {
    // Whole windows are counted: a counter may add per-request overhead.
    // Cost only grows as `from` moves back, so the smallest fitting start is
    // found by binary search.
    const fits = (from: number) => options.countTokens([systemPrompt, ...history.slice(from)]) <= options.maxTokens;
    let low = 0;
    let high = history.length;
    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      if (fits(mid)) high = mid;
      else low = mid + 1;
    }
    const start = low;

    const firstUser = indexOfUser(history, start);
    if (firstUser !== -1) {
      return [systemPrompt, ...history.slice(firstUser)];
    }

    const lastUser = lastIndexOfUser(history);
    return lastUser === -1 ? [systemPrompt] : [systemPrompt, ...history.slice(lastUser)];
  } catch (error) {
    options.onFallback?.(error);
    return [systemPrompt, ...history];
  }
}

function indexOfUser(history: Message[], from: number): number {
  for (let i = from; i < history.length; i++) {
    if (history[i].role === "user") return i;
  }
  return -1;
}

function lastIndexOfUser(history: Message[]): number {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].role === "user") return i;
  }
  return -1;
}

import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import { Message } from "../../domain/entities/Message";

const MESSAGE_OVERHEAD = 4;
const REQUEST_OVERHEAD = 2;

const encodings = new Map<TiktokenEncoding, Tiktoken>();

function encodingFor(model: string): Tiktoken {
  const name: TiktokenEncoding = /gpt-4o|gpt-4\.1|^o\d/.test(model) ? "o200k_base" : "cl100k_base";
  let encoding = encodings.get(name);
  if (!encoding) {
    encoding = getEncoding(name);
    encodings.set(name, encoding);
  }
  return encoding;
}

/**
 * Approximate chat token count for a model. Non-OpenAI models are counted
 * with cl100k_base, which is close enough for context budgeting.
 */
export class TiktokenCounter {
  constructor(private readonly model: string) {}

  count(messages: Message[]): number {
    const encoding = encodingFor(this.model);
    let total = REQUEST_OVERHEAD;
    for (const message of messages) {
      total += MESSAGE_OVERHEAD + encoding.encode(message.content).length;
      if (message.toolCalls && message.toolCalls.length > 0) {
        total += encoding.encode(JSON.stringify(message.toolCalls)).length;
      }
    }
    return total;
  }
}

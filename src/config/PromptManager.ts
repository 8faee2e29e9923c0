import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Logger } from "pino";
import { ISystemPromptProvider } from "../application/contracts/ISystemPromptProvider";
import { ConfigurationError } from "../domain/errors/AgentErrors";
import { NO_RELEVANT_MEMORY } from "../application/use-cases/resolveMemoryContext";

const promptSchema = z.object({
  id: z.string(),
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
  template: z.string()
});

export type PromptTemplate = z.infer<typeof promptSchema>;

const PROMPTS_DIR = path.join(__dirname, "prompts");

export const AGENT_PROMPT_ID = "agent";
export const MEMORY_EXTRACTION_PROMPT_ID = "memory-extraction";

export class PromptManager implements ISystemPromptProvider {
  private prompts: Map<string, PromptTemplate> = new Map();

  constructor(
    private readonly logger: Logger,
    private readonly directory: string = PROMPTS_DIR,
    private readonly now: () => Date = () => new Date()
  ) {
    this.loadAll();
  }

  private loadAll(): void {
    const files = fs.readdirSync(this.directory).filter(f => f.endsWith(".json"));

    for (const file of files) {
      const content = fs.readFileSync(path.join(this.directory, file), "utf-8");
      const parsed = promptSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid prompt file ${file}: ${parsed.error.message}`);
      }
      this.prompts.set(parsed.data.id, parsed.data);
    }

    this.logger.info({ prompts: Array.from(this.prompts.keys()) }, "prompts_loaded");
  }

  render(id: string, variables: Record<string, string> = {}): string {
    const prompt = this.prompts.get(id);
    if (!prompt) {
      throw new ConfigurationError(`Prompt not found: ${id}`);
    }
    return prompt.template.replace(/\{(\w+)\}/g, (match, key: string) => variables[key] ?? match);
  }

  buildSystemPrompt(longTermMemoryContext: string): string {
    return this.render(AGENT_PROMPT_ID, {
      long_term_memory: longTermMemoryContext || NO_RELEVANT_MEMORY,
      current_date_and_time: this.now().toISOString()
    });
  }
}

export type ModelProvider = "openai" | "deepseek" | "claude" | "gemini";
export type ReasoningEffort = "low" | "medium" | "high";

export interface ModelBackendConfig {
  readonly name: string;
  readonly provider: ModelProvider;
  readonly params: {
    readonly maxTokens: number;
    readonly temperature: number;
    readonly reasoningEffort?: ReasoningEffort;
  };
  /** Position in the registry; lower runs first. */
  readonly priority: number;
}

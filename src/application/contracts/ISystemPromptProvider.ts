export interface ISystemPromptProvider {
  buildSystemPrompt(longTermMemoryContext: string): string;
}

import { ModelBackendConfig } from "../../domain/entities/ModelBackendConfig";
import { OpenAIAdapter } from "./OpenAIAdapter";

const DEEPSEEK_BASE_URL = "https://api.deepseek.com";

/** DeepSeek speaks the OpenAI chat completions protocol. */
export class DeepSeekAdapter extends OpenAIAdapter {
  constructor(config: ModelBackendConfig, options: { apiKey: string; timeoutMs?: number }) {
    super(config, { ...options, baseURL: DEEPSEEK_BASE_URL });
  }
}

import type { Logger } from "pino";
import { IModelBackend } from "../../application/contracts/IModelBackend";
import { ModelBackendConfig, ModelProvider } from "../../domain/entities/ModelBackendConfig";
import { ConfigurationError } from "../../domain/errors/AgentErrors";
import { Env } from "../../config/env";
import { ClaudeAdapter } from "./ClaudeAdapter";
import { DeepSeekAdapter } from "./DeepSeekAdapter";
import { GeminiAdapter } from "./GeminiAdapter";
import { OpenAIAdapter } from "./OpenAIAdapter";

export function providerFor(model: string): ModelProvider {
  if (model.startsWith("claude")) return "claude";
  if (model.startsWith("gemini")) return "gemini";
  if (model.startsWith("deepseek")) return "deepseek";
  return "openai";
}

export function backendConfigs(config: Env): ModelBackendConfig[] {
  return config.LLM_BACKENDS.map((name, priority) => ({
    name,
    provider: providerFor(name),
    params: {
      maxTokens: config.MAX_TOKENS,
      temperature: config.DEFAULT_LLM_TEMPERATURE,
      ...(config.REASONING_EFFORT ? { reasoningEffort: config.REASONING_EFFORT } : {})
    },
    priority
  }));
}

function apiKeyFor(provider: ModelProvider, config: Env): string {
  switch (provider) {
    case "openai":
      return config.OPENAI_API_KEY;
    case "deepseek":
      return config.DEEPSEEK_API_KEY;
    case "claude":
      return config.CLAUDE_API_KEY;
    case "gemini":
      return config.GEMINI_API_KEY;
  }
}

export function createBackend(backend: ModelBackendConfig, apiKey: string, timeoutMs: number): IModelBackend {
  switch (backend.provider) {
    case "openai":
      return new OpenAIAdapter(backend, { apiKey, timeoutMs });
    case "deepseek":
      return new DeepSeekAdapter(backend, { apiKey, timeoutMs });
    case "claude":
      return new ClaudeAdapter(backend, { apiKey, timeoutMs });
    case "gemini":
      return new GeminiAdapter(backend, { apiKey, timeoutMs });
  }
}

/**
 * Builds the ranked backend list from configuration. Backends whose provider
 * has no API key are left out rather than failing every call at runtime.
 */
export function buildModelBackends(config: Env, logger: Logger): IModelBackend[] {
  const backends: IModelBackend[] = [];

  for (const backend of backendConfigs(config)) {
    const apiKey = apiKeyFor(backend.provider, config);
    if (!apiKey) {
      logger.warn({ backend: backend.name, provider: backend.provider }, "backend_skipped_missing_api_key");
      continue;
    }
    backends.push(createBackend(backend, apiKey, config.LLM_TIMEOUT_MS));
  }

  if (backends.length === 0) {
    throw new ConfigurationError("No model backend could be configured; set at least one provider API key");
  }

  logger.info({ backends: backends.map(b => b.config.name) }, "model_registry_ready");
  return backends;
}

/**
 * Config-driven model selection for the triage agent.
 *
 * Set LLM_PROVIDER=openai or LLM_PROVIDER=ollama in .env to switch providers.
 * Defaults to Anthropic when unset.
 */

type OpenAICompatibleConfig =
  | { id: `${string}/${string}`; url?: string; apiKey?: string }
  | { providerId: string; modelId: string; url?: string; apiKey?: string };

export type LlmProvider = 'anthropic' | 'openai' | 'ollama';

export function getProvider(value = process.env.LLM_PROVIDER): LlmProvider {
  if (value === 'openai' || value === 'ollama') return value;
  return 'anthropic';
}

export function getModelConfig(provider: LlmProvider = getProvider()): string | OpenAICompatibleConfig {
  switch (provider) {
    case 'ollama':
      return {
        id: `ollama/${process.env.OLLAMA_MODEL || 'qwen3:8b'}`,
        url: process.env.OLLAMA_BASE_URL || 'http://localhost:11434/v1',
      };
    case 'openai':
      return `openai/${process.env.OPENAI_MODEL || 'gpt-4o'}`;
    default:
      return `anthropic/${process.env.ANTHROPIC_MODEL || 'claude-sonnet-4-5'}`;
  }
}

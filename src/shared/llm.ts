// Shared model access for the extraction backends

import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import type { LanguageModel } from 'ai';

export type LLMProvider = 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LocalModelConfig {
  baseUrl: string;
  model: string;
}

// Hosted model for the remote backend
export const createRemoteModel = (config: LLMConfig): LanguageModel => {
  if (config.provider === 'anthropic') {
    return createAnthropic({ apiKey: config.apiKey })(config.model);
  }
  return createOpenAI({ apiKey: config.apiKey }).chat(config.model);
};

// Ollama speaks the OpenAI chat-completions dialect under /v1
export const createLocalModel = (config: LocalModelConfig): LanguageModel => {
  const ollama = createOpenAI({
    baseURL: `${config.baseUrl}/v1`,
    apiKey: 'ollama'
  });
  return ollama.chat(config.model);
};

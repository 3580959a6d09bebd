// Extraction backends. Each one either returns fields or says why it is unavailable; none of them throw.

import { generateObject, type LanguageModel } from 'ai';
import { z } from 'zod';
import { createLocalModel, createRemoteModel, type LLMConfig } from '../../shared/llm.js';
import { errorMessage } from '../../shared/errors.js';
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from './prompts.js';
import type { ExtractionBackendName, ExtractionContext } from '../../shared/types.js';

export const modelExtractionSchema = z.object({
  services: z.array(z.string()).describe('Services the competitors offer'),
  pricingSignals: z.array(z.object({
    label: z.string().describe('What the price refers to, e.g. "minimum load"'),
    value: z.union([z.number(), z.string()]).describe('Dollar amount, or the pricing phrase as written')
  })).describe('Prices, rates and pricing policies mentioned'),
  gaps: z.array(z.string()).describe('Competitive gaps or weaknesses'),
  keywords: z.array(z.string()).describe('Customer search phrases, most relevant first')
});

export type ModelExtraction = z.infer<typeof modelExtractionSchema>;

export type BackendOutcome =
  | { available: true; fields: ModelExtraction }
  | { available: false; reason: string };

export interface ExtractionBackend {
  readonly name: ExtractionBackendName;
  extract(text: string, context: ExtractionContext): Promise<BackendOutcome>;
}

interface ModelCallOptions {
  timeoutMs: number;
  maxInputChars: number;
  temperature?: number;
  maxOutputTokens?: number;
}

const extractWithModel = async (
  model: LanguageModel,
  text: string,
  context: ExtractionContext,
  options: ModelCallOptions
): Promise<BackendOutcome> => {
  try {
    const { object } = await generateObject({
      model,
      schema: modelExtractionSchema,
      system: EXTRACTION_SYSTEM_PROMPT,
      prompt: buildExtractionPrompt(text.slice(0, options.maxInputChars), context),
      temperature: options.temperature ?? 0,
      maxOutputTokens: options.maxOutputTokens,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(options.timeoutMs)
    });
    return { available: true, fields: object };
  } catch (error) {
    return { available: false, reason: `generation failed: ${errorMessage(error)}` };
  }
};

// --- Local (Ollama) ---

export interface LocalBackendOptions extends ModelCallOptions {
  enabled: boolean;
  baseUrl: string;
  model: string;
  probeTimeoutMs: number;
  languageModel?: LanguageModel;
}

const ollamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }))
});

export class LocalModelBackend implements ExtractionBackend {
  readonly name = 'local' as const;
  private model: LanguageModel;

  constructor(private options: LocalBackendOptions) {
    this.model = options.languageModel ?? createLocalModel({ baseUrl: options.baseUrl, model: options.model });
  }

  async extract(text: string, context: ExtractionContext): Promise<BackendOutcome> {
    if (!this.options.enabled) {
      return { available: false, reason: 'disabled (OLLAMA_ENABLED=false)' };
    }

    const problem = await this.probe();
    if (problem) {
      return { available: false, reason: problem };
    }

    return extractWithModel(this.model, text, context, this.options);
  }

  // Probed on every call; a server that was down a minute ago may be up now
  private async probe(): Promise<string | null> {
    const url = `${this.options.baseUrl}/api/tags`;
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(this.options.probeTimeoutMs) });
      if (!response.ok) {
        return `probe of ${url} returned ${response.status}`;
      }

      const tags = ollamaTagsSchema.safeParse(await response.json());
      if (tags.success && !hasModel(tags.data.models, this.options.model)) {
        return `model ${this.options.model} is not pulled on ${this.options.baseUrl}`;
      }
      return null;
    } catch (error) {
      return `unreachable at ${this.options.baseUrl} (${errorMessage(error)})`;
    }
  }
}

const hasModel = (models: Array<{ name: string }>, wanted: string): boolean =>
  models.some((m) => m.name === wanted || m.name === `${wanted}:latest`);

// --- Remote (hosted) ---

export interface RemoteBackendOptions extends ModelCallOptions {
  llm: LLMConfig;
  languageModel?: LanguageModel;
}

export class RemoteModelBackend implements ExtractionBackend {
  readonly name = 'remote' as const;
  private model: LanguageModel | null;

  constructor(private options: RemoteBackendOptions) {
    this.model = options.languageModel ?? (options.llm.apiKey ? createRemoteModel(options.llm) : null);
  }

  async extract(text: string, context: ExtractionContext): Promise<BackendOutcome> {
    if (!this.options.llm.apiKey || !this.model) {
      return { available: false, reason: `${this.options.llm.provider} API key not configured` };
    }

    return extractWithModel(this.model, text, context, {
      ...this.options,
      temperature: this.options.llm.temperature,
      maxOutputTokens: this.options.llm.maxTokens
    });
  }
}

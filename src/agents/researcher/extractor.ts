// Research extractor: raw scraped text -> structured fields, trying backends in order

import { createLogger } from '../../shared/logger.js';
import { errorMessage } from '../../shared/errors.js';
import { cleanList, normalizeKeywords, normalizePricing } from './keywords.js';
import {
  LocalModelBackend,
  RemoteModelBackend,
  type BackendOutcome,
  type ExtractionBackend,
  type ModelExtraction
} from './backends.js';
import type { Config } from '../../config.js';
import type { ExtractedFields, ExtractionContext, ExtractionResult } from '../../shared/types.js';

const log = createLogger('Extractor');

// Below this many meaningful characters there is nothing worth sending to a model
export const MIN_TEXT_CHARS = 30;

const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export const emptyFields = (): ExtractedFields => ({
  services: [],
  pricingSignals: {},
  gaps: [],
  keywords: []
});

export const sanitizeText = (text: string | null | undefined): string =>
  typeof text === 'string' ? text.replace(CONTROL_CHARS, ' ') : '';

export const isEmptyExtraction = (fields: ExtractedFields): boolean =>
  fields.services.length === 0 &&
  fields.gaps.length === 0 &&
  fields.keywords.length === 0 &&
  Object.keys(fields.pricingSignals).length === 0;

export const normalizeFields = (raw: ModelExtraction, context: ExtractionContext): ExtractedFields => ({
  services: cleanList(raw.services),
  pricingSignals: normalizePricing(raw.pricingSignals),
  gaps: cleanList(raw.gaps),
  keywords: normalizeKeywords(raw.keywords, context.city, context.negativeKeywords)
});

export class ResearchExtractor {
  constructor(private backends: ExtractionBackend[]) {}

  async extract(rawText: string | null | undefined, context: ExtractionContext): Promise<ExtractionResult> {
    const text = sanitizeText(rawText);

    if (text.replace(/\s+/g, ' ').trim().length < MIN_TEXT_CHARS) {
      log.info('Input text is empty or near-empty; skipping extraction');
      return { ...emptyFields(), status: 'empty', backend: null };
    }

    for (const backend of this.backends) {
      const outcome = await this.tryBackend(backend, text, context);
      if (!outcome.available) {
        log.warn(`${backend.name} backend unavailable: ${outcome.reason}`);
        continue;
      }

      const fields = normalizeFields(outcome.fields, context);
      const status = isEmptyExtraction(fields) ? 'empty' : 'succeeded';
      log.info(`Extracted with ${backend.name} backend (${status})`);
      return { ...fields, status, backend: backend.name };
    }

    log.warn('No extraction backend available; keeping raw text only');
    return { ...emptyFields(), status: 'failed', backend: null };
  }

  // A backend that throws anyway counts as unavailable
  private async tryBackend(backend: ExtractionBackend, text: string, context: ExtractionContext): Promise<BackendOutcome> {
    try {
      return await backend.extract(text, context);
    } catch (error) {
      return { available: false, reason: errorMessage(error) };
    }
  }
}

// Local first, hosted second
export const createDefaultExtractor = (config: Config['extraction']): ResearchExtractor => {
  return new ResearchExtractor([
    new LocalModelBackend({
      ...config.local,
      timeoutMs: config.timeoutMs,
      maxInputChars: config.maxInputChars
    }),
    new RemoteModelBackend({
      llm: config.remote,
      timeoutMs: config.timeoutMs,
      maxInputChars: config.maxInputChars
    })
  ]);
};

// Researcher agent - web research + extraction, one research record per run

import { createLogger } from '../../shared/logger.js';
import { getVertical, normalizeCategory } from './verticals.js';
import { MIN_TEXT_CHARS } from './extractor.js';
import type { ResearchExtractor } from './extractor.js';
import type { ResearchSource } from './sources.js';
import type { PipelineStore } from '../../db/store.js';
import type { Client, ExtractionContext, ResearchRecord, ScrapedDocument } from '../../shared/types.js';

const log = createLogger('Researcher');

export interface ResearcherOptions {
  rawTextLimit: number;
}

// "### Name (url)" blocks, capped so one record never holds an entire crawl
export const combineDocuments = (documents: ScrapedDocument[], limit: number): string => {
  const text = documents
    .map((doc) => `### ${doc.name}${doc.url ? ` (${doc.url})` : ''}\n${doc.text.trim()}`)
    .join('\n\n');
  return text.slice(0, limit);
};

export const buildExtractionContext = (client: Client, city: string): ExtractionContext => {
  const vertical = getVertical(client.category);
  return {
    city,
    category: normalizeCategory(client.category),
    niche: vertical.niche,
    coreServices: vertical.coreServices,
    negativeKeywords: vertical.negativeKeywords
  };
};

export class ResearcherAgent {
  constructor(
    private store: PipelineStore,
    private source: ResearchSource,
    private extractor: ResearchExtractor,
    private options: ResearcherOptions
  ) {}

  async run(client: Client, city: string): Promise<ResearchRecord> {
    const context = buildExtractionContext(client, city);
    log.info(`Starting for ${client.id}: ${context.niche} in ${city}`);

    const documents = await this.source.gather({ city, niche: context.niche });
    if (documents.length === 0) {
      log.warn('No competitor text gathered; the record will carry an empty extraction');
    }

    const rawText = combineDocuments(documents, this.options.rawTextLimit);
    // Headers alone do not count as gathered text
    const gathered = documents.map((doc) => doc.text).join(' ').replace(/\s+/g, ' ').trim();
    const extraction = await this.extractor.extract(gathered.length < MIN_TEXT_CHARS ? '' : rawText, context);

    const record = this.store.createResearchRecord({
      clientId: client.id,
      city,
      category: context.niche,
      rawText,
      services: extraction.services,
      pricingSignals: extraction.pricingSignals,
      gaps: extraction.gaps,
      keywords: extraction.keywords,
      extractionStatus: extraction.status,
      extractionBackend: extraction.backend,
      sources: documents.map(({ name, url, kind }) => ({ name, url, kind }))
    });

    log.info(`Saved research record ${record.id} (${record.extractionStatus}, ${documents.length} sources)`);
    return record;
  }
}

// Prompts for the research extraction backends

import type { ExtractionContext } from '../../shared/types.js';

export const EXTRACTION_SYSTEM_PROMPT = `You are a data extraction engine for local service market research.
You return only data that matches the requested schema. No commentary.

Rules:
- Extract ONLY what is explicitly stated in the text. Do not guess or invent services or prices.
- services: services the competitors say they offer, short noun phrases ("hot tub removal").
- pricingSignals: each price, rate or pricing policy mentioned, as a label and a value.
  Use a number when the text states a plain amount in dollars, otherwise the phrase as written.
- gaps: weaknesses, complaints or things no competitor offers that a rival could exploit
  ("no online booking", "no same-day service"). Empty when none are evident.
- keywords: search phrases a customer would type, 2-5 words, lowercase, most relevant first.
  Prefer service + city phrases ("junk removal phoenix").
- Use empty lists when the text has nothing for a field.`;

const vocabularyLine = (context: ExtractionContext): string =>
  context.coreServices && context.coreServices.length > 0
    ? `Typical service names in this category (use them for naming only; never assume a competitor offers one): ${context.coreServices.join(', ')}\n`
    : '';

export const buildExtractionPrompt = (text: string, context: ExtractionContext): string => `Business category: ${context.niche}
Target city: ${context.city}
${vocabularyLine(context)}
Competitor research text:
"""
${text}
"""

Extract services, pricingSignals, gaps and keywords.`;

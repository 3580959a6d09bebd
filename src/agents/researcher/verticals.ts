// Vertical config: one pipeline, several home-service industries

import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const DEFAULT_VERTICAL = 'junk_removal';

const verticalSchema = z.object({
  niche: z.string(),
  coreServices: z.array(z.string()),
  negativeKeywords: z.array(z.string())
});

const verticalsSchema = z.record(verticalSchema);

export type VerticalConfig = z.infer<typeof verticalSchema>;

const VERTICALS_URL = new URL('../../../data/verticals.json', import.meta.url);

let cache: Record<string, VerticalConfig> | null = null;

const loadVerticals = (): Record<string, VerticalConfig> => {
  if (cache) return cache;
  cache = verticalsSchema.parse(JSON.parse(readFileSync(VERTICALS_URL, 'utf8')));
  return cache;
};

export const normalizeCategory = (category?: string): string =>
  (category || '').trim().toLowerCase().replace(/[\s-]+/g, '_') || DEFAULT_VERTICAL;

// Unknown categories fall back to the default vertical
export const getVertical = (category?: string): VerticalConfig => {
  const verticals = loadVerticals();
  const key = normalizeCategory(category);
  const config = verticals[key] ?? verticals[DEFAULT_VERTICAL];
  if (!config) {
    throw new Error(`verticals.json has no "${DEFAULT_VERTICAL}" entry`);
  }
  return config;
};

export const listVerticals = (): string[] => Object.keys(loadVerticals());

// Post-processing for extracted fields. Even well-formed model output needs cleanup before it is stored.

import type { PricingValue } from '../../shared/types.js';

const MAX_KEYWORD_WORDS = 6;

// "Phoenix AZ" / "Phoenix, AZ" -> "phoenix"; "New York" stays whole
export const cityName = (city: string): string => {
  const trimmed = city.trim().replace(/\s+/g, ' ');
  const withoutComma = trimmed.split(',')[0]?.trim() ?? '';
  const parts = withoutComma.split(' ');
  if (withoutComma === trimmed && parts.length >= 2 && /^[A-Za-z]{2}$/.test(parts[parts.length - 1] ?? '')) {
    return parts.slice(0, -1).join(' ').toLowerCase();
  }
  return withoutComma.toLowerCase();
};

// Trim, collapse whitespace, drop blanks, de-duplicate case-insensitively (first spelling wins)
export const cleanList = (values: readonly string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const cleaned = value.replace(/\s+/g, ' ').trim();
    if (!cleaned) continue;
    const key = cleaned.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(cleaned);
  }
  return result;
};

export const isValidKeyword = (keyword: string, negativeTerms: readonly string[] = []): boolean => {
  const k = keyword.trim().toLowerCase();
  if (k.length < 3 || !/[a-z]/.test(k)) return false;

  const words = k.split(/\s+/);
  if (words.length > MAX_KEYWORD_WORDS) return false;

  return !negativeTerms.some((term) => term && k.includes(term.toLowerCase()));
};

// Stable: keywords naming the target city move ahead, otherwise the backend's order stands
export const rankKeywords = (keywords: readonly string[], city: string): string[] => {
  const target = cityName(city);
  const geo: string[] = [];
  const rest: string[] = [];
  for (const keyword of keywords) {
    if (target && keyword.includes(target)) {
      geo.push(keyword);
    } else {
      rest.push(keyword);
    }
  }
  return [...geo, ...rest];
};

export const normalizeKeywords = (
  keywords: readonly string[],
  city: string,
  negativeTerms: readonly string[] = []
): string[] => {
  const lowered = cleanList(keywords.map((k) => k.toLowerCase().replace(/^[-*•\s]+/, '')));
  return rankKeywords(lowered.filter((k) => isValidKeyword(k, negativeTerms)), city);
};

export const normalizePricing = (
  signals: ReadonlyArray<{ label: string; value: PricingValue }>
): Record<string, PricingValue> => {
  const entries: Array<[string, PricingValue]> = [];
  const seen = new Set<string>();
  for (const signal of signals) {
    const label = signal.label.replace(/\s+/g, ' ').trim();
    if (!label || seen.has(label.toLowerCase())) continue;

    let value: PricingValue;
    if (typeof signal.value === 'number') {
      if (!Number.isFinite(signal.value)) continue;
      value = signal.value;
    } else {
      value = signal.value.trim();
      if (!value) continue;
    }

    seen.add(label.toLowerCase());
    entries.push([label, value]);
  }
  // fromEntries defines own properties, so labels like "__proto__" survive
  return Object.fromEntries(entries);
};

// Opportunity scoring. Pure: the same research fields always give the same score.

import { cityName } from '../researcher/keywords.js';
import type { ResearchRecord } from '../../shared/types.js';

export const BASELINE_SCORE = 10;
export const MAX_SCORE = 100;

export const SCORE_WEIGHTS = {
  perCompleteField: 10,
  perGap: 5,
  maxGaps: 4,
  pricingGap: 5,
  perKeyword: 1.5,
  maxKeywords: 10,
  perGeoKeyword: 2,
  maxGeoKeywords: 3,
  perUncontestedService: 3,
  maxUncontestedServices: 3
} as const;

export type ScorableRecord = Pick<ResearchRecord, 'services' | 'pricingSignals' | 'gaps' | 'keywords' | 'city'>;

export interface ScoreBreakdown {
  baseline: number;
  completeness: number;
  gaps: number;
  pricingGap: number;
  keywordVolume: number;
  geoKeywords: number;
  uncontestedServices: number;
}

export interface OpportunityScore {
  score: number;
  breakdown: ScoreBreakdown;
  uncontested: string[];
  geoKeywords: string[];
}

// Services no competitor keyword targets: the overlap is zero, so the ground is open
export const findUncontestedServices = (record: Pick<ResearchRecord, 'services' | 'keywords'>): string[] =>
  record.services.filter((service) => {
    const needle = service.toLowerCase();
    return !record.keywords.some((keyword) => keyword.toLowerCase().includes(needle));
  });

export const findGeoKeywords = (record: Pick<ResearchRecord, 'keywords' | 'city'>): string[] => {
  const target = cityName(record.city);
  if (!target) return [];
  return record.keywords.filter((keyword) => keyword.toLowerCase().includes(target));
};

// Services are known but nobody publishes a price
export const hasPricingGap = (record: Pick<ResearchRecord, 'services' | 'pricingSignals'>): boolean =>
  record.services.length > 0 && Object.keys(record.pricingSignals).length === 0;

export const scoreResearch = (record: ScorableRecord): OpportunityScore => {
  const w = SCORE_WEIGHTS;

  const filled = [
    record.services.length > 0,
    Object.keys(record.pricingSignals).length > 0,
    record.gaps.length > 0,
    record.keywords.length > 0
  ].filter(Boolean).length;

  const uncontested = findUncontestedServices(record);
  const geoKeywords = findGeoKeywords(record);

  const breakdown: ScoreBreakdown = {
    baseline: BASELINE_SCORE,
    completeness: filled * w.perCompleteField,
    gaps: Math.min(record.gaps.length, w.maxGaps) * w.perGap,
    pricingGap: hasPricingGap(record) ? w.pricingGap : 0,
    keywordVolume: Math.min(record.keywords.length, w.maxKeywords) * w.perKeyword,
    geoKeywords: Math.min(geoKeywords.length, w.maxGeoKeywords) * w.perGeoKeyword,
    uncontestedServices: Math.min(uncontested.length, w.maxUncontestedServices) * w.perUncontestedService
  };

  const total = Object.values(breakdown).reduce((sum, part) => sum + part, 0);
  const score = Math.max(0, Math.min(MAX_SCORE, Math.round(total)));

  return { score, breakdown, uncontested, geoKeywords };
};

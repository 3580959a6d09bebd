// Content drafting: Google Business Profile and Facebook posts from a scored research record

import { cityName } from '../researcher/keywords.js';
import { hasPricingGap, type OpportunityScore } from './scorer.js';
import type { Platform, ResearchRecord } from '../../shared/types.js';

// Shorter than this is not a post anyone would publish
export const MIN_BODY_CHARS = 50;

const MAX_NOTED_GAPS = 5;
const MAX_HASHTAGS = 3;

export type DraftableRecord = Pick<
  ResearchRecord,
  'services' | 'pricingSignals' | 'gaps' | 'keywords' | 'city' | 'category'
>;

export interface PostDraft {
  platform: Platform;
  title: string;
  body: string;
}

export interface DraftPlan {
  topic: string;
  differentiationNotes: string[];
  posts: PostDraft[];
}

const titleCase = (text: string): string =>
  text.replace(/\b([a-z])/g, (letter) => letter.toUpperCase());

const lowerFirst = (text: string): string =>
  text.charAt(0).toLowerCase() + text.slice(1);

const listPhrase = (items: string[]): string => {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
};

const hashtag = (keyword: string): string =>
  `#${keyword.replace(/[^a-z0-9]+/gi, '')}`;

// Open ground beats crowded ground: uncontested service, then any service, then the top keyword
export const chooseTopic = (record: DraftableRecord, score: OpportunityScore): string =>
  score.uncontested[0] ?? record.services[0] ?? record.keywords[0] ?? record.category.toLowerCase();

export const buildDifferentiationNotes = (record: DraftableRecord, score: OpportunityScore): string[] => {
  const notes = record.gaps
    .slice(0, MAX_NOTED_GAPS)
    .map((gap) => `Competitor gap: ${gap}. Lead with the opposite.`);

  for (const service of score.uncontested) {
    notes.push(`No competitor keyword targets "${service}"; claim it with a dedicated post and page.`);
  }

  const priced = Object.entries(record.pricingSignals);
  if (hasPricingGap(record)) {
    notes.push('Competitors publish no pricing; show upfront pricing or a free-quote offer.');
  } else if (priced.length > 0) {
    const seen = priced.map(([label, value]) => `${label}: ${value}`).join('; ');
    notes.push(`Competitor pricing seen (${seen}); position against it.`);
  }

  if (notes.length === 0) {
    return [
      `No competitor gaps were found for ${record.city}; lead with reliability, local ownership and upfront quotes.`,
      'Re-run the Researcher once search and extraction are reachable to sharpen these notes.'
    ];
  }
  return notes;
};

const googleBusinessPost = (record: DraftableRecord, topic: string): PostDraft => {
  const niche = record.category.toLowerCase();
  const lines = [`${titleCase(topic)} in ${record.city}, done right.`];

  const gaps = record.gaps.slice(0, 3);
  if (gaps.length > 0) {
    lines.push(`Other ${niche} companies in ${record.city} leave customers with ${lowerFirst(gaps.join('; '))}. We don't.`);
  }

  const services = record.services.slice(0, 4);
  lines.push(services.length > 0
    ? `We handle ${listPhrase(services)}.`
    : `We handle ${niche} jobs of every size.`);

  if (hasPricingGap(record)) {
    lines.push('Upfront pricing with no surprises: ask for a free quote.');
  }

  lines.push(`Call or book online today for ${topic} anywhere in ${record.city}.`);

  return {
    platform: 'google_business',
    title: `${titleCase(topic)} in ${record.city}`,
    body: lines.join('\n\n')
  };
};

const facebookPost = (record: DraftableRecord, topic: string): PostDraft => {
  const parts = [`${record.city} neighbors: need ${topic}?`];

  const firstGap = record.gaps[0];
  if (firstGap) {
    parts.push(`Tired of ${lowerFirst(firstGap)}?`);
  }
  parts.push('Our local crew makes it easy. Message us for a fast, free quote!');

  const tags = record.keywords.slice(0, MAX_HASHTAGS).map(hashtag).filter((tag) => tag.length > 1);
  const body = tags.length > 0 ? `${parts.join(' ')}\n\n${tags.join(' ')}` : parts.join(' ');

  return {
    platform: 'facebook',
    title: `${titleCase(topic)} for ${record.city} neighbors`,
    body
  };
};

export const draftContent = (record: DraftableRecord, score: OpportunityScore): DraftPlan => {
  const topic = chooseTopic(record, score);
  return {
    topic,
    differentiationNotes: buildDifferentiationNotes(record, score),
    posts: [googleBusinessPost(record, topic), facebookPost(record, topic)]
  };
};

// Quality gate: too short, or no mention of the target city
export const isBadDraft = (body: string, city: string): boolean => {
  if (body.trim().length < MIN_BODY_CHARS) return true;
  const target = cityName(city);
  return !target || !body.toLowerCase().includes(target);
};

// Unit tests for post drafting and the quality gate

import { describe, it, expect } from 'vitest';
import { draftContent, isBadDraft, type DraftableRecord } from '../../../src/agents/strategist/drafter.js';
import { scoreResearch } from '../../../src/agents/strategist/scorer.js';

const scenario: DraftableRecord = {
  services: ['junk removal'],
  pricingSignals: {},
  gaps: ['no online booking'],
  keywords: ['same day junk removal phoenix'],
  city: 'Phoenix',
  category: 'Junk Removal'
};

const plan = (record: DraftableRecord) => draftContent(record, scoreResearch(record));

describe('draftContent', () => {
  it('drafts a Google Business post and a Facebook post', () => {
    const result = plan(scenario);

    expect(result.topic).toBe('junk removal');
    expect(result.posts).toEqual([
      {
        platform: 'google_business',
        title: 'Junk Removal in Phoenix',
        body: [
          'Junk Removal in Phoenix, done right.',
          "Other junk removal companies in Phoenix leave customers with no online booking. We don't.",
          'We handle junk removal.',
          'Upfront pricing with no surprises: ask for a free quote.',
          'Call or book online today for junk removal anywhere in Phoenix.'
        ].join('\n\n')
      },
      {
        platform: 'facebook',
        title: 'Junk Removal for Phoenix neighbors',
        body: 'Phoenix neighbors: need junk removal? Tired of no online booking? Our local crew makes it easy. Message us for a fast, free quote!\n\n#samedayjunkremovalphoenix'
      }
    ]);
  });

  it('derives differentiation notes from gaps and pricing', () => {
    expect(plan(scenario).differentiationNotes).toEqual([
      'Competitor gap: no online booking. Lead with the opposite.',
      'Competitors publish no pricing; show upfront pricing or a free-quote offer.'
    ]);
  });

  it('leads with an uncontested service', () => {
    const result = plan({
      ...scenario,
      services: ['junk removal', 'hot tub removal'],
      pricingSignals: { 'Minimum load': 99 },
      gaps: []
    });

    expect(result.topic).toBe('hot tub removal');
    expect(result.posts[0]?.title).toBe('Hot Tub Removal in Phoenix');
    expect(result.differentiationNotes).toEqual([
      'No competitor keyword targets "hot tub removal"; claim it with a dedicated post and page.',
      'Competitor pricing seen (Minimum load: 99); position against it.'
    ]);
  });

  it('falls back to generic drafts for an empty record', () => {
    const result = plan({ ...scenario, services: [], gaps: [], keywords: [] });

    expect(result.topic).toBe('junk removal');
    expect(result.differentiationNotes).toEqual([
      'No competitor gaps were found for Phoenix; lead with reliability, local ownership and upfront quotes.',
      'Re-run the Researcher once search and extraction are reachable to sharpen these notes.'
    ]);
    expect(result.posts[0]?.body).toBe([
      'Junk Removal in Phoenix, done right.',
      'We handle junk removal jobs of every size.',
      'Call or book online today for junk removal anywhere in Phoenix.'
    ].join('\n\n'));
    expect(result.posts.every((post) => !isBadDraft(post.body, scenario.city))).toBe(true);
  });
});

describe('isBadDraft', () => {
  it('fails short bodies', () => {
    expect(isBadDraft('Phoenix junk removal today!', 'Phoenix')).toBe(true);
  });

  it('fails bodies that never mention the city', () => {
    expect(isBadDraft('Fast, friendly junk removal with upfront pricing and same day pickup.', 'Phoenix')).toBe(true);
  });

  it('passes bodies that name the city, ignoring the state code', () => {
    expect(isBadDraft('Fast, friendly junk removal in phoenix with upfront pricing and same day pickup.', 'Phoenix AZ')).toBe(false);
  });
});

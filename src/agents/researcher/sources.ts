// Web research: Tavily finds local competitors, Firecrawl scrapes their sites

import Firecrawl from '@mendable/firecrawl-js';
import { z } from 'zod';
import { createLogger } from '../../shared/logger.js';
import { createConfigError, createProviderError, errorMessage } from '../../shared/errors.js';
import type { Config } from '../../config.js';
import type { ScrapedDocument } from '../../shared/types.js';

const log = createLogger('Sources');

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

// A scrape shorter than this is a cookie banner or an error page, not content
const MIN_SCRAPE_CHARS = 50;

// Listings and social profiles: never scraped, researched through reviews instead
export const NON_WEBSITE_DOMAINS = [
  'facebook.com', 'fb.com', 'instagram.com', 'linkedin.com',
  'yelp.com', 'youtube.com', 'tripadvisor.com',
  'google.com/maps', 'maps.google.com', 'goo.gl/maps',
  'bing.com/maps', 'yellowpages.com', 'angieslist.com',
  'homeadvisor.com', 'nextdoor.com', 'thumbtack.com'
];

export const hasRealWebsite = (url: string): boolean => {
  if (!url || url.length < 10) return false;
  const lower = url.toLowerCase();
  return !NON_WEBSITE_DOMAINS.some((domain) => lower.includes(domain));
};

export const domainFromUrl = (url: string): string => {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
};

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
  score: number;
}

export interface ResearchQuery {
  city: string;
  niche: string;
}

export interface ResearchSource {
  gather(query: ResearchQuery): Promise<ScrapedDocument[]>;
}

const tavilyResponseSchema = z.object({
  results: z.array(z.object({
    title: z.string().default(''),
    url: z.string().default(''),
    content: z.string().default(''),
    score: z.number().default(0)
  }))
});

const firecrawlDocumentSchema = z.object({
  markdown: z.string().optional()
});

export class TavilyClient {
  constructor(
    private apiKey: string,
    private options: { timeoutMs: number; searchDepth: 'basic' | 'advanced' }
  ) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const response = await fetch(TAVILY_SEARCH_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({
        api_key: this.apiKey,
        query,
        max_results: maxResults,
        search_depth: this.options.searchDepth,
        include_answer: false,
        include_raw_content: false
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs)
    });

    if (!response.ok) {
      throw createProviderError('Tavily', response.status, response.statusText);
    }

    const parsed = tavilyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw createProviderError('Tavily', response.status, 'unexpected response shape');
    }

    return parsed.data.results.map((r) => ({
      title: r.title.trim(),
      url: r.url.trim(),
      snippet: r.content.trim(),
      score: r.score
    }));
  }
}

// The slice of the Firecrawl SDK the scraper calls
export interface ScrapeApi {
  scrape(url: string, options: { formats: Array<'markdown'>; onlyMainContent: boolean; timeout: number }): Promise<unknown>;
}

export class FirecrawlClient {
  private api: ScrapeApi;

  constructor(apiKey: string, private options: { timeoutMs: number }, api?: ScrapeApi) {
    this.api = api ?? new Firecrawl({ apiKey });
  }

  // Markdown of the page's main content, or null when the scrape is unusable
  async scrape(url: string): Promise<string | null> {
    if (!hasRealWebsite(url)) return null;

    try {
      const document = await this.api.scrape(url, {
        formats: ['markdown'],
        onlyMainContent: true,
        timeout: this.options.timeoutMs
      });

      const parsed = firecrawlDocumentSchema.safeParse(document);
      const markdown = parsed.success ? parsed.data.markdown?.trim() : undefined;
      return markdown && markdown.length >= MIN_SCRAPE_CHARS ? markdown : null;
    } catch (error) {
      log.warn(`Firecrawl scrape failed for ${url}: ${errorMessage(error)}`);
      return null;
    }
  }
}

export interface WebResearchOptions {
  maxResults: number;
  reviewsMaxResults: number;
}

export class WebResearchSource implements ResearchSource {
  constructor(
    private tavily: TavilyClient,
    private firecrawl: FirecrawlClient | null,
    private options: WebResearchOptions
  ) {}

  // Provider failures shrink the result; they never abort the run
  async gather(query: ResearchQuery): Promise<ScrapedDocument[]> {
    const competitors = await this.findCompetitors(query);
    const documents: ScrapedDocument[] = [];

    for (const competitor of competitors) {
      const document = await this.research(competitor, query);
      if (document) {
        documents.push(document);
      } else {
        log.warn(`Skipping ${competitor.title}: no usable text`);
      }
    }

    log.info(`Gathered ${documents.length} of ${competitors.length} competitors`);
    return documents;
  }

  private async findCompetitors(query: ResearchQuery): Promise<SearchResult[]> {
    let results: SearchResult[];
    try {
      results = await this.tavily.search(`${query.niche} ${query.city}`, this.options.maxResults);
    } catch (error) {
      log.warn(`Competitor search failed: ${errorMessage(error)}`);
      return [];
    }

    // One entry per domain and per name; the first hit wins
    const seenDomains = new Set<string>();
    const seenNames = new Set<string>();
    const unique: SearchResult[] = [];
    for (const result of results) {
      if (!result.title) continue;
      const domain = domainFromUrl(result.url);
      if (domain && seenDomains.has(domain)) continue;
      if (seenNames.has(result.title.toLowerCase())) continue;
      if (domain) seenDomains.add(domain);
      seenNames.add(result.title.toLowerCase());
      unique.push(result);
    }
    return unique;
  }

  private async research(competitor: SearchResult, query: ResearchQuery): Promise<ScrapedDocument | null> {
    const base = { name: competitor.title, url: competitor.url };

    if (hasRealWebsite(competitor.url)) {
      const page = this.firecrawl ? await this.firecrawl.scrape(competitor.url) : null;
      if (page) return { ...base, kind: 'website', text: page };
    } else {
      const reviews = await this.reviews(competitor.title, query.niche);
      if (reviews) return { ...base, kind: 'reviews', text: reviews };
    }

    return competitor.snippet ? { ...base, kind: 'snippet', text: competitor.snippet } : null;
  }

  private async reviews(name: string, niche: string): Promise<string> {
    try {
      const results = await this.tavily.search(`"${name}" ${niche} reviews`, this.options.reviewsMaxResults);
      return results.map((r) => r.snippet).filter(Boolean).join(' ').trim();
    } catch (error) {
      log.warn(`Review search failed for ${name}: ${errorMessage(error)}`);
      return '';
    }
  }
}

// The search key is the one credential the Researcher cannot run without
export const createWebResearchSource = (config: Pick<Config, 'search' | 'scrape' | 'http'>): WebResearchSource => {
  if (!config.search.tavilyApiKey) {
    throw createConfigError('TAVILY_API_KEY is not set; the Researcher needs it to find competitors');
  }

  const tavily = new TavilyClient(config.search.tavilyApiKey, {
    timeoutMs: config.http.timeoutMs,
    searchDepth: config.search.searchDepth
  });
  const firecrawl = config.scrape.firecrawlApiKey
    ? new FirecrawlClient(config.scrape.firecrawlApiKey, { timeoutMs: config.http.timeoutMs })
    : null;

  if (!firecrawl) {
    log.info('FIRECRAWL_API_KEY not set; using search snippets instead of page scrapes');
  }

  return new WebResearchSource(tavily, firecrawl, {
    maxResults: config.search.maxResults,
    reviewsMaxResults: config.search.reviewsMaxResults
  });
};

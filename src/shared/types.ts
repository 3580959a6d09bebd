// Shared types for the agency pipeline

// Stages
export type StageName = 'researcher' | 'strategist' | 'pipeline';

// Client profile (read-only for agents)
export interface Client {
  id: string;
  businessName: string;
  category: string;
  city: string;
  websiteUrl?: string;
  createdAt: string;
}

export interface CreateClientInput {
  id: string;
  businessName: string;
  category: string;
  city: string;
  websiteUrl?: string;
}

// Extraction
export type ExtractionStatus = 'succeeded' | 'empty' | 'failed';
export type ExtractionBackendName = 'local' | 'remote';
export type PricingValue = number | string;

export interface ExtractedFields {
  services: string[];
  pricingSignals: Record<string, PricingValue>;
  gaps: string[];
  keywords: string[];
}

export interface ExtractionResult extends ExtractedFields {
  status: ExtractionStatus;
  backend: ExtractionBackendName | null;
}

export interface ExtractionContext {
  city: string;
  category: string;
  niche: string;
  coreServices?: string[];
  negativeKeywords?: string[];
}

// Web research
export type SourceKind = 'website' | 'reviews' | 'snippet';

export interface ResearchSourceRef {
  name: string;
  url: string;
  kind: SourceKind;
}

export interface ScrapedDocument extends ResearchSourceRef {
  text: string;
}

// Research record (immutable once written)
export interface ResearchRecord extends ExtractedFields {
  id: string;
  clientId: string;
  city: string;
  category: string;
  rawText: string;
  extractionStatus: ExtractionStatus;
  extractionBackend: ExtractionBackendName | null;
  sources: ResearchSourceRef[];
  createdAt: string;
}

export type CreateResearchRecordInput = Omit<ResearchRecord, 'id' | 'createdAt'>;

// Content drafts
export type Platform = 'google_business' | 'facebook';
export type DraftStatus = 'pending' | 'approved' | 'rejected' | 'failed';
export type ReviewStatus = 'approved' | 'rejected';

export interface ContentDraft {
  id: string;
  clientId: string;
  researchRecordId: string | null;
  platform: Platform;
  topic: string;
  title: string;
  body: string;
  differentiationNotes: string[];
  score: number;
  status: DraftStatus;
  feedback?: string;
  createdAt: string;
  updatedAt: string;
}

export type CreateDraftInput = Omit<ContentDraft, 'id' | 'createdAt' | 'updatedAt' | 'feedback'>;

// Advisory run lock
export interface RunLock {
  clientId: string;
  stage: StageName;
  owner: string;
  acquiredAt: string;
  expiresAt: string;
}

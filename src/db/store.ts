// Data-access seam shared by the stages. Agents never talk to each other; only through this.

import Database from 'better-sqlite3';
import { ClientStorage } from './clients.js';
import { ResearchStorage } from './research.js';
import { DraftStorage } from './drafts.js';
import { LockStorage, type LockAttempt } from './locks.js';
import { PipelineError, createPersistenceError } from '../shared/errors.js';
import type {
  Client,
  ContentDraft,
  CreateClientInput,
  CreateDraftInput,
  CreateResearchRecordInput,
  ResearchRecord,
  ReviewStatus,
  StageName
} from '../shared/types.js';

export interface PipelineStore {
  getClient(id: string): Client | null;
  createClient(input: CreateClientInput): Client;
  listClients(): Client[];

  createResearchRecord(input: CreateResearchRecordInput): ResearchRecord;
  getResearchRecord(id: string): ResearchRecord | null;
  getLatestResearchRecord(clientId: string): ResearchRecord | null;
  listResearchRecords(clientId: string, limit?: number): ResearchRecord[];

  createDrafts(inputs: CreateDraftInput[]): ContentDraft[];
  listDrafts(clientId: string): ContentDraft[];
  updateDraftStatus(id: string, status: ReviewStatus, feedback?: string): ContentDraft;

  acquireLock(clientId: string, stage: StageName, owner: string, ttlMinutes: number): LockAttempt;
  releaseLock(clientId: string, owner: string): void;
}

export class SqliteStore implements PipelineStore {
  private clients: ClientStorage;
  private research: ResearchStorage;
  private drafts: DraftStorage;
  private locks: LockStorage;

  constructor(db: Database.Database) {
    this.clients = new ClientStorage(db);
    this.research = new ResearchStorage(db);
    this.drafts = new DraftStorage(db);
    this.locks = new LockStorage(db);
  }

  getClient(id: string): Client | null {
    return guard('load the client', () => this.clients.get(id));
  }

  createClient(input: CreateClientInput): Client {
    return guard('save the client', () => this.clients.create(input));
  }

  listClients(): Client[] {
    return guard('list clients', () => this.clients.list());
  }

  createResearchRecord(input: CreateResearchRecordInput): ResearchRecord {
    return guard('save the research record', () => this.research.create(input));
  }

  getResearchRecord(id: string): ResearchRecord | null {
    return guard('load the research record', () => this.research.get(id));
  }

  getLatestResearchRecord(clientId: string): ResearchRecord | null {
    return guard('load the latest research record', () => this.research.getLatest(clientId));
  }

  listResearchRecords(clientId: string, limit?: number): ResearchRecord[] {
    return guard('list research records', () => this.research.list(clientId, limit));
  }

  createDrafts(inputs: CreateDraftInput[]): ContentDraft[] {
    return guard('save drafts', () => this.drafts.createMany(inputs));
  }

  listDrafts(clientId: string): ContentDraft[] {
    return guard('list drafts', () => this.drafts.list(clientId));
  }

  updateDraftStatus(id: string, status: ReviewStatus, feedback?: string): ContentDraft {
    return guard('update the draft', () => this.drafts.updateStatus(id, status, feedback));
  }

  acquireLock(clientId: string, stage: StageName, owner: string, ttlMinutes: number): LockAttempt {
    return guard('acquire the run lock', () => this.locks.acquire(clientId, stage, owner, ttlMinutes));
  }

  releaseLock(clientId: string, owner: string): void {
    guard('release the run lock', () => this.locks.release(clientId, owner));
  }
}

// Store failures are fatal; they surface as persistence errors with the operation named
const guard = <T>(operation: string, fn: () => T): T => {
  try {
    return fn();
  } catch (error) {
    if (error instanceof PipelineError) throw error;
    throw createPersistenceError(operation, error);
  }
};

// Pipeline orchestrator - validates input, takes the client lock, runs the stages in order

import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';
import { SqliteStore, type PipelineStore } from '../db/store.js';
import { ResearcherAgent } from '../agents/researcher/index.js';
import { StrategistAgent, type StrategistResult } from '../agents/strategist/index.js';
import { createDefaultExtractor, type ResearchExtractor } from '../agents/researcher/extractor.js';
import { createWebResearchSource, type ResearchSource } from '../agents/researcher/sources.js';
import { createConflictError, createNotFoundError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { validateCity, validateClientId, validateResearchRecordId } from './validation.js';
import type { Config } from '../config.js';
import type { Client, ResearchRecord, StageName } from '../shared/types.js';

const log = createLogger('Pipeline');

export interface OrchestratorOptions {
  rawTextLimit: number;
  lockTtlMinutes: number;
  extractor: ResearchExtractor;
  // Built lazily: a Strategist-only run needs no search credentials
  createSource: () => ResearchSource;
  owner?: string;
}

export interface PipelineResult {
  research: ResearchRecord;
  strategy: StrategistResult;
}

export class PipelineOrchestrator {
  private owner: string;

  constructor(private store: PipelineStore, private options: OrchestratorOptions) {
    this.owner = options.owner ?? `${process.pid}-${randomUUID()}`;
  }

  async runResearcher(clientId: string, city?: string): Promise<ResearchRecord> {
    const client = this.resolveClient(clientId);
    const targetCity = validateCity(city ?? client.city);
    const researcher = this.createResearcher();

    return this.withLock(client, 'researcher', () => researcher.run(client, targetCity));
  }

  async runStrategist(clientId: string, researchRecordId?: string): Promise<StrategistResult> {
    const client = this.resolveClient(clientId);
    const recordId = researchRecordId === undefined ? undefined : validateResearchRecordId(researchRecordId);
    const strategist = new StrategistAgent(this.store);

    return this.withLock(client, 'strategist', async () => strategist.run(client, recordId));
  }

  // Researcher then Strategist on the record it just wrote, under one lock
  async run(clientId: string, city?: string): Promise<PipelineResult> {
    const client = this.resolveClient(clientId);
    const targetCity = validateCity(city ?? client.city);
    const researcher = this.createResearcher();
    const strategist = new StrategistAgent(this.store);

    return this.withLock(client, 'pipeline', async () => {
      const research = await researcher.run(client, targetCity);
      const strategy = strategist.run(client, research.id);
      return { research, strategy };
    });
  }

  private resolveClient(clientId: string): Client {
    const id = validateClientId(clientId);
    const client = this.store.getClient(id);
    if (!client) {
      throw createNotFoundError('Client', id, 'Add it with "add-client" first.');
    }
    return client;
  }

  private createResearcher(): ResearcherAgent {
    return new ResearcherAgent(this.store, this.options.createSource(), this.options.extractor, {
      rawTextLimit: this.options.rawTextLimit
    });
  }

  private async withLock<T>(client: Client, stage: StageName, fn: () => Promise<T>): Promise<T> {
    const attempt = this.store.acquireLock(client.id, stage, this.owner, this.options.lockTtlMinutes);
    if (!attempt.acquired) {
      throw createConflictError(client.id, attempt.heldBy.stage, attempt.heldBy.expiresAt);
    }

    log.debug(`Lock taken for ${client.id} (${stage})`);
    try {
      return await fn();
    } finally {
      try {
        this.store.releaseLock(client.id, this.owner);
        log.debug(`Lock released for ${client.id}`);
      } catch (error) {
        log.warn(`Could not release the lock for ${client.id}; it expires on its own: ${errorMessage(error)}`);
      }
    }
  }
}

export const createOrchestrator = (db: Database.Database, config: Config): PipelineOrchestrator =>
  new PipelineOrchestrator(new SqliteStore(db), {
    rawTextLimit: config.pipeline.rawTextLimit,
    lockTtlMinutes: config.pipeline.lockTtlMinutes,
    extractor: createDefaultExtractor(config.extraction),
    createSource: () => createWebResearchSource(config)
  });

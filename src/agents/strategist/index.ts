// Strategist agent - scores a research record and drafts platform posts from it

import { createLogger } from '../../shared/logger.js';
import { createNotFoundError, createValidationError } from '../../shared/errors.js';
import { scoreResearch, type OpportunityScore } from './scorer.js';
import { draftContent, isBadDraft } from './drafter.js';
import type { PipelineStore } from '../../db/store.js';
import type { Client, ContentDraft, ResearchRecord } from '../../shared/types.js';

const log = createLogger('Strategist');

export interface StrategistResult {
  researchRecordId: string;
  topic: string;
  opportunity: OpportunityScore;
  drafts: ContentDraft[];
}

export class StrategistAgent {
  constructor(private store: PipelineStore) {}

  run(client: Client, researchRecordId?: string): StrategistResult {
    const record = this.loadRecord(client, researchRecordId);
    log.info(`Scoring research record ${record.id} (${record.extractionStatus})`);

    const opportunity = scoreResearch(record);
    const plan = draftContent(record, opportunity);

    const drafts = this.store.createDrafts(plan.posts.map((post) => ({
      clientId: client.id,
      researchRecordId: record.id,
      platform: post.platform,
      topic: plan.topic,
      title: post.title,
      body: post.body,
      differentiationNotes: plan.differentiationNotes,
      score: opportunity.score,
      status: isBadDraft(post.body, record.city) ? 'failed' : 'pending'
    })));

    const failed = drafts.filter((d) => d.status === 'failed').length;
    if (failed > 0) {
      log.warn(`${failed} draft(s) failed the quality check`);
    }
    log.info(`Saved ${drafts.length} drafts for ${client.id} (score ${opportunity.score}, topic "${plan.topic}")`);

    return { researchRecordId: record.id, topic: plan.topic, opportunity, drafts };
  }

  private loadRecord(client: Client, researchRecordId?: string): ResearchRecord {
    if (researchRecordId) {
      const record = this.store.getResearchRecord(researchRecordId);
      if (!record) {
        throw createNotFoundError('Research record', researchRecordId);
      }
      if (record.clientId !== client.id) {
        throw createValidationError(`Research record ${researchRecordId} belongs to '${record.clientId}', not '${client.id}'`);
      }
      return record;
    }

    const latest = this.store.getLatestResearchRecord(client.id);
    if (!latest) {
      throw createNotFoundError('Research record', client.id, 'Run the Researcher for this client first.');
    }
    return latest;
  }
}

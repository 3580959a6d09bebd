// Draft storage for the Strategist agent

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ContentDraft, CreateDraftInput, ReviewStatus } from '../shared/types.js';
import { createNotFoundError } from '../shared/errors.js';

const notesList = z.array(z.string());
const platform = z.enum(['google_business', 'facebook']);
const draftStatus = z.enum(['pending', 'approved', 'rejected', 'failed']);

export class DraftStorage {
  constructor(private db: Database.Database) {}

  // All drafts of one Strategist run land in a single transaction
  createMany(inputs: CreateDraftInput[]): ContentDraft[] {
    const now = new Date().toISOString();
    const drafts: ContentDraft[] = inputs.map((input) => ({
      id: randomUUID(),
      ...input,
      createdAt: now,
      updatedAt: now
    }));

    const insert = this.db.prepare(`
      INSERT INTO content_drafts (
        id, client_id, research_record_id, platform, topic, title, body,
        differentiation_notes, score, status, created_at, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction((rows: ContentDraft[]) => {
      for (const draft of rows) {
        insert.run(
          draft.id,
          draft.clientId,
          draft.researchRecordId,
          draft.platform,
          draft.topic,
          draft.title,
          draft.body,
          JSON.stringify(draft.differentiationNotes),
          draft.score,
          draft.status,
          draft.createdAt,
          draft.updatedAt
        );
      }
    })(drafts);

    return drafts;
  }

  // Get drafts for a client, newest first
  list(clientId: string): ContentDraft[] {
    const rows = this.db.prepare(`
      SELECT * FROM content_drafts WHERE client_id = ? ORDER BY created_at DESC, rowid ASC
    `).all(clientId) as DraftRow[];
    return rows.map(this.rowToDraft);
  }

  // Get a draft by ID
  get(id: string): ContentDraft | null {
    const row = this.db.prepare('SELECT * FROM content_drafts WHERE id = ?').get(id) as DraftRow | undefined;
    return row ? this.rowToDraft(row) : null;
  }

  // Human review: the only mutation a draft ever sees
  updateStatus(id: string, status: ReviewStatus, feedback?: string): ContentDraft {
    const draft = this.get(id);
    if (!draft) {
      throw createNotFoundError('Draft', id);
    }

    const now = new Date().toISOString();

    this.db.prepare(`
      UPDATE content_drafts
      SET status = ?, feedback = ?, updated_at = ?
      WHERE id = ?
    `).run(status, feedback || null, now, id);

    return { ...draft, status, feedback: feedback || undefined, updatedAt: now };
  }

  // Convert row to ContentDraft
  private rowToDraft(row: DraftRow): ContentDraft {
    return {
      id: row.id,
      clientId: row.client_id,
      researchRecordId: row.research_record_id,
      platform: platform.parse(row.platform),
      topic: row.topic,
      title: row.title,
      body: row.body,
      differentiationNotes: notesList.parse(JSON.parse(row.differentiation_notes)),
      score: row.score,
      status: draftStatus.parse(row.status),
      feedback: row.feedback || undefined,
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }
}

interface DraftRow {
  id: string;
  client_id: string;
  research_record_id: string | null;
  platform: string;
  topic: string;
  title: string;
  body: string;
  differentiation_notes: string;
  score: number;
  status: string;
  feedback: string | null;
  created_at: string;
  updated_at: string;
}

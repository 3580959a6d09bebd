// Research record storage for the Researcher agent

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { CreateResearchRecordInput, ResearchRecord } from '../shared/types.js';

const stringList = z.array(z.string());
const pricingMap = z.record(z.union([z.number(), z.string()]));
const sourceList = z.array(z.object({
  name: z.string(),
  url: z.string(),
  kind: z.enum(['website', 'reviews', 'snippet'])
}));
const extractionStatus = z.enum(['succeeded', 'empty', 'failed']);
const extractionBackend = z.enum(['local', 'remote']).nullable();

export class ResearchStorage {
  constructor(private db: Database.Database) {}

  create(input: CreateResearchRecordInput): ResearchRecord {
    const record: ResearchRecord = {
      id: randomUUID(),
      ...input,
      createdAt: new Date().toISOString()
    };

    this.db.prepare(`
      INSERT INTO research_records (
        id, client_id, city, category, raw_text, services, pricing_signals, gaps, keywords,
        extraction_status, extraction_backend, sources, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.id,
      record.clientId,
      record.city,
      record.category,
      record.rawText,
      JSON.stringify(record.services),
      JSON.stringify(record.pricingSignals),
      JSON.stringify(record.gaps),
      JSON.stringify(record.keywords),
      record.extractionStatus,
      record.extractionBackend,
      JSON.stringify(record.sources),
      record.createdAt
    );

    return record;
  }

  get(id: string): ResearchRecord | null {
    const row = this.db.prepare('SELECT * FROM research_records WHERE id = ?').get(id) as ResearchRow | undefined;
    return row ? this.rowToRecord(row) : null;
  }

  // rowid breaks ties between records written in the same millisecond
  getLatest(clientId: string): ResearchRecord | null {
    const row = this.db.prepare(`
      SELECT * FROM research_records
      WHERE client_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT 1
    `).get(clientId) as ResearchRow | undefined;

    return row ? this.rowToRecord(row) : null;
  }

  list(clientId: string, limit?: number): ResearchRecord[] {
    let query = 'SELECT * FROM research_records WHERE client_id = ? ORDER BY created_at DESC, rowid DESC';
    const params: Array<string | number> = [clientId];

    if (limit) {
      query += ' LIMIT ?';
      params.push(limit);
    }

    const rows = this.db.prepare(query).all(...params) as ResearchRow[];
    return rows.map(this.rowToRecord);
  }

  private rowToRecord(row: ResearchRow): ResearchRecord {
    return {
      id: row.id,
      clientId: row.client_id,
      city: row.city,
      category: row.category,
      rawText: row.raw_text,
      services: stringList.parse(JSON.parse(row.services)),
      pricingSignals: pricingMap.parse(JSON.parse(row.pricing_signals)),
      gaps: stringList.parse(JSON.parse(row.gaps)),
      keywords: stringList.parse(JSON.parse(row.keywords)),
      extractionStatus: extractionStatus.parse(row.extraction_status),
      extractionBackend: extractionBackend.parse(row.extraction_backend),
      sources: sourceList.parse(JSON.parse(row.sources)),
      createdAt: row.created_at
    };
  }
}

interface ResearchRow {
  id: string;
  client_id: string;
  city: string;
  category: string;
  raw_text: string;
  services: string;
  pricing_signals: string;
  gaps: string;
  keywords: string;
  extraction_status: string;
  extraction_backend: string | null;
  sources: string;
  created_at: string;
}

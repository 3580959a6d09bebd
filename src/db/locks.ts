// Advisory per-client run lock

import Database from 'better-sqlite3';
import type { RunLock, StageName } from '../shared/types.js';

export type LockAttempt =
  | { acquired: true; lock: RunLock }
  | { acquired: false; heldBy: RunLock };

export class LockStorage {
  constructor(private db: Database.Database) {}

  acquire(clientId: string, stage: StageName, owner: string, ttlMinutes: number, now: Date = new Date()): LockAttempt {
    const attempt = this.db.transaction((): LockAttempt => {
      // Expired locks belong to runs that died without releasing
      this.db.prepare('DELETE FROM run_locks WHERE client_id = ? AND expires_at <= ?').run(clientId, now.toISOString());

      const existing = this.db.prepare('SELECT * FROM run_locks WHERE client_id = ?').get(clientId) as LockRow | undefined;
      if (existing) {
        return { acquired: false, heldBy: this.rowToLock(existing) };
      }

      const lock: RunLock = {
        clientId,
        stage,
        owner,
        acquiredAt: now.toISOString(),
        expiresAt: new Date(now.getTime() + ttlMinutes * 60_000).toISOString()
      };

      this.db.prepare(`
        INSERT INTO run_locks (client_id, stage, owner, acquired_at, expires_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(lock.clientId, lock.stage, lock.owner, lock.acquiredAt, lock.expiresAt);

      return { acquired: true, lock };
    });

    return attempt.immediate();
  }

  release(clientId: string, owner: string): void {
    this.db.prepare('DELETE FROM run_locks WHERE client_id = ? AND owner = ?').run(clientId, owner);
  }

  get(clientId: string): RunLock | null {
    const row = this.db.prepare('SELECT * FROM run_locks WHERE client_id = ?').get(clientId) as LockRow | undefined;
    return row ? this.rowToLock(row) : null;
  }

  private rowToLock(row: LockRow): RunLock {
    return {
      clientId: row.client_id,
      stage: parseStage(row.stage),
      owner: row.owner,
      acquiredAt: row.acquired_at,
      expiresAt: row.expires_at
    };
  }
}

const parseStage = (value: string): StageName => {
  if (value === 'researcher' || value === 'strategist' || value === 'pipeline') {
    return value;
  }
  return 'pipeline';
};

interface LockRow {
  client_id: string;
  stage: string;
  owner: string;
  acquired_at: string;
  expires_at: string;
}

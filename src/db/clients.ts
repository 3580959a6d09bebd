// Client storage. Clients come from onboarding; agents only read them.

import Database from 'better-sqlite3';
import type { Client, CreateClientInput } from '../shared/types.js';

export class ClientStorage {
  constructor(private db: Database.Database) {}

  create(input: CreateClientInput): Client {
    const client: Client = {
      id: input.id,
      businessName: input.businessName,
      category: input.category,
      city: input.city,
      websiteUrl: input.websiteUrl,
      createdAt: new Date().toISOString()
    };

    this.db.prepare(`
      INSERT INTO clients (id, business_name, category, city, website_url, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      client.id,
      client.businessName,
      client.category,
      client.city,
      client.websiteUrl || null,
      client.createdAt
    );

    return client;
  }

  // Case-insensitive: the CLI may pass "ACME" for a stored "acme"
  get(id: string): Client | null {
    const row = this.db.prepare('SELECT * FROM clients WHERE lower(id) = lower(?)').get(id) as ClientRow | undefined;
    return row ? this.rowToClient(row) : null;
  }

  list(): Client[] {
    const rows = this.db.prepare('SELECT * FROM clients ORDER BY created_at ASC').all() as ClientRow[];
    return rows.map(this.rowToClient);
  }

  private rowToClient(row: ClientRow): Client {
    return {
      id: row.id,
      businessName: row.business_name,
      category: row.category,
      city: row.city,
      websiteUrl: row.website_url || undefined,
      createdAt: row.created_at
    };
  }
}

interface ClientRow {
  id: string;
  business_name: string;
  category: string;
  city: string;
  website_url: string | null;
  created_at: string;
}

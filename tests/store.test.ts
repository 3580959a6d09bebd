import { afterEach, beforeEach, describe, expect, it } from "vitest";
import Database from "better-sqlite3";
import path from "node:path";
import { promises as fs } from "node:fs";
import { randomUUID } from "node:crypto";
import { closeDatabase, getDatabase, initializeDatabase } from "../src/db/index.js";
import { SqliteStore } from "../src/db/store.js";
import { LockStorage } from "../src/db/locks.js";
import { ErrorCategory, PipelineError } from "../src/shared/errors.js";
import type { CreateResearchRecordInput } from "../src/shared/types.js";

const researchInput = (overrides: Partial<CreateResearchRecordInput> = {}): CreateResearchRecordInput => ({
  clientId: "acme",
  city: "Phoenix",
  category: "Junk Removal",
  rawText: "### Desert Haulers\nSame day junk removal.",
  services: ["junk removal"],
  pricingSignals: { "minimum load": 99, "full truck": "$600" },
  gaps: ["no online booking"],
  keywords: ["junk removal phoenix"],
  extractionStatus: "succeeded",
  extractionBackend: "local",
  sources: [{ name: "Desert Haulers", url: "https://deserthaulers.com/", kind: "website" }],
  ...overrides
});

describe("SqliteStore", () => {
  let db: Database.Database;
  let store: SqliteStore;
  let testDbPath: string;

  beforeEach(async () => {
    testDbPath = path.join("/tmp", `test-store-${randomUUID()}.sqlite`);
    db = await initializeDatabase({ path: testDbPath });
    store = new SqliteStore(db);
    store.createClient({ id: "acme", businessName: "Acme Hauling", category: "junk_removal", city: "Phoenix" });
  });

  afterEach(async () => {
    closeDatabase();
    try {
      await fs.unlink(testDbPath);
    } catch {
      // Ignore cleanup errors
    }
  });

  describe("clients", () => {
    it("looks clients up case-insensitively", () => {
      expect(store.getClient("ACME")?.id).toBe("acme");
      expect(store.getClient("nobody")).toBeNull();
    });

    it("wraps constraint failures as persistence errors", () => {
      let caught: unknown;
      try {
        store.createClient({ id: "Acme", businessName: "Other", category: "junk_removal", city: "Tucson" });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(PipelineError);
      expect(caught instanceof PipelineError && caught.category).toBe(ErrorCategory.PERSISTENCE);
    });
  });

  describe("research records", () => {
    it("round-trips every field", () => {
      const created = store.createResearchRecord(researchInput());

      expect(store.getResearchRecord(created.id)).toEqual(created);
    });

    it("keeps a failed extraction with its raw text", () => {
      const created = store.createResearchRecord(researchInput({
        services: [],
        pricingSignals: {},
        gaps: [],
        keywords: [],
        extractionStatus: "failed",
        extractionBackend: null
      }));

      const loaded = store.getResearchRecord(created.id);
      expect(loaded?.extractionStatus).toBe("failed");
      expect(loaded?.extractionBackend).toBeNull();
      expect(loaded?.rawText).toBe("### Desert Haulers\nSame day junk removal.");
    });

    it("returns the newest record as latest", () => {
      store.createResearchRecord(researchInput({ city: "Tempe" }));
      const second = store.createResearchRecord(researchInput({ city: "Mesa" }));

      expect(store.getLatestResearchRecord("acme")?.id).toBe(second.id);
      expect(store.listResearchRecords("acme", 1).map((r) => r.city)).toEqual(["Mesa"]);
      expect(store.listResearchRecords("acme")).toHaveLength(2);
      expect(store.getLatestResearchRecord("nobody")).toBeNull();
    });
  });

  describe("drafts", () => {
    it("saves a batch and records review decisions", () => {
      const record = store.createResearchRecord(researchInput());
      const drafts = store.createDrafts([
        {
          clientId: "acme",
          researchRecordId: record.id,
          platform: "google_business",
          topic: "junk removal",
          title: "Junk Removal in Phoenix",
          body: "Junk Removal in Phoenix, done right.",
          differentiationNotes: ["Competitor gap: no online booking. Lead with the opposite."],
          score: 54,
          status: "pending"
        },
        {
          clientId: "acme",
          researchRecordId: record.id,
          platform: "facebook",
          topic: "junk removal",
          title: "Junk Removal for Phoenix neighbors",
          body: "Phoenix neighbors: need junk removal?",
          differentiationNotes: [],
          score: 54,
          status: "failed"
        }
      ]);

      expect(store.listDrafts("acme").map((d) => d.platform)).toEqual(["google_business", "facebook"]);

      const firstId = drafts[0]?.id ?? "";
      const approved = store.updateDraftStatus(firstId, "approved", "Ship it");
      expect(approved.status).toBe("approved");
      expect(approved.feedback).toBe("Ship it");
      expect(store.listDrafts("acme")[0]).toEqual(approved);
    });

    it("reports unknown drafts as not found", () => {
      expect(() => store.updateDraftStatus("missing", "rejected", "No")).toThrow("Draft not found: missing");
    });
  });

  describe("locks", () => {
    it("lets one run hold a client at a time", () => {
      const first = store.acquireLock("acme", "researcher", "run-1", 15);
      const second = store.acquireLock("acme", "strategist", "run-2", 15);

      expect(first.acquired).toBe(true);
      expect(second.acquired).toBe(false);
      if (!second.acquired) {
        expect(second.heldBy.owner).toBe("run-1");
        expect(second.heldBy.stage).toBe("researcher");
      }

      store.releaseLock("acme", "run-1");
      expect(store.acquireLock("acme", "strategist", "run-2", 15).acquired).toBe(true);
    });

    it("only lets the owner release", () => {
      store.acquireLock("acme", "pipeline", "run-1", 15);
      store.releaseLock("acme", "run-2");

      expect(store.acquireLock("acme", "pipeline", "run-3", 15).acquired).toBe(false);
    });

    it("replaces an expired lock", () => {
      const locks = new LockStorage(db);
      const start = new Date("2026-01-01T10:00:00.000Z");
      locks.acquire("acme", "pipeline", "crashed-run", 15, start);

      const later = new Date("2026-01-01T10:16:00.000Z");
      const attempt = locks.acquire("acme", "researcher", "run-2", 15, later);

      expect(attempt.acquired).toBe(true);
      expect(locks.get("acme")?.owner).toBe("run-2");
      expect(locks.get("acme")?.expiresAt).toBe("2026-01-01T10:31:00.000Z");
    });
  });
});

describe("store without a schema", () => {
  const testDbPath = path.join("/tmp", `test-noschema-${randomUUID()}.sqlite`);

  afterEach(async () => {
    closeDatabase();
    try {
      await fs.unlink(testDbPath);
    } catch {
      // Ignore cleanup errors
    }
  });

  it("tells the operator to run init", () => {
    const store = new SqliteStore(getDatabase({ path: testDbPath }));

    expect(() => store.getClient("acme")).toThrow(PipelineError);
    try {
      store.getClient("acme");
    } catch (error) {
      expect(error instanceof PipelineError && error.userMessage).toBe(
        'The store has no schema yet. Run "init" first. (load the client failed)'
      );
    }
  });
});

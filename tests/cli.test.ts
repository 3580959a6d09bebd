import { afterEach, describe, expect, it } from "vitest";
import { spawnSync } from "node:child_process";
import path from "node:path";
import os from "node:os";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { closeDatabase, getDatabase } from "../src/db/index.js";
import { SqliteStore } from "../src/db/store.js";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const cliPath = path.join(repoRoot, "src", "cli.ts");
const tsxBin = path.join(repoRoot, "node_modules", ".bin", "tsx");

// No provider keys: nothing in these runs may reach the network
const runCli = (args: string[], cwd: string, extraEnv: Record<string, string> = {}) =>
  spawnSync(tsxBin, [cliPath, ...args], {
    cwd,
    encoding: "utf8",
    env: {
      PATH: process.env.PATH ?? "",
      HOME: cwd,
      DATABASE_PATH: path.join(cwd, "agency.sqlite"),
      OLLAMA_ENABLED: "false",
      LOG_LEVEL: "error",
      ...extraEnv
    }
  });

const makeTempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), "agency-cli-"));

describe("CLI integration", () => {
  afterEach(() => {
    closeDatabase();
  });

  it("initializes the store and manages clients", () => {
    const tempDir = makeTempDir();

    const initResult = runCli(["init"], tempDir);
    expect(initResult.status).toBe(0);
    expect(fs.existsSync(path.join(tempDir, "agency.sqlite"))).toBe(true);

    const addResult = runCli(
      ["add-client", "--id", "acme", "--name", "Acme Hauling", "--city", "Phoenix AZ", "--category", "junk removal"],
      tempDir
    );
    expect(addResult.status).toBe(0);
    const client = JSON.parse(addResult.stdout) as { id: string; city: string; category: string };
    expect(client.id).toBe("acme");
    expect(client.city).toBe("Phoenix AZ");
    expect(client.category).toBe("junk_removal");

    const listResult = runCli(["clients"], tempDir);
    const clients = JSON.parse(listResult.stdout) as { id: string }[];
    expect(clients.map((c) => c.id)).toEqual(["acme"]);

    const draftsResult = runCli(["drafts", "ACME"], tempDir);
    expect(draftsResult.status).toBe(0);
    expect(JSON.parse(draftsResult.stdout)).toEqual([]);
  });

  it("refuses to run before init", () => {
    const tempDir = makeTempDir();

    const result = runCli(["clients"], tempDir);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain("Could not open the store at");
    expect(fs.existsSync(path.join(tempDir, "agency.sqlite"))).toBe(false);
  });

  it("fails the Strategist when no research exists", () => {
    const tempDir = makeTempDir();
    runCli(["init"], tempDir);
    runCli(["add-client", "--id", "acme", "--name", "Acme Hauling", "--city", "Phoenix"], tempDir);

    const result = runCli(["run", "acme", "--strategist-only"], tempDir);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain("Research record 'acme' not found. Run the Researcher for this client first.");
  });

  it("rejects a malformed city before any research", () => {
    const tempDir = makeTempDir();
    runCli(["init"], tempDir);
    runCli(["add-client", "--id", "acme", "--name", "Acme Hauling", "--city", "Phoenix"], tempDir);

    const result = runCli(["run", "acme", "--researcher-only", "--city", "12345"], tempDir, {
      TAVILY_API_KEY: "test-key"
    });

    expect(result.status).toBe(1);
    expect(result.stderr).toContain('Invalid city "12345"');
  });

  it("requires the search key for the Researcher", () => {
    const tempDir = makeTempDir();
    runCli(["init"], tempDir);
    runCli(["add-client", "--id", "acme", "--name", "Acme Hauling", "--city", "Phoenix"], tempDir);

    const result = runCli(["run", "acme", "--researcher-only"], tempDir);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain("TAVILY_API_KEY is not set");
  });

  it("rejects unknown clients", () => {
    const tempDir = makeTempDir();
    runCli(["init"], tempDir);

    const result = runCli(["run", "nobody"], tempDir);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain("Client 'nobody' not found.");
  });

  it("approves and rejects drafts", () => {
    const tempDir = makeTempDir();
    runCli(["init"], tempDir);
    runCli(["add-client", "--id", "acme", "--name", "Acme Hauling", "--city", "Phoenix"], tempDir);

    // Seed a draft directly; drafting itself is covered by the pipeline tests
    const store = new SqliteStore(getDatabase({ path: path.join(tempDir, "agency.sqlite"), fileMustExist: true }));
    const [draft] = store.createDrafts([{
      clientId: "acme",
      researchRecordId: null,
      platform: "facebook",
      topic: "junk removal",
      title: "Junk Removal for Phoenix neighbors",
      body: "Phoenix neighbors: need junk removal? Our local crew makes it easy.",
      differentiationNotes: [],
      score: 10,
      status: "pending"
    }]);
    closeDatabase();
    expect(draft).toBeDefined();
    const draftId = draft?.id ?? "";

    const approveResult = runCli(["approve", "--id", draftId, "--feedback", "Looks good"], tempDir);
    expect(approveResult.status).toBe(0);
    const approved = JSON.parse(approveResult.stdout) as { status: string; feedback: string };
    expect(approved.status).toBe("approved");
    expect(approved.feedback).toBe("Looks good");

    const rejectWithoutFeedback = runCli(["reject", "--id", draftId], tempDir);
    expect(rejectWithoutFeedback.status).toBe(1);
    expect(rejectWithoutFeedback.stderr).toContain("Missing required --feedback");

    const listResult = runCli(["drafts", "acme"], tempDir);
    const drafts = JSON.parse(listResult.stdout) as { id: string; status: string }[];
    expect(drafts).toEqual([expect.objectContaining({ id: draftId, status: "approved" })]);
  });

  it("reports unknown draft ids", () => {
    const tempDir = makeTempDir();
    runCli(["init"], tempDir);

    const result = runCli(["approve", "--id", "missing-draft"], tempDir);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain("Draft 'missing-draft' not found.");
  });
});

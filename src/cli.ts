#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { closeDatabase, getDatabase, initializeDatabase } from "./db/index.js";
import { SqliteStore } from "./db/store.js";
import { createOrchestrator } from "./orchestrator/index.js";
import { validateCity, validateClientId } from "./orchestrator/validation.js";
import { listVerticals, normalizeCategory } from "./agents/researcher/verticals.js";
import { hasFlag, parseArgs, parseLimit, parseStage, requireFlag, requirePositional } from "./commands.js";
import { createNotFoundError, createValidationError, getUserFriendlyError } from "./shared/errors.js";
import { createLogger, setLogLevel } from "./shared/logger.js";
import type { ResearchRecord } from "./shared/types.js";

const usage = `Usage:
  npm run cli -- init
  npm run cli -- add-client --id <id> --name <name> --city <city> [--category junk_removal] [--website <url>]
  npm run cli -- run <clientId> [--city <city>] [--researcher-only | --strategist-only]
  npm run cli -- clients
  npm run cli -- research <clientId> [--limit 5]
  npm run cli -- drafts <clientId>
  npm run cli -- approve --id <draftId> [--feedback "Optional feedback"]
  npm run cli -- reject --id <draftId> --feedback "Reason"

Add --verbose to any command for debug logs.
`;

const args = process.argv.slice(2);
const log = createLogger("CLI");

const print = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

// Raw text can run to thousands of characters; the stored record keeps it in full
const summarizeResearch = (record: ResearchRecord) => {
  const { rawText, ...rest } = record;
  return { ...rest, rawTextChars: rawText.length };
};

const run = async (): Promise<void> => {
  if (args.length === 0) {
    console.log(usage);
    return;
  }

  const config = loadConfig();
  const parsed = parseArgs(args);
  const { command, positionals, flags } = parsed;
  setLogLevel(hasFlag(flags, "--verbose") ? "debug" : config.logging.level);

  if (command === "init") {
    await initializeDatabase({ path: config.database.path });
    print({ initialized: config.database.path });
    return;
  }

  if (!["add-client", "clients", "run", "research", "drafts", "approve", "reject"].includes(command)) {
    console.log(usage);
    return;
  }

  // Everything but "init" expects an existing store
  const db = getDatabase({
    path: config.database.path,
    fileMustExist: config.database.path !== ":memory:"
  });
  const store = new SqliteStore(db);

  switch (command) {
    case "add-client": {
      const id = validateClientId(requireFlag(flags, "--id"));
      if (store.getClient(id)) {
        throw createValidationError(`Client '${id}' already exists`);
      }
      const category = normalizeCategory(flags["--category"]);
      if (!listVerticals().includes(category)) {
        log.warn(`Unknown category "${category}"; research will use the default vertical`);
      }
      const client = store.createClient({
        id,
        businessName: requireFlag(flags, "--name"),
        city: validateCity(requireFlag(flags, "--city")),
        category,
        websiteUrl: flags["--website"]
      });
      print(client);
      return;
    }
    case "clients": {
      print(store.listClients());
      return;
    }
    case "run": {
      const clientId = requirePositional(positionals, 0, "clientId");
      const stage = parseStage(flags);
      const city = hasFlag(flags, "--city") ? requireFlag(flags, "--city") : undefined;
      const orchestrator = createOrchestrator(db, config);

      if (stage === "researcher") {
        print(summarizeResearch(await orchestrator.runResearcher(clientId, city)));
      } else if (stage === "strategist") {
        if (city) {
          throw createValidationError("--city only applies when the Researcher runs");
        }
        print(await orchestrator.runStrategist(clientId));
      } else {
        const result = await orchestrator.run(clientId, city);
        print({ research: summarizeResearch(result.research), strategy: result.strategy });
      }
      return;
    }
    case "research": {
      const clientId = validateClientId(requirePositional(positionals, 0, "clientId"));
      const client = store.getClient(clientId);
      if (!client) {
        throw createNotFoundError("Client", clientId);
      }
      const limit = hasFlag(flags, "--limit") ? parseLimit(requireFlag(flags, "--limit")) : undefined;
      print(store.listResearchRecords(client.id, limit).map(summarizeResearch));
      return;
    }
    case "drafts": {
      const clientId = validateClientId(requirePositional(positionals, 0, "clientId"));
      const client = store.getClient(clientId);
      if (!client) {
        throw createNotFoundError("Client", clientId);
      }
      print(store.listDrafts(client.id));
      return;
    }
    case "approve": {
      const id = requireFlag(flags, "--id");
      const feedback = flags["--feedback"];
      print(store.updateDraftStatus(id, "approved", feedback));
      return;
    }
    case "reject": {
      const id = requireFlag(flags, "--id");
      const feedback = requireFlag(flags, "--feedback");
      print(store.updateDraftStatus(id, "rejected", feedback));
      return;
    }
  }
};

run()
  .catch((error: unknown) => {
    console.error(getUserFriendlyError(error));
    process.exitCode = 1;
  })
  .finally(() => {
    closeDatabase();
  });

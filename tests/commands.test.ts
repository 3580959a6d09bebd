import { describe, expect, it } from "vitest";
import { hasFlag, parseArgs, parseLimit, parseStage, requireFlag, requirePositional } from "../src/commands.js";

describe("parseArgs", () => {
  it("parses flags with values", () => {
    const parsed = parseArgs(["add-client", "--id", "acme", "--name", "Acme Hauling"]);

    expect(parsed.command).toBe("add-client");
    expect(parsed.flags["--id"]).toBe("acme");
    expect(parsed.flags["--name"]).toBe("Acme Hauling");
    expect(parsed.positionals).toEqual([]);
  });

  it("handles missing flag values", () => {
    const parsed = parseArgs(["add-client", "--id", "acme", "--city"]);

    expect(parsed.flags["--city"]).toBeUndefined();
    expect(hasFlag(parsed.flags, "--city")).toBe(true);
  });

  it("keeps positionals after boolean flags", () => {
    const parsed = parseArgs(["run", "--researcher-only", "acme", "--city", "Phoenix"]);

    expect(parsed.positionals).toEqual(["acme"]);
    expect(parsed.flags["--researcher-only"]).toBe("true");
    expect(parsed.flags["--city"]).toBe("Phoenix");
  });
});

describe("requireFlag", () => {
  it("returns the trimmed value", () => {
    expect(requireFlag({ "--id": "  acme " }, "--id")).toBe("acme");
  });

  it("throws on a missing or blank value", () => {
    expect(() => requireFlag({}, "--id")).toThrow("Missing required --id");
    expect(() => requireFlag({ "--id": "   " }, "--id")).toThrow("Missing required --id");
  });
});

describe("requirePositional", () => {
  it("names the missing argument", () => {
    expect(requirePositional(["acme"], 0, "clientId")).toBe("acme");
    expect(() => requirePositional([], 0, "clientId")).toThrow("Missing required <clientId>");
  });
});

describe("parseStage", () => {
  it("defaults to the full pipeline", () => {
    expect(parseStage({})).toBe("pipeline");
  });

  it("selects a single stage", () => {
    expect(parseStage({ "--researcher-only": "true" })).toBe("researcher");
    expect(parseStage({ "--strategist-only": "true" })).toBe("strategist");
  });

  it("rejects both stage flags at once", () => {
    expect(() => parseStage({ "--researcher-only": "true", "--strategist-only": "true" }))
      .toThrow("Choose one of --researcher-only or --strategist-only");
  });
});

describe("parseLimit", () => {
  it("accepts positive integers only", () => {
    expect(parseLimit("3")).toBe(3);
    expect(() => parseLimit("0")).toThrow("Invalid limit: 0");
    expect(() => parseLimit("two")).toThrow("Invalid limit: two");
  });
});

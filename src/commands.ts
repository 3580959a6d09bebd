import { createValidationError } from "./shared/errors.js";
import type { StageName } from "./shared/types.js";

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, string | undefined>;
}

// Flags that never take a value, so "run --researcher-only acme" keeps "acme" positional
export const BOOLEAN_FLAGS = ["--researcher-only", "--strategist-only", "--verbose"];

export const parseArgs = (args: string[]): ParsedArgs => {
  const [command, ...rest] = args;
  const flags: Record<string, string | undefined> = {};
  const positionals: string[] = [];

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index];
    if (token === undefined) {
      continue;
    }
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }
    if (BOOLEAN_FLAGS.includes(token)) {
      flags[token] = "true";
      continue;
    }
    const value = rest[index + 1];
    if (!value || value.startsWith("--")) {
      flags[token] = undefined;
      continue;
    }
    flags[token] = value;
    index += 1;
  }

  return {
    command: command ?? "",
    positionals,
    flags
  };
};

export const hasFlag = (flags: Record<string, string | undefined>, flag: string): boolean =>
  Object.prototype.hasOwnProperty.call(flags, flag);

export const requireFlag = (flags: Record<string, string | undefined>, flag: string): string => {
  const value = flags[flag]?.trim();
  if (!value) {
    throw createValidationError(`Missing required ${flag}`);
  }
  return value;
};

export const requirePositional = (positionals: string[], index: number, name: string): string => {
  const value = positionals[index]?.trim();
  if (!value) {
    throw createValidationError(`Missing required <${name}>`);
  }
  return value;
};

// Which stages "run" executes
export const parseStage = (flags: Record<string, string | undefined>): StageName => {
  const researcherOnly = hasFlag(flags, "--researcher-only");
  const strategistOnly = hasFlag(flags, "--strategist-only");
  if (researcherOnly && strategistOnly) {
    throw createValidationError("Choose one of --researcher-only or --strategist-only");
  }
  if (researcherOnly) return "researcher";
  if (strategistOnly) return "strategist";
  return "pipeline";
};

export const parseLimit = (value: string): number => {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw createValidationError(`Invalid limit: ${value}`);
  }
  return limit;
};

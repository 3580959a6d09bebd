// Application configuration

import path from 'node:path';
import type { LLMConfig, LLMProvider } from './shared/llm.js';
import type { LogLevel } from './shared/logger.js';
import { createConfigError } from './shared/errors.js';

export interface Config {
  search: {
    tavilyApiKey?: string;
    maxResults: number;
    reviewsMaxResults: number;
    searchDepth: 'basic' | 'advanced';
  };

  scrape: {
    firecrawlApiKey?: string;
  };

  http: {
    timeoutMs: number;
  };

  extraction: {
    local: {
      enabled: boolean;
      baseUrl: string;
      model: string;
      probeTimeoutMs: number;
    };
    remote: LLMConfig;
    timeoutMs: number;
    maxInputChars: number;
  };

  pipeline: {
    rawTextLimit: number;
    lockTtlMinutes: number;
  };

  database: {
    path: string;
  };

  logging: {
    level: LogLevel;
  };
}

// Search depth stays "basic"; the provider caps a local search at five competitors
export const MAX_SEARCH_RESULTS = 5;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const provider = parseProvider(env.LLM_PROVIDER);

  return {
    search: {
      tavilyApiKey: optionalEnv(env, 'TAVILY_API_KEY'),
      maxResults: Math.min(parseIntEnv(env, 'SEARCH_RESULTS_LIMIT', MAX_SEARCH_RESULTS), MAX_SEARCH_RESULTS),
      reviewsMaxResults: 2,
      searchDepth: 'basic'
    },

    scrape: {
      firecrawlApiKey: optionalEnv(env, 'FIRECRAWL_API_KEY')
    },

    http: {
      timeoutMs: parseIntEnv(env, 'HTTP_TIMEOUT_MS', 30000)
    },

    extraction: {
      local: {
        enabled: parseBoolEnv(env, 'OLLAMA_ENABLED', true),
        baseUrl: (env.OLLAMA_URL || 'http://localhost:11434').replace(/\/+$/, ''),
        model: env.OLLAMA_MODEL || 'llama3.1:8b',
        probeTimeoutMs: parseIntEnv(env, 'OLLAMA_PROBE_TIMEOUT_MS', 2000)
      },
      remote: {
        provider,
        model: env.LLM_MODEL || (provider === 'anthropic' ? 'claude-3-5-sonnet-latest' : 'gpt-4o'),
        apiKey: optionalEnv(env, provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY'),
        maxTokens: 2000,
        temperature: 0
      },
      timeoutMs: parseIntEnv(env, 'EXTRACTION_TIMEOUT_MS', 45000),
      maxInputChars: parseIntEnv(env, 'EXTRACTION_MAX_INPUT_CHARS', 6000)
    },

    pipeline: {
      rawTextLimit: parseIntEnv(env, 'RAW_TEXT_LIMIT', 10000),
      lockTtlMinutes: parseIntEnv(env, 'LOCK_TTL_MINUTES', 15)
    },

    database: {
      path: resolveDatabasePath(env.DATABASE_URL, env.DATABASE_PATH)
    },

    logging: {
      level: parseLogLevel(env.LOG_LEVEL)
    }
  };
};

// Accepts a bare path or a file:/sqlite: URL; anything else is not an embedded store
export const resolveDatabasePath = (url?: string, fallbackPath?: string): string => {
  const defaultPath = fallbackPath || path.join('data', 'db', 'agency.sqlite');
  const value = url?.trim();
  if (!value) return path.resolve(defaultPath);

  if (value === ':memory:') return value;

  const match = value.match(/^(file|sqlite):(.*)$/i);
  if (match) {
    // sqlite:///abs/path and file:///abs/path keep the leading slash; sqlite:///./rel is relative
    const rest = match[2].replace(/^\/\/(?=\/)/, '');
    const target = rest.startsWith('/./') ? rest.slice(1) : rest;
    if (!target) {
      throw createConfigError(`DATABASE_URL has no path: ${value}`);
    }
    return target === ':memory:' ? target : path.resolve(target);
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
    throw createConfigError(`DATABASE_URL must point at an embedded SQLite file, got ${value.split(':')[0]}://`);
  }

  return path.resolve(value);
};

const optionalEnv = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

const parseIntEnv = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw createConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const parseBoolEnv = (env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean => {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw createConfigError(`${name} must be true or false, got "${raw}"`);
};

const parseProvider = (value?: string): LLMProvider => {
  const raw = value?.trim().toLowerCase();
  if (!raw) return 'anthropic';
  if (raw === 'anthropic' || raw === 'openai') return raw;
  throw createConfigError(`LLM_PROVIDER must be "anthropic" or "openai", got "${value}"`);
};

const parseLogLevel = (level?: string): LogLevel => {
  if (!level) return 'info';

  const levels: Record<string, LogLevel> = {
    'error': 'error',
    'warn': 'warn',
    'info': 'info',
    'debug': 'debug'
  };

  const parsed = levels[level.toLowerCase()];
  if (!parsed) {
    throw createConfigError(`LOG_LEVEL must be one of error, warn, info, debug, got "${level}"`);
  }
  return parsed;
};

export default loadConfig;

// Library entry point for the agency pipeline

export { loadConfig, resolveDatabasePath, type Config } from './config.js';
export { initializeDatabase, getDatabase, closeDatabase, runMigrations } from './db/index.js';
export { SqliteStore, type PipelineStore } from './db/store.js';
export { PipelineOrchestrator, createOrchestrator, type OrchestratorOptions, type PipelineResult } from './orchestrator/index.js';
export { ResearcherAgent } from './agents/researcher/index.js';
export { ResearchExtractor, createDefaultExtractor } from './agents/researcher/extractor.js';
export { LocalModelBackend, RemoteModelBackend, type ExtractionBackend, type BackendOutcome } from './agents/researcher/backends.js';
export { WebResearchSource, createWebResearchSource, type ResearchSource } from './agents/researcher/sources.js';
export { StrategistAgent, type StrategistResult } from './agents/strategist/index.js';
export { scoreResearch, BASELINE_SCORE, type OpportunityScore } from './agents/strategist/scorer.js';
export { draftContent, isBadDraft } from './agents/strategist/drafter.js';
export { PipelineError, ErrorCategory } from './shared/errors.js';
export type * from './shared/types.js';

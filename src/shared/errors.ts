// Error types and handling for the agency pipeline

export enum ErrorCategory {
  PROVIDER_FAILURE = 'provider_failure',
  PERSISTENCE = 'persistence',
  VALIDATION = 'validation',
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',
  CONFIG = 'config'
}

export interface PipelineErrorInfo {
  category: ErrorCategory;
  message: string;
  userMessage: string;
  details?: Record<string, unknown>;
}

export class PipelineError extends Error implements PipelineErrorInfo {
  category: ErrorCategory;
  userMessage: string;
  details?: Record<string, unknown>;

  constructor(error: PipelineErrorInfo, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = 'PipelineError';
    this.category = error.category;
    this.userMessage = error.userMessage;
    this.details = error.details;
  }
}

// Error factory functions
export const createProviderError = (service: string, statusCode?: number, details?: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.PROVIDER_FAILURE,
    message: `${service} API error${statusCode ? ` (${statusCode})` : ''}: ${details || 'Unknown error'}`,
    userMessage: `Couldn't reach ${service}.`,
    details: { service, statusCode, details }
  });
};

export const createPersistenceError = (operation: string, cause: unknown): PipelineError => {
  const reason = cause instanceof Error ? cause.message : String(cause);
  const missingSchema = reason.includes('no such table');
  return new PipelineError({
    category: ErrorCategory.PERSISTENCE,
    message: `Store error during ${operation}: ${reason}`,
    userMessage: missingSchema
      ? `The store has no schema yet. Run "init" first. (${operation} failed)`
      : `Could not ${operation}: ${reason}`,
    details: { operation }
  }, { cause });
};

export const createNotFoundError = (entityType: string, query: string, hint?: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.NOT_FOUND,
    message: `${entityType} not found: ${query}`,
    userMessage: hint ? `${entityType} '${query}' not found. ${hint}` : `${entityType} '${query}' not found.`,
    details: { entityType, query }
  });
};

export const createValidationError = (message: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.VALIDATION,
    message: `Validation error: ${message}`,
    userMessage: message
  });
};

export const createConfigError = (message: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.CONFIG,
    message: `Configuration error: ${message}`,
    userMessage: `${message}. Set it in .env (see .env.example).`
  });
};

export const createConflictError = (clientId: string, stage: string, expiresAt: string): PipelineError => {
  return new PipelineError({
    category: ErrorCategory.CONFLICT,
    message: `Run already in progress for ${clientId} (${stage})`,
    userMessage: `Another ${stage} run is already in progress for '${clientId}'. Try again after it finishes (lock expires ${expiresAt}).`,
    details: { clientId, stage, expiresAt }
  });
};

// Error handler for user-facing messages
export const getUserFriendlyError = (error: unknown): string => {
  if (error instanceof PipelineError) {
    return error.userMessage;
  }

  if (error instanceof Error) {
    if (error.message.includes('SQLITE_CANTOPEN') || error.message.includes('unable to open database')) {
      return "Couldn't open the database file. Check DATABASE_PATH / DATABASE_URL.";
    }
    if (error.message.includes('no such table')) {
      return 'The store has no schema yet. Run "init" first.';
    }
    return error.message;
  }

  return 'Something went wrong. Please try again.';
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

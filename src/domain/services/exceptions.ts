export class ProcessingError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "ProcessingError";
  }
}

export class StageExecutionError extends ProcessingError {
  stageName: string;
  originalError: Error;
  context: Record<string, unknown>;

  constructor(stageName: string, originalError: Error, context: Record<string, unknown> = {}) {
    const message = `Stage '${stageName}' failed: ${originalError.message}`;
    super(message);
    this.name = "StageExecutionError";
    this.stageName = stageName;
    this.originalError = originalError;
    this.context = context;
  }
}

export class ProviderError extends ProcessingError {
  provider: string;
  model: string;
  cause?: unknown;

  constructor(provider: string, model: string, message: string, cause?: unknown) {
    super(`${provider}/${model}: ${message}`);
    this.name = "ProviderError";
    this.provider = provider;
    this.model = model;
    this.cause = cause;
  }
}

export class ProviderTimeoutError extends ProviderError {
  timeoutMs: number;

  constructor(provider: string, model: string, timeoutMs: number) {
    super(provider, model, `request timed out after ${timeoutMs}ms`);
    this.name = "ProviderTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class MalformedResponseError extends ProcessingError {
  responseExcerpt: string;

  constructor(message: string, responseText: string) {
    const responseExcerpt = responseText.slice(0, 500);
    super(`${message}. Response: ${responseExcerpt}`);
    this.name = "MalformedResponseError";
    this.responseExcerpt = responseExcerpt;
  }
}

export class ResponseSchemaError extends ProcessingError {
  stageName: string;
  issues: string[];

  constructor(stageName: string, issues: string[]) {
    super(`Response for '${stageName}' does not match the expected shape: ${issues.join('; ')}`);
    this.name = "ResponseSchemaError";
    this.stageName = stageName;
    this.issues = issues;
  }
}

export class ScoreCoercionError extends ProcessingError {
  field: string;
  value: unknown;

  constructor(field: string, value: unknown) {
    super(`Field '${field}' is not numeric: ${JSON.stringify(value)}`);
    this.name = "ScoreCoercionError";
    this.field = field;
    this.value = value;
  }
}

export class RetryExhaustedError extends ProcessingError {
  attempts: number;
  lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(`Failed after ${attempts} attempts: ${lastError.message}`);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class MissingDependencyError extends ProcessingError {
  stageName: string;
  dependency: string;

  constructor(stageName: string, dependency: string) {
    super(`Stage '${stageName}' is missing its ${dependency}`);
    this.name = "MissingDependencyError";
    this.stageName = stageName;
    this.dependency = dependency;
  }
}

export class UnknownStageError extends ProcessingError {
  stageName: string;

  constructor(stageName: string, detail = 'has no model mapping') {
    super(`Unknown stage '${stageName}': ${detail}`);
    this.name = "UnknownStageError";
    this.stageName = stageName;
  }
}

export class UnknownProviderError extends ProcessingError {
  provider: string;

  constructor(provider: string) {
    super(`Unknown provider: ${provider}`);
    this.name = "UnknownProviderError";
    this.provider = provider;
  }
}

export class PipelineCancelledError extends ProcessingError {
  constructor(message = 'Pipeline run was cancelled') {
    super(message);
    this.name = "PipelineCancelledError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

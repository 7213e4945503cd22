import { z } from 'zod';

export type BackendKind = 'gemini' | 'ollama';

export class ValidatorError extends Error {
  get retryable(): boolean {
    return false;
  }
}

export function formatValidationErrors(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `- ${path || '(root)'}: ${issue.message}`;
  });
  return issues.join('\n');
}

export class ConfigurationError extends ValidatorError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.join('\n')}` : message);
    this.name = 'ConfigurationError';
  }
}

export class SchemaGenerationError extends ValidatorError {
  constructor(
    public readonly contractId: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Cannot generate schema for contract ${contractId}: ${reason}`);
    this.name = 'SchemaGenerationError';
    this.cause = cause;
  }
}

export class TemplateNotFoundError extends ValidatorError {
  constructor(public readonly templateName: string) {
    super(`Prompt template '${templateName}' not found`);
    this.name = 'TemplateNotFoundError';
  }
}

export class TransportError extends ValidatorError {
  get retryable(): boolean {
    return true;
  }

  constructor(
    public readonly backend: BackendKind,
    public readonly originalError: Error
  ) {
    super(`Request to ${backend} backend failed: ${originalError.message}`);
    this.name = 'TransportError';
    this.cause = originalError;
  }
}

export class BackendError extends ValidatorError {
  constructor(
    public readonly backend: BackendKind,
    public readonly backendMessage: string,
    public readonly status?: number
  ) {
    super(
      status === undefined
        ? `${backend} backend error: ${backendMessage}`
        : `${backend} backend returned ${status}: ${backendMessage}`
    );
    this.name = 'BackendError';
  }

  get retryable(): boolean {
    if (this.status === undefined) return false;
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

export class TimeoutError extends ValidatorError {
  get retryable(): boolean {
    return true;
  }

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends ValidatorError {
  constructor(public readonly operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'CancelledError';
  }
}

const RESPONSE_PREVIEW_LENGTH = 200;

function previewText(text: string, length = RESPONSE_PREVIEW_LENGTH): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

export class DeserializationError extends ValidatorError {
  constructor(
    public readonly contractId: string,
    public readonly responseText: string,
    public readonly detail: string,
    cause?: unknown
  ) {
    super(`Response could not be read as ${contractId}: ${detail}\nResponse text: ${previewText(responseText)}`);
    this.name = 'DeserializationError';
    this.cause = cause;
  }
}

export class PipelineStepError extends ValidatorError {
  constructor(
    public readonly stepName: string,
    public readonly originalError: Error
  ) {
    super(`Step ${stepName} failed: ${originalError.message}`);
    this.name = 'PipelineStepError';
    this.cause = originalError;
  }

  get retryable(): boolean {
    return this.originalError instanceof ValidatorError && this.originalError.retryable;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

import type { ZodIssue } from 'zod';

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Malformed caller input, detected before any request is sent.
 */
export class InvalidArgumentError extends Error {
  readonly issues: ZodIssue[];

  constructor(context: string, issues: ZodIssue[]) {
    super(`${context}: ${formatIssues(issues)}`);
    this.name = 'InvalidArgumentError';
    this.issues = issues;
  }
}

/**
 * Base class for everything that can go wrong once a completion is requested.
 */
export class CompletionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CompletionError';
  }
}

export class AuthenticationError extends CompletionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export class TransportError extends CompletionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class MalformedResponseError extends CompletionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

/**
 * The remote service answered with an error status other than an auth failure
 * (bad request, rate limit, 5xx).
 */
export class ServiceError extends CompletionError {
  readonly status: number | undefined;

  constructor(message: string, status: number | undefined, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServiceError';
    this.status = status;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

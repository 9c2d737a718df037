import type { ZodError } from 'zod';
import { ErrorCode, type RpcError } from '../types/mcp.js';

/**
 * Protocol-level failure that maps onto its own JSON-RPC code
 * (unknown method, unparseable payload, malformed envelope).
 */
export class MCPError extends Error {
  public code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'MCPError';
    this.code = code;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  public errors: Record<string, string[]>;

  constructor(message: string, errors: Record<string, string[]> = {}) {
    super(message);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/** A tool was asked for something its domain rules out, such as dividing by zero. */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DomainError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'string' && error.length > 0) {
    return error;
  }

  return 'An unknown error occurred';
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Everything except an MCPError collapses to -32603 with the failure text,
 * which is how tool-not-found, bad arguments and handler failures reach the client.
 */
export function toRpcError(error: unknown): RpcError {
  if (error instanceof MCPError) {
    return { code: error.code, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: getErrorMessage(error) };
}

export function fromZodError(context: string, error: ZodError): ValidationError {
  const errors: Record<string, string[]> = {};

  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    const messages = errors[field] || [];
    messages.push(issue.message);
    errors[field] = messages;
  }

  const summary = Object.entries(errors)
    .map(([field, messages]) => `${field}: ${messages.join(', ')}`)
    .join('; ');

  return new ValidationError(`${context}: ${summary}`, errors);
}

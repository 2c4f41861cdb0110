/**
 * Error helpers
 */

import type { ZodIssue } from 'zod';

/**
 * Raised when a target config file is missing, unreadable or malformed.
 * Aborts the run for that target only.
 */
export class ConfigError extends Error {
  readonly path: string | undefined;
  readonly issues: ZodIssue[];

  constructor(message: string, path?: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.path = path;
    this.issues = issues;
  }
}

/**
 * Turn whatever was caught into a loggable string
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

import type { ZodError } from 'zod';

/**
 * Extracts a readable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Joins zod issues into one line: "sample1.keys.2: Expected number, received string"
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

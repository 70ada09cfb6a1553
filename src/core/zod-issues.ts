/**
 * Shared helpers for reporting zod validation failures.
 */

import type { z } from 'zod';

/** Format zod issues as `path: message` lines. */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

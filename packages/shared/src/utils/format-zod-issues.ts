import type { ZodError } from 'zod';

/**
 * Join the issues of a failed parse as `path: message`, separated by `; `.
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

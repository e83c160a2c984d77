import type { ZodError } from 'zod';

/** One line per issue, `path: message`, joined with "; ". */
export function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

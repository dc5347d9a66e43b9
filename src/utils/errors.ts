/**
 * Error types shared by the engine, the store and the tool layer.
 */

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Caller input that cannot be used (weights, tool input, import files).
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends Error {
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string) {
    super(`${resource} ${id} not found`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

/** Flatten zod-style issues into `path: message` pairs. */
export function toValidationIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
): ValidationIssue[] {
  return issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

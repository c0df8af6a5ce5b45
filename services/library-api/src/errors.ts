import type { FieldIssue } from '@library/shared';

/**
 * Base class for the errors the core raises.
 * `status` is the HTTP status the errorHandler middleware answers with.
 */
export class LibraryError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/**
 * A supplied value violates a field constraint.
 */
export class ValidationError extends LibraryError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super(ValidationError.describe(issues), 422, 'VALIDATION_ERROR');
    this.issues = issues;
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }

  private static describe(issues: FieldIssue[]): string {
    if (issues.length === 0) {
      return 'Validation failed';
    }
    return issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
  }
}

/**
 * No live record has the requested id.
 */
export class NotFoundError extends LibraryError {
  readonly resource: string;
  readonly id: number;

  constructor(resource: string, id: number) {
    super(`${resource} is not found with id ${id}`, 404, 'NOT_FOUND');
    this.resource = resource;
    this.id = id;
  }
}

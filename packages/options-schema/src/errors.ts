import type { z } from 'zod';

export interface SchemaIssue {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

export class SchemaValidationError extends Error {
  constructor(
    message: string,
    readonly issues: readonly SchemaIssue[],
  ) {
    super(message);
    this.name = 'SchemaValidationError';
  }
}

export class OptionsSchemaError extends SchemaValidationError {
  constructor(issues: readonly SchemaIssue[]) {
    super(formatMessage('Invalid Jigsaw options', issues), issues);
    this.name = 'OptionsSchemaError';
  }
}

export class SlotDataSchemaError extends SchemaValidationError {
  constructor(issues: readonly SchemaIssue[]) {
    super(formatMessage('Invalid Jigsaw slot data', issues), issues);
    this.name = 'SlotDataSchemaError';
  }
}

export function toSchemaIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path,
    message: issue.message,
  }));
}

function formatMessage(prefix: string, issues: readonly SchemaIssue[]): string {
  if (issues.length === 0) {
    return `${prefix}.`;
  }
  const details = issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
  return `${prefix}: ${details}`;
}

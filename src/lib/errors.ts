import type { ZodError } from 'zod';

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export class BuildConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid build config: ${issues.join('; ')}`);
    this.name = 'BuildConfigError';
    this.issues = issues;
  }
}

export class ClassDataError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid class data: ${issues.join('; ')}`);
    this.name = 'ClassDataError';
    this.issues = issues;
  }
}

export class CatalogPayloadError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid catalog payload: ${issues.join('; ')}`);
    this.name = 'CatalogPayloadError';
    this.issues = issues;
  }
}

export type ValidationIssue = {
  field: string;
  message: string;
};

export class SessionValidationError extends Error {
  code = "invalid-request";
  issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "SessionValidationError";
    this.issues = issues;
  }
}

export class SessionParseError extends Error {
  code = "invalid-record";
  field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "SessionParseError";
    this.field = field;
  }
}

export class ConfigError extends Error {
  code = "invalid-config";
  issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const describeError = (error: unknown) => {
  return error instanceof Error ? error.message : String(error);
};

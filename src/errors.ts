import { FieldIssue } from './types';

export class PayrollError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class InvalidInputError extends PayrollError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super(`Invalid staff details: ${issues.map((i) => `${i.field} ${i.message}`).join(', ')}`, 400);
    this.issues = issues;
  }
}

export class StoreUnavailableError extends PayrollError {
  constructor(action: string, cause: unknown) {
    super(`Staff store unavailable while trying to ${action}`, 503, { cause });
  }
}

export class EmptyExportError extends PayrollError {
  constructor() {
    super('Nothing to export: no staff on record', 400);
  }
}

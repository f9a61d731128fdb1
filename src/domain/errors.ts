/**
 * Error taxonomy shared by the catalog, the specialists and the outer layers
 */

export type ErrorCode = 'NOT_FOUND' | 'INVALID_INPUT' | 'AMBIGUOUS_RULE' | 'LOAD_ERROR';

export abstract class AdvisorError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AdvisorError {
  readonly code = 'NOT_FOUND';
}

export class InvalidInputError extends AdvisorError {
  readonly code = 'INVALID_INPUT';
}

/** More than one dosage rule matched the same input: a data authoring defect */
export class AmbiguousRuleError extends AdvisorError {
  readonly code = 'AMBIGUOUS_RULE';

  constructor(
    message: string,
    readonly matched_rules: number
  ) {
    super(message);
  }
}

export class LoadError extends AdvisorError {
  readonly code = 'LOAD_ERROR';

  constructor(
    message: string,
    readonly problems: string[] = []
  ) {
    super(problems.length > 0 ? `${message}:\n  - ${problems.join('\n  - ')}` : message);
  }
}

export function isAdvisorError(error: unknown): error is AdvisorError {
  return error instanceof AdvisorError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type CostReportErrorCode =
  | 'MISSING_REQUIRED_INPUT'
  | 'MALFORMED_INPUT'
  | 'INVALID_ARGUMENT'
  | 'COST_EXPLORER_REQUEST'
  | 'EC2_REQUEST';

export class CostReportError extends Error {
  readonly code: CostReportErrorCode;

  constructor(code: CostReportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingRequiredInputError extends CostReportError {
  readonly path: string;

  constructor(path: string) {
    super('MISSING_REQUIRED_INPUT', `Missing required input file: ${path}`);
    this.path = path;
  }
}

/** Raised when a cost series does not have the Cost Explorer shape. */
export class MalformedInputError extends CostReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_INPUT', message, options);
  }
}

export class InvalidArgumentError extends CostReportError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class CostExplorerRequestError extends CostReportError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('COST_EXPLORER_REQUEST', `Cost Explorer request failed: ${detail}`, { cause });
  }
}

export class Ec2RequestError extends CostReportError {
  readonly region: string;

  constructor(region: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('EC2_REQUEST', `EC2 request failed in ${region}: ${detail}`, { cause });
    this.region = region;
  }
}

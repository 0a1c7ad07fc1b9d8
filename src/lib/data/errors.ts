type ValidationDetails = {
  row?: number;
  field?: string;
  columns?: string[];
};

export class ValidationError extends Error {
  readonly row?: number;
  readonly field?: string;
  readonly columns?: string[];

  constructor(message: string, details: ValidationDetails = {}) {
    super(message);
    this.name = 'ValidationError';
    this.row = details.row;
    this.field = details.field;
    this.columns = details.columns;
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Codes for faults that abort a whole batch.
 */
export type BatchFaultCode =
  | 'EMPTY_BATCH'
  | 'EMPTY_INPUT'
  | 'EXTRACTION_FAILED'
  | 'TABLE_INVALID';

/**
 * Base class for batch-level faults. Per-record faults never surface as
 * one of these; the assembler records them on the outcome instead.
 */
export class PayoutError extends Error {
  constructor(
    message: string,
    public readonly code: BatchFaultCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'PayoutError';
  }
}

export class EmptyBatchError extends PayoutError {
  constructor() {
    super('records array cannot be empty', 'EMPTY_BATCH');
    this.name = 'EmptyBatchError';
  }
}

export class EmptyInputError extends PayoutError {
  constructor(filename: string) {
    super(`Empty file: ${filename}`, 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

export class ExtractionError extends PayoutError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EXTRACTION_FAILED', cause);
    this.name = 'ExtractionError';
  }
}

export class DecisionTableError extends PayoutError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TABLE_INVALID', cause);
    this.name = 'DecisionTableError';
  }
}

/**
 * Raised for a raw record that is not an object. Caught per record.
 */
export class RecordShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordShapeError';
  }
}

export function isBatchFault(error: unknown): error is PayoutError {
  return error instanceof PayoutError;
}

/**
 * HTTP status an outer layer should answer with for a batch fault.
 */
export function httpStatusFor(error: PayoutError): number {
  return error.code === 'TABLE_INVALID' ? 500 : 400;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

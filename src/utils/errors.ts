export type AnalysisErrorCode =
  | 'InvalidContext'
  | 'EmptyInput'
  | 'InvalidHolder'
  | 'DuplicateHolder'
  | 'InvalidReserves'
  | 'InvalidAmount'
  | 'InvalidFee'
  | 'InsufficientLiquidity'
  | 'UnknownPoolToken'
  | 'InvalidToken';

/**
 * Validation failure raised synchronously by the holder and swap engines.
 * Never retried; the caller gets no partial result.
 */
export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = 'AnalysisError';
    this.code = code;
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

export type GridErrorCode = 'INVALID_BOUNDS' | 'MISSING_GRID';

/** Raised for caller errors only; a sheet without tables is not an error */
export class InvalidGridError extends Error {
  constructor(
    public code: GridErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidGridError';
  }
}

/**
 * Raised when raw inputs cannot be turned into a metrics report.
 * Every ratio is zero-guarded, so in practice this means the caller passed
 * something that is not a finite number.
 */
export class ComputationError extends Error {
  constructor(
    message: string,
    public readonly fields: string[] = []
  ) {
    super(message);
    this.name = 'ComputationError';
  }
}

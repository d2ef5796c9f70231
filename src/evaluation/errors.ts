/** Structural malformation of an eval record: fatal to the caller, never skipped */
export class EvalSpecError extends Error {
  constructor(
    message: string,
    readonly line?: number,
    readonly taskId?: string,
  ) {
    super(line !== undefined ? `Line ${line}: ${message}` : message);
    this.name = 'EvalSpecError';
  }
}

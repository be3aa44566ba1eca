export type PipelineErrorCode = 'INVALID_RESOLVED_FILE' | 'OUTPUT_WRITE_FAILED' | 'SNAPSHOT_NOT_FOUND';

/**
 * Fatal pipeline failure. Anything thrown as a PipelineError ends the run
 * before an output file is written.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

// Single-line rendering for the CLI
export const describeError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return typeof error === 'string' && error.length > 0 ? error : 'Unknown error';
  }
  if (error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
};

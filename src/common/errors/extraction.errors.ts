/**
 * Raised before any model call when there is nothing to analyze:
 * an empty image or a blank question.
 */
export class EmptyInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyInputError';
  }
}

/**
 * The hosted model call failed (network, auth, quota) or returned no output.
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

export class ExportError extends Error {
  constructor(
    readonly format: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${format} export failed: ${message}`, options);
    this.name = 'ExportError';
  }
}

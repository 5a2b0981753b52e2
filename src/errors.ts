/** Raised when an upload cannot be read as a table at all. Cell-level problems never raise. */
export class FormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FormatError';
  }
}

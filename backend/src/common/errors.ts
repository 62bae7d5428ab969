/**
 * Raised when a source document cannot be turned into text: unsupported format,
 * corrupt file, or nothing extractable. Fatal to indexing that one document.
 */
export class ExtractionFailure extends Error {
  constructor(
    message: string,
    readonly fileName?: string,
  ) {
    super(message);
    this.name = 'ExtractionFailure';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  if (error && typeof error === 'object') {
    if ('parserError' in error) {
      return describeError(error.parserError);
    }
    if ('message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }

  return String(error);
};

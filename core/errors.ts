export class ScanError extends Error {
  public statusCode: number;
  public code: string;

  constructor(message: string, statusCode: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Markup could not be decoded into a tree at all. Malformed HTML is not a parse error. */
export class ParseError extends ScanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 422, 'PARSE_ERROR', options);
  }
}

export class FetchError extends ScanError {
  public url: string;
  public status?: number;

  constructor(message: string, url: string, options?: { status?: number; cause?: unknown }) {
    super(`Could not retrieve the page: ${message}`, 502, 'FETCH_ERROR', { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

export function isScanError(e: unknown): e is ScanError {
  return e instanceof ScanError;
}

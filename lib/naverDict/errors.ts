export class DictError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DictError";
  }
}

/** The transport could not deliver a response (connection, DNS, timeout, non-2xx). */
export class NetworkError extends DictError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Failed to fetch data: ${detail}`, options);
    this.name = "NetworkError";
  }
}

/** The response body is not JSON at all. */
export class ParseError extends DictError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Failed to parse JSON response: ${detail}`, options);
    this.name = "ParseError";
  }
}

/**
 * The body decoded as JSON but does not match the expected shape.
 * Callers match on the message: "missing 'items' field" vs "Invalid item structure".
 */
export class InvalidResponseError extends DictError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidResponseError";
  }
}

export function describeError(err: unknown) {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

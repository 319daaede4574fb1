/**
 * Base class for errors raised by the comparison service.
 */
export class SchemaCompareError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Any failure talking to HubSpot: auth, rate limiting, transport or an
 * unexpected payload. Aborts the comparison that needed the data.
 */
export class HubSpotFetchError extends SchemaCompareError {
  constructor(
    message: string,
    readonly statusCode?: number,
    readonly body?: unknown,
  ) {
    super(message);
  }

  get retryable(): boolean {
    return (
      this.statusCode === undefined ||
      this.statusCode === 429 ||
      this.statusCode >= 500
    );
  }
}

export class SessionNotFoundError extends SchemaCompareError {
  constructor(readonly sessionId: string) {
    super("Session not found or expired");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an error thrown by the HubSpot SDK (which carries the HTTP status in
 * `code` and the response in `body`) as a HubSpotFetchError.
 */
export function toFetchError(error: unknown, context: string): HubSpotFetchError {
  if (error instanceof HubSpotFetchError) {
    return error;
  }

  let statusCode: number | undefined;
  let body: unknown;
  if (typeof error === "object" && error !== null) {
    if ("code" in error && typeof error.code === "number") {
      statusCode = error.code;
    }
    if ("body" in error) {
      body = error.body;
    }
  }

  return new HubSpotFetchError(`${context}: ${errorMessage(error)}`, statusCode, body);
}

export class PropertyNotFoundError extends SchemaCompareError {
  constructor(readonly propertyNames: string[]) {
    super(`Property not found in either portal: ${propertyNames.join(", ")}`);
  }
}

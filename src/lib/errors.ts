export type DashErrorCode = "STORE_UNAVAILABLE" | "INVALID_RANGE" | "NO_SELECTION";

export class DashError extends Error {
  readonly code: DashErrorCode;

  constructor(code: DashErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The report store could not be reached or rejected a query. */
export class StoreUnavailable extends DashError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_UNAVAILABLE", message, options);
  }
}

export class InvalidRange extends DashError {
  constructor(message: string) {
    super("INVALID_RANGE", message);
  }
}

export class NoSelection extends DashError {
  constructor(message: string) {
    super("NO_SELECTION", message);
  }
}

export function errorMessage(e: unknown, fallback: string): string {
  if (e instanceof Error && e.message) return e.message;
  return fallback;
}

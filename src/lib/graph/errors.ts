/**
 * Graph store error classification.
 *
 * GRAPH_STORE_UNAVAILABLE aborts a discovery run; GRAPH_QUERY_FAILED is
 * contained to the phase that raised it.
 */

export type GraphErrorCode = "GRAPH_STORE_UNAVAILABLE" | "GRAPH_QUERY_FAILED";

export class GraphStoreError extends Error {
  readonly code: GraphErrorCode;

  constructor(code: GraphErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GraphStoreError";
    this.code = code;
  }
}

export class GraphStoreUnavailableError extends GraphStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GRAPH_STORE_UNAVAILABLE", message, options);
    this.name = "GraphStoreUnavailableError";
  }
}

export class GraphQueryError extends GraphStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GRAPH_QUERY_FAILED", message, options);
    this.name = "GraphQueryError";
  }
}

export function isStoreUnavailable(err: unknown): err is GraphStoreUnavailableError {
  return err instanceof GraphStoreError && err.code === "GRAPH_STORE_UNAVAILABLE";
}

// Driver error codes that mean the server (not the query) is the problem.
const UNAVAILABLE_CODES = new Set([
  "ServiceUnavailable",
  "SessionExpired",
  "Neo.ClientError.Security.Unauthorized",
  "Neo.ClientError.Security.AuthenticationRateLimit",
  "Neo.ClientError.Database.DatabaseNotFound",
]);

const NETWORK_ERROR_PATTERNS = [
  "econnrefused",
  "econnreset",
  "etimedout",
  "enotfound",
  "connection refused",
  "could not perform discovery",
  "failed to connect",
];

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Map a raw driver/network error onto the store taxonomy.
 * Already-classified errors pass through unchanged.
 */
export function classifyStoreError(err: unknown, context: string): GraphStoreError {
  if (err instanceof GraphStoreError) return err;

  const code = errorCode(err);
  const message = describeError(err);
  const lowered = message.toLowerCase();

  if (
    (code && UNAVAILABLE_CODES.has(code)) ||
    NETWORK_ERROR_PATTERNS.some((p) => lowered.includes(p))
  ) {
    return new GraphStoreUnavailableError(`${context}: ${message}`, { cause: err });
  }

  return new GraphQueryError(`${context}: ${message}`, { cause: err });
}

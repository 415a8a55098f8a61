/**
 * Error taxonomy for the file search core.
 *
 * Every failure that reaches a tool boundary is a FileSearchError with a
 * stable `kind`, so callers can decide between fixing input, backing off, or
 * retrying. classifyError() maps raw transport failures (axios errors, socket
 * errors, timeouts) onto these kinds.
 */

export type ErrorKind =
  | "validation"
  | "transient"
  | "not_found"
  | "quota_exceeded"
  | "failed_precondition"
  | "permission_denied"
  | "backend"
  | "partial_failure";

/** Kinds a single backend call can fail with. */
export type BackendErrorKind = Exclude<ErrorKind, "partial_failure">;

export interface FileSearchErrorOptions {
  cause?: unknown;
  /** HTTP status reported by the backend, when there was a response. */
  status?: number;
  details?: unknown;
}

export abstract class FileSearchError extends Error {
  abstract readonly kind: ErrorKind;
  readonly status?: number;
  readonly details?: unknown;
  /** Set by the retry policy once it gives up. */
  attempts?: number;

  constructor(message: string, options: FileSearchErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
    this.details = options.details;
  }

  get retryable(): boolean {
    return false;
  }
}

/** Malformed input, caught locally or rejected by the backend. */
export class ValidationError extends FileSearchError {
  readonly kind = "validation";
}

/** Network failure, timeout, or 5xx-class backend fault. */
export class TransientBackendError extends FileSearchError {
  readonly kind = "transient";

  override get retryable(): boolean {
    return true;
  }
}

export class NotFoundError extends FileSearchError {
  readonly kind = "not_found";
}

/** Rate limit or quota exhaustion. Never retried locally. */
export class QuotaExceededError extends FileSearchError {
  readonly kind = "quota_exceeded";
}

/** The resource is not in a state that allows the call, e.g. a non-empty store. */
export class FailedPreconditionError extends FileSearchError {
  readonly kind = "failed_precondition";
}

export class PermissionDeniedError extends FileSearchError {
  readonly kind = "permission_denied";
}

/** Any other backend failure. */
export class BackendError extends FileSearchError {
  readonly kind = "backend";
}

/**
 * Metadata update deleted the original document but could not re-import it.
 * The logical document is gone until the caller uploads it again.
 */
export class PartialFailureError extends FileSearchError {
  readonly kind = "partial_failure";
  readonly deletedDocumentName: string;
  readonly storeName: string;

  constructor(
    message: string,
    context: { deletedDocumentName: string; storeName: string },
    options: FileSearchErrorOptions = {},
  ) {
    super(message, options);
    this.deletedDocumentName = context.deletedDocumentName;
    this.storeName = context.storeName;
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ERR_NETWORK",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const TRANSIENT_ERROR_NAMES = new Set([
  "AbortError",
  "TimeoutError",
  "ConnectTimeoutError",
  "HeadersTimeoutError",
  "BodyTimeoutError",
]);

const TRANSIENT_MESSAGE_SNIPPETS = [
  "socket hang up",
  "network error",
  "timeout",
  "timed out",
  "client network socket disconnected",
];

/** Google RPC status strings, as found in `error.status` of a REST error body. */
const RPC_STATUS_KINDS: Record<string, BackendErrorKind> = {
  INVALID_ARGUMENT: "validation",
  OUT_OF_RANGE: "validation",
  FAILED_PRECONDITION: "failed_precondition",
  NOT_FOUND: "not_found",
  RESOURCE_EXHAUSTED: "quota_exceeded",
  PERMISSION_DENIED: "permission_denied",
  UNAUTHENTICATED: "permission_denied",
  UNAVAILABLE: "transient",
  DEADLINE_EXCEEDED: "transient",
  INTERNAL: "transient",
};

interface BackendErrorBody {
  status?: string;
  message?: string;
  details?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function getErrorCode(err: unknown): string | undefined {
  if (!isRecord(err)) return undefined;
  if (typeof err.code === "string") return err.code;
  if (typeof err.errno === "string") return err.errno;
  return undefined;
}

function getErrorName(err: unknown): string {
  if (!isRecord(err)) return "";
  return typeof err.name === "string" ? err.name : "";
}

function getResponse(err: unknown): { status?: number; body?: BackendErrorBody } | undefined {
  if (!isRecord(err) || !isRecord(err.response)) return undefined;
  const response = err.response;
  const status = typeof response.status === "number" ? response.status : undefined;
  let body: BackendErrorBody | undefined;
  if (isRecord(response.data) && isRecord(response.data.error)) {
    const raw = response.data.error;
    body = {
      status: typeof raw.status === "string" ? raw.status : undefined,
      message: typeof raw.message === "string" ? raw.message : undefined,
      details: raw.details,
    };
  }
  return { status, body };
}

/**
 * Walk the error chain: err -> err.cause -> err.errors[].
 */
function collectErrorCandidates(err: unknown): unknown[] {
  const queue = [err];
  const seen = new Set<unknown>();
  const candidates: unknown[] = [];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current == null || seen.has(current)) continue;
    seen.add(current);
    candidates.push(current);

    if (isRecord(current)) {
      if (current.cause && !seen.has(current.cause)) queue.push(current.cause);
      if (Array.isArray(current.errors)) {
        for (const nested of current.errors) {
          if (nested && !seen.has(nested)) queue.push(nested);
        }
      }
    }
  }

  return candidates;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * True for failures worth retrying: socket errors, timeouts, aborted
 * requests. HTTP responses are judged by status elsewhere.
 */
export function isTransientNetworkError(err: unknown): boolean {
  for (const candidate of collectErrorCandidates(err)) {
    const code = getErrorCode(candidate)?.trim().toUpperCase();
    if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

    const name = getErrorName(candidate);
    if (name && TRANSIENT_ERROR_NAMES.has(name)) return true;

    const message = errorMessage(candidate).toLowerCase();
    if (message && TRANSIENT_MESSAGE_SNIPPETS.some((s) => message.includes(s))) return true;
  }
  return false;
}

function kindFromStatus(status: number): BackendErrorKind {
  if (status === 400) return "validation";
  if (status === 401 || status === 403) return "permission_denied";
  if (status === 404) return "not_found";
  if (status === 408) return "transient";
  if (status === 429) return "quota_exceeded";
  if (status >= 500 && status < 600) return "transient";
  return "backend";
}

export function createError(
  kind: BackendErrorKind,
  message: string,
  options: FileSearchErrorOptions = {},
): FileSearchError {
  switch (kind) {
    case "validation":
      return new ValidationError(message, options);
    case "transient":
      return new TransientBackendError(message, options);
    case "not_found":
      return new NotFoundError(message, options);
    case "quota_exceeded":
      return new QuotaExceededError(message, options);
    case "failed_precondition":
      return new FailedPreconditionError(message, options);
    case "permission_denied":
      return new PermissionDeniedError(message, options);
    case "backend":
      return new BackendError(message, options);
  }
}

/**
 * Map any thrown value onto the taxonomy. FileSearchErrors pass through
 * unchanged; everything else is wrapped with the original as `cause`.
 */
export function classifyError(err: unknown): FileSearchError {
  if (err instanceof FileSearchError) return err;

  const response = getResponse(err);
  if (response?.status !== undefined) {
    const rpcKind = response.body?.status ? RPC_STATUS_KINDS[response.body.status] : undefined;
    const kind = rpcKind ?? kindFromStatus(response.status);
    const message = response.body?.message ?? errorMessage(err);
    return createError(kind, message, {
      cause: err,
      status: response.status,
      details: response.body?.details,
    });
  }

  if (isTransientNetworkError(err)) {
    return new TransientBackendError(errorMessage(err), { cause: err });
  }
  return new BackendError(errorMessage(err), { cause: err });
}

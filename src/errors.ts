/**
 * Azure DNS Console: Error Taxonomy
 *
 * Every failure surfaced by the console is one of the classes below. The
 * HTTP layer maps them to status codes; `classifyAzureError` turns raw
 * provider failures into the matching class.
 */

// =============================================================================
// Error Classes
// =============================================================================

export class DnsConsoleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DnsConsoleError";
  }
}

/** Malformed or missing request fields. */
export class ValidationError extends DnsConsoleError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** A record type that cannot be written through the console. */
export class UnsupportedTypeError extends ValidationError {
  readonly recordType: string;

  constructor(recordType: string) {
    super(`Unsupported record type: ${recordType}`);
    this.name = "UnsupportedTypeError";
    this.recordType = recordType;
  }
}

/** A zone operation was attempted before all six settings were present. */
export class ConfigIncompleteError extends DnsConsoleError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Azure DNS is not configured. Missing: ${missing.join(", ")}`);
    this.name = "ConfigIncompleteError";
    this.missing = missing;
  }
}

export class PersistenceError extends DnsConsoleError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write configuration to ${path}: ${formatErrorMessage(cause)}`, { cause });
    this.name = "PersistenceError";
    this.path = path;
  }
}

export class AuthenticationError extends DnsConsoleError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "AuthenticationError";
  }
}

export class AuthorizationError extends DnsConsoleError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "AuthorizationError";
  }
}

/** The resource group or zone does not exist. */
export class NotFoundError extends DnsConsoleError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "NotFoundError";
  }
}

/** Any other provider or network failure. */
export class RemoteError extends DnsConsoleError {
  readonly statusCode?: number;
  readonly code?: string;

  constructor(message: string, details: { statusCode?: number; code?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.name = "RemoteError";
    this.statusCode = details.statusCode;
    this.code = details.code;
  }
}

export type ProviderError = AuthenticationError | AuthorizationError | NotFoundError | RemoteError;

// =============================================================================
// Azure Error Inspection
// =============================================================================

type ErrorFields = {
  name?: string;
  code?: string;
  statusCode?: number;
  message: string;
};

function readErrorFields(error: unknown): ErrorFields {
  if (typeof error === "string") return { message: error };
  if (typeof error !== "object" || error === null) return { message: "Unknown error" };

  const fields: ErrorFields = { message: "Unknown error" };
  if ("name" in error && typeof error.name === "string") fields.name = error.name;
  if ("message" in error && typeof error.message === "string") fields.message = error.message;
  if ("code" in error && typeof error.code === "string") fields.code = error.code;
  if ("statusCode" in error && typeof error.statusCode === "number") {
    fields.statusCode = error.statusCode;
  } else if ("status" in error && typeof error.status === "number") {
    fields.statusCode = error.status;
  }
  return fields;
}

const AUTHENTICATION_ERROR_NAMES = new Set([
  "AuthenticationError",
  "AggregateAuthenticationError",
  "CredentialUnavailableError",
]);

const NOT_FOUND_CODES = new Set([
  "ResourceGroupNotFound",
  "ResourceNotFound",
  "ParentResourceNotFound",
]);

/**
 * Map an error thrown by @azure/identity or @azure/arm-dns onto the console's
 * taxonomy. Errors already in the taxonomy pass through unchanged.
 */
export function classifyAzureError(error: unknown): DnsConsoleError {
  if (error instanceof DnsConsoleError) return error;

  const fields = readErrorFields(error);
  const message = formatErrorMessage(error);

  if (
    (fields.name !== undefined && AUTHENTICATION_ERROR_NAMES.has(fields.name)) ||
    /AADSTS\d+/.test(fields.message) ||
    fields.statusCode === 401
  ) {
    return new AuthenticationError(
      `Authentication failed. Check the tenant ID, client ID and client secret. ${fields.message}`,
      error,
    );
  }

  if (fields.code === "AuthorizationFailed" || fields.statusCode === 403) {
    return new AuthorizationError(
      `Authorization failed. The service principal lacks access to the DNS zone. ${fields.message}`,
      error,
    );
  }

  if ((fields.code !== undefined && NOT_FOUND_CODES.has(fields.code)) || fields.statusCode === 404) {
    return new NotFoundError(
      `Resource group or DNS zone not found. ${fields.message}`,
      error,
    );
  }

  return new RemoteError(message, {
    statusCode: fields.statusCode,
    code: fields.code,
    cause: error,
  });
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";

  const { code, statusCode, message } = readErrorFields(error);
  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return parts.join(" ");
}

/** Stack trace for diagnostics, falling back to the formatted message. */
export function formatErrorDetails(error: unknown): string {
  if (error instanceof Error) {
    const root = error.cause instanceof Error ? error.cause : error;
    return root.stack ?? formatErrorMessage(root);
  }
  return formatErrorMessage(error);
}

import { describe, it, expect } from "vitest";
import {
  AuthenticationError,
  AuthorizationError,
  ConfigIncompleteError,
  NotFoundError,
  PersistenceError,
  RemoteError,
  UnsupportedTypeError,
  ValidationError,
  classifyAzureError,
  formatErrorDetails,
  formatErrorMessage,
} from "./errors.js";

function azureError(message: string, fields: { name?: string; code?: string; statusCode?: number } = {}): Error {
  return Object.assign(new Error(message), fields);
}

describe("error classes", () => {
  it("UnsupportedTypeError is a ValidationError", () => {
    const err = new UnsupportedTypeError("SRV");
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.message).toBe("Unsupported record type: SRV");
    expect(err.recordType).toBe("SRV");
  });

  it("ConfigIncompleteError lists the missing fields", () => {
    expect(new ConfigIncompleteError(["tenantId", "dnsZone"]).message).toBe(
      "Azure DNS is not configured. Missing: tenantId, dnsZone",
    );
  });

  it("PersistenceError names the path and cause", () => {
    const cause = azureError("permission denied", { code: "EACCES" });
    const err = new PersistenceError("/data/.env", cause);
    expect(err.message).toBe("Failed to write configuration to /data/.env: [EACCES] permission denied");
    expect(err.cause).toBe(cause);
  });
});

describe("classifyAzureError", () => {
  it.each(["AuthenticationError", "AggregateAuthenticationError", "CredentialUnavailableError"])(
    "treats %s as an authentication failure",
    (name) => {
      expect(classifyAzureError(azureError("nope", { name }))).toBeInstanceOf(AuthenticationError);
    },
  );

  it("recognises AADSTS codes in the message", () => {
    const err = classifyAzureError(azureError("AADSTS90002: Tenant not found."));
    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err.message).toBe(
      "Authentication failed. Check the tenant ID, client ID and client secret. AADSTS90002: Tenant not found.",
    );
  });

  it("treats HTTP 401 as an authentication failure", () => {
    expect(classifyAzureError(azureError("unauthorized", { statusCode: 401 }))).toBeInstanceOf(AuthenticationError);
  });

  it("maps AuthorizationFailed and HTTP 403", () => {
    expect(classifyAzureError(azureError("x", { code: "AuthorizationFailed" }))).toBeInstanceOf(AuthorizationError);
    expect(classifyAzureError(azureError("x", { statusCode: 403 }))).toBeInstanceOf(AuthorizationError);
  });

  it("maps missing resources", () => {
    for (const code of ["ResourceGroupNotFound", "ResourceNotFound", "ParentResourceNotFound"]) {
      expect(classifyAzureError(azureError("x", { code }))).toBeInstanceOf(NotFoundError);
    }
    expect(classifyAzureError(azureError("x", { statusCode: 404 }))).toBeInstanceOf(NotFoundError);
  });

  it("wraps everything else in RemoteError", () => {
    const err = classifyAzureError(azureError("throttled", { code: "TooManyRequests", statusCode: 429 }));
    expect(err).toBeInstanceOf(RemoteError);
    expect(err.message).toBe("[TooManyRequests] (HTTP 429) throttled");
    if (err instanceof RemoteError) {
      expect(err.statusCode).toBe(429);
      expect(err.code).toBe("TooManyRequests");
    }
  });

  it("reads a numeric status field", () => {
    expect(classifyAzureError({ message: "gone", status: 404 })).toBeInstanceOf(NotFoundError);
  });

  it("passes console errors through", () => {
    const err = new ValidationError("bad");
    expect(classifyAzureError(err)).toBe(err);
  });
});

describe("formatErrorMessage", () => {
  it("formats strings and unknown values", () => {
    expect(formatErrorMessage("plain")).toBe("plain");
    expect(formatErrorMessage(undefined)).toBe("Unknown error");
    expect(formatErrorMessage(42)).toBe("Unknown error");
  });

  it("prefixes code and status", () => {
    expect(formatErrorMessage(azureError("boom", { code: "Conflict", statusCode: 409 }))).toBe(
      "[Conflict] (HTTP 409) boom",
    );
  });
});

describe("formatErrorDetails", () => {
  it("prefers the stack of the cause", () => {
    const cause = new Error("root");
    const err = new RemoteError("wrapped", { cause });
    expect(formatErrorDetails(err)).toBe(cause.stack);
  });

  it("formats non-errors", () => {
    expect(formatErrorDetails("text")).toBe("text");
  });
});

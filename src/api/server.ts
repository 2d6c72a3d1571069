/**
 * Azure DNS Console: HTTP API Server
 *
 * Thin REST API over the configured DNS zone and its credentials.
 * Uses Node's built-in http module.
 *
 * Endpoints:
 *   GET    /api/health                    liveness + zone name
 *   GET    /api/config/status             configuration completeness
 *   GET    /api/config                    current configuration
 *   POST   /api/config                    replace configuration
 *   POST   /api/config/test               validate candidate credentials
 *   GET    /api/records                   list records in the zone
 *   POST   /api/records                   create a record
 *   PUT    /api/records/:type/:name       update a record
 *   DELETE /api/records/:type/:name       delete a record
 *   GET    /api/auth/status               whether a token is required/presented
 *   GET    /api/auth/token                current API token
 *   POST   /api/auth/token/regenerate     issue a new API token
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { TokenStore } from "../auth/token-store.js";
import { isStorableEnvValue, type ConfigStore } from "../config-store/index.js";
import type { DnsClientFactory } from "../dns/client.js";
import { ZoneGateway, type ZoneGatewayDeps } from "../dns/gateway.js";
import { DEFAULT_TTL } from "../dns/types.js";
import {
  AuthenticationError,
  AuthorizationError,
  ConfigIncompleteError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  formatErrorDetails,
  formatErrorMessage,
} from "../errors.js";
import type { Logger } from "../logging/index.js";
import { createSilentLogger } from "../logging/index.js";
import { ZONE_CONFIG_FIELDS, type ZoneConfig, type ZoneConfigField } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type ApiServerOptions = {
  port: number;
  host: string;
  store: ConfigStore;
  tokens: TokenStore;
  /** Builds the Azure record-set client; defaults to the real SDK client. */
  clientFactory?: DnsClientFactory;
  /** Timeout for each Azure call in ms (default: 30000). */
  requestTimeoutMs?: number;
  /** Reject MX values without a preference instead of dropping them. */
  strictMx?: boolean;
  /** Request body read timeout in ms (default: 30000). */
  bodyTimeout?: number;
  logger?: Logger;
};

export type ApiServerHandle = {
  server: Server;
  url: string;
  close: () => Promise<void>;
};

type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  params: Record<string, string>,
  body: unknown,
) => Promise<void>;

type Route = {
  method: string;
  pattern: RegExp;
  handler: RouteHandler;
  /** Reachable without an API token. */
  open: boolean;
};

// =============================================================================
// Request Schemas
// =============================================================================

const ConfigBody = Type.Object({
  tenant_id: Type.Optional(Type.String()),
  client_id: Type.Optional(Type.String()),
  client_secret: Type.Optional(Type.String()),
  subscription_id: Type.Optional(Type.String()),
  resource_group: Type.Optional(Type.String()),
  dns_zone: Type.Optional(Type.String()),
});

const RecordBody = Type.Object({
  name: Type.Optional(Type.String()),
  type: Type.Optional(Type.String()),
  ttl: Type.Optional(Type.Integer({ minimum: 1 })),
  values: Type.Optional(Type.Array(Type.String())),
});

const CONFIG_BODY_FIELDS: Record<ZoneConfigField, keyof Static<typeof ConfigBody>> = {
  tenantId: "tenant_id",
  clientId: "client_id",
  clientSecret: "client_secret",
  subscriptionId: "subscription_id",
  resourceGroup: "resource_group",
  dnsZone: "dns_zone",
};

// =============================================================================
// Helpers
// =============================================================================

const MAX_BODY = 1024 * 1024; // 1MB

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

/** Security headers applied to every response. */
const SECURITY_HEADERS: Record<string, string> = {
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "Cache-Control": "no-store",
};

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, {
    "Content-Type": "application/json",
    ...SECURITY_HEADERS,
  });
  res.end(JSON.stringify(data));
}

function error(res: ServerResponse, message: string, status = 400, extra: Record<string, unknown> = {}): void {
  json(res, { error: message, ...extra }, status);
}

/** Node ends the socket once a response carrying this header is flushed. */
function closeAfterResponse(res: ServerResponse): void {
  res.setHeader("Connection", "close");
}

async function readBody(req: IncomingMessage, timeoutMs = 30_000): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflow = false;

    // The socket stays open until the response is written; see closeAfterResponse.
    const timer = setTimeout(() => {
      reject(new HttpError(408, "Request body read timeout"));
    }, timeoutMs);

    req.on("data", (chunk: Buffer) => {
      if (overflow) return;
      size += chunk.length;
      if (size > MAX_BODY) {
        // Drain the rest so the 413 reaches the client.
        overflow = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      clearTimeout(timer);
      if (overflow) {
        reject(new HttpError(413, "Request body too large"));
        return;
      }
      const raw = Buffer.concat(chunks).toString("utf-8");
      if (!raw.trim()) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch {
        reject(new HttpError(400, "Invalid JSON body"));
      }
    });
    req.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}

/** Validate a JSON body against a schema, reporting the first mismatch. */
function parseBody<T extends TSchema>(schema: T, body: unknown): Static<T> {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new HttpError(400, "Request body must be a JSON object");
  }
  if (Value.Check(schema, body)) return body;

  const [first] = [...Value.Errors(schema, body)];
  const field = first?.path.replace(/^\//, "").replace(/\//g, ".") || "body";
  throw new HttpError(400, `Invalid field '${field}': ${first?.message ?? "invalid value"}`);
}

/** Six trimmed config fields from a request body, plus the ones left blank. */
function readConfigBody(body: unknown): { config: ZoneConfig; missing: string[] } {
  const parsed = parseBody(ConfigBody, body);
  const read = (field: ZoneConfigField): string => parsed[CONFIG_BODY_FIELDS[field]]?.trim() ?? "";
  const config: ZoneConfig = {
    tenantId: read("tenantId"),
    clientId: read("clientId"),
    clientSecret: read("clientSecret"),
    subscriptionId: read("subscriptionId"),
    resourceGroup: read("resourceGroup"),
    dnsZone: read("dnsZone"),
  };
  const missing = ZONE_CONFIG_FIELDS.filter((field) => !config[field]).map((field) => CONFIG_BODY_FIELDS[field]);
  return { config, missing };
}

function matchRoute(
  method: string,
  url: string,
  routes: Route[],
): { route: Route; params: Record<string, string> } | null {
  for (const route of routes) {
    if (route.method !== method) continue;
    const match = url.match(route.pattern);
    if (match) {
      const params: Record<string, string> = {};
      for (const [key, value] of Object.entries(match.groups ?? {})) {
        try {
          params[key] = decodeURIComponent(value);
        } catch {
          throw new HttpError(400, `Malformed path segment: ${value}`);
        }
      }
      return { route, params };
    }
  }
  return null;
}

// =============================================================================
// Server
// =============================================================================

export async function startApiServer(opts: ApiServerOptions): Promise<ApiServerHandle> {
  const logger = opts.logger ?? createSilentLogger();
  const bodyTimeout = opts.bodyTimeout ?? 30_000;
  const { store, tokens } = opts;

  if (!Number.isFinite(opts.port) || opts.port < 0 || opts.port > 65535) {
    throw new Error(`Invalid port: ${opts.port}. Must be 0-65535.`);
  }

  logger.addSecret(store.get().clientSecret);
  const unsubscribe = store.onChange((config) => logger.addSecret(config.clientSecret));

  const gatewayDeps: ZoneGatewayDeps = {
    clientFactory: opts.clientFactory,
    requestTimeoutMs: opts.requestTimeoutMs,
    codec: { strictMx: opts.strictMx ?? false },
    logger: logger.child("gateway"),
  };

  // ─── Route Definitions ─────────────────────────────────────────

  const routes: Route[] = [];

  const route = (method: string, pattern: string, handler: RouteHandler, options: { open?: boolean } = {}) => {
    // `:param` matches one segment, `:param+` the rest of the path
    const re = new RegExp(
      "^" + pattern.replace(/:(\w+)(\+?)/g, (_m, name: string, rest: string) => `(?<${name}>${rest ? ".+" : "[^/]+"})`) + "$",
    );
    routes.push({ method, pattern: re, handler, open: options.open ?? false });
  };

  /** Gateway on the stored config, or a 400 response when it is incomplete. */
  const gatewayOr400 = (res: ServerResponse): ZoneGateway | null => {
    try {
      return ZoneGateway.fromStore(store, gatewayDeps);
    } catch (err) {
      if (err instanceof ConfigIncompleteError) {
        error(res, err.message, 400);
        return null;
      }
      throw err;
    }
  };

  // ─── Health ─────────────────────────────────────────────────────
  route("GET", "/api/health", async (_req, res) => {
    json(res, { status: "healthy", zone: store.get().dnsZone || null });
  }, { open: true });

  // ─── GET /api/config/status ────────────────────────────────────
  route("GET", "/api/config/status", async (_req, res) => {
    const config = store.get();
    json(res, {
      configured: store.isComplete(),
      zone: config.dnsZone || null,
      resource_group: config.resourceGroup || null,
    });
  });

  // ─── GET /api/config ───────────────────────────────────────────
  route("GET", "/api/config", async (_req, res) => {
    const config = store.get();
    json(res, {
      tenant_id: config.tenantId,
      client_id: config.clientId,
      client_secret: config.clientSecret,
      subscription_id: config.subscriptionId,
      resource_group: config.resourceGroup,
      dns_zone: config.dnsZone,
      has_secret: config.clientSecret.length > 0,
    });
  });

  // ─── POST /api/config: replace configuration ──────────────────────────────
  route("POST", "/api/config", async (_req, res, _params, body) => {
    const { config, missing } = readConfigBody(body);
    if (missing.length > 0) {
      error(res, `Missing required fields: ${missing.join(", ")}`, 400);
      return;
    }
    const unstorable = ZONE_CONFIG_FIELDS.filter((field) => !isStorableEnvValue(config[field]));
    if (unstorable.length > 0) {
      const names = unstorable.map((field) => CONFIG_BODY_FIELDS[field]);
      error(res, `Fields contain a line break or every quote character: ${names.join(", ")}`, 400);
      return;
    }

    try {
      await store.update(config);
    } catch (err) {
      if (err instanceof PersistenceError) {
        error(res, err.message, 500);
        return;
      }
      if (err instanceof ValidationError) {
        error(res, err.message, 400);
        return;
      }
      throw err;
    }

    json(res, { success: true, message: "Configuration saved successfully", zone: config.dnsZone });
  });

  // ─── POST /api/config/test: validate without saving ───────────────────────
  route("POST", "/api/config/test", async (_req, res, _params, body) => {
    const { config, missing } = readConfigBody(body);
    if (missing.length > 0) {
      error(res, `Missing required fields: ${missing.join(", ")}`, 400);
      return;
    }

    try {
      const count = await ZoneGateway.testConnection(config, gatewayDeps);
      json(res, {
        success: true,
        message: `Connection successful! Found ${count} records in zone ${config.dnsZone}`,
        record_count: count,
        zone: config.dnsZone,
      });
    } catch (err) {
      const status =
        err instanceof AuthenticationError ? 401
        : err instanceof AuthorizationError ? 403
        : err instanceof NotFoundError ? 404
        : err instanceof ValidationError ? 400
        : 500;
      logger.warn(`Connection test failed for zone ${config.dnsZone}`, { status, error: formatErrorMessage(err) });
      error(res, formatErrorMessage(err), status, { success: false });
    }
  });

  // ─── GET /api/records: list zone records ──────────────────────────────────
  route("GET", "/api/records", async (_req, res) => {
    const gateway = gatewayOr400(res);
    if (!gateway) return;

    logger.info(`Listing records in zone ${gateway.zoneName}`, { resourceGroup: gateway.resourceGroup });
    try {
      const records = await gateway.list();
      json(res, { records, zone: gateway.zoneName });
    } catch (err) {
      const details = formatErrorDetails(err);
      logger.error(`Listing records failed: ${formatErrorMessage(err)}`, { details });
      error(res, formatErrorMessage(err), 500, { details });
    }
  });

  // ─── POST /api/records: create ────────────────────────────────────────────
  route("POST", "/api/records", async (_req, res, _params, body) => {
    const { name, type, ttl, values } = parseBody(RecordBody, body);
    if (!name || !type || !values || values.length === 0) {
      error(res, "Missing required fields: name, type, values", 400);
      return;
    }

    const gateway = gatewayOr400(res);
    if (!gateway) return;

    try {
      await gateway.upsert(name, type, ttl ?? DEFAULT_TTL, values);
      json(res, { message: "Record created successfully", name }, 201);
    } catch (err) {
      if (err instanceof ValidationError) {
        error(res, err.message, 400);
        return;
      }
      logger.error(`Creating ${type} record ${name} failed: ${formatErrorMessage(err)}`);
      error(res, formatErrorMessage(err), 500);
    }
  });

  // ─── PUT /api/records/:type/:name: update ─────────────────────────────────
  route("PUT", "/api/records/:type/:name+", async (_req, res, params, body) => {
    const { type = "", name = "" } = params;
    const { ttl, values } = parseBody(RecordBody, body);
    if (!values || values.length === 0) {
      error(res, "Missing required field: values", 400);
      return;
    }

    const gateway = gatewayOr400(res);
    if (!gateway) return;

    try {
      await gateway.upsert(name, type, ttl ?? DEFAULT_TTL, values);
      json(res, { message: "Record updated successfully", name });
    } catch (err) {
      if (err instanceof ValidationError) {
        error(res, err.message, 400);
        return;
      }
      logger.error(`Updating ${type} record ${name} failed: ${formatErrorMessage(err)}`);
      error(res, formatErrorMessage(err), 500);
    }
  });

  // ─── DELETE /api/records/:type/:name: delete ──────────────────────────────
  route("DELETE", "/api/records/:type/:name+", async (_req, res, params) => {
    const { type = "", name = "" } = params;
    const gateway = gatewayOr400(res);
    if (!gateway) return;

    try {
      await gateway.delete(name, type);
      json(res, { message: "Record deleted successfully", name });
    } catch (err) {
      logger.error(`Deleting ${type} record ${name} failed: ${formatErrorMessage(err)}`);
      error(res, formatErrorMessage(err), 500);
    }
  });

  // ─── Auth ──────────────────────────────────────────────────────
  route("GET", "/api/auth/status", async (req, res) => {
    json(res, { auth_required: tokens.required, authenticated: tokens.authenticate(req) });
  }, { open: true });

  route("GET", "/api/auth/token", async (_req, res) => {
    const token = tokens.current();
    if (token === null) {
      error(res, "No API token is configured", 404);
      return;
    }
    json(res, { api_token: token });
  });

  route("POST", "/api/auth/token/regenerate", async (_req, res) => {
    if (tokens.tokenSource === "settings") {
      error(res, "The API token is fixed by DNS_CONSOLE_API_TOKEN and cannot be regenerated", 409);
      return;
    }
    const token = await tokens.regenerate();
    json(res, { api_token: token });
  });

  // ─── Start Server ──────────────────────────────────────────────

  const server = createServer(async (req, res) => {
    const startedAt = Date.now();
    const url = req.url?.split("?")[0] ?? "/";
    const method = req.method ?? "GET";
    res.on("finish", () => {
      logger.debug(`${method} ${url} ${res.statusCode}`, { durationMs: Date.now() - startedAt });
    });

    try {
      const contentLength = req.headers["content-length"];
      if (contentLength && Number.parseInt(contentLength, 10) > MAX_BODY) {
        closeAfterResponse(res);
        error(res, "Request body too large", 413);
        return;
      }

      const matched = matchRoute(method, url, routes);
      if (!matched) {
        error(res, `Not found: ${method} ${url}`, 404);
        return;
      }

      if (!matched.route.open && !tokens.authenticate(req)) {
        error(res, "Unauthorized", 401);
        return;
      }

      const body = method === "POST" || method === "PUT" ? await readBody(req, bodyTimeout) : {};
      await matched.route.handler(req, res, matched.params, body);
    } catch (err) {
      if (err instanceof HttpError) {
        if (err.status === 408 || err.status === 413) closeAfterResponse(res);
        error(res, err.message, err.status);
        return;
      }
      logger.error(`Error handling ${method} ${url}: ${formatErrorMessage(err)}`, {
        details: formatErrorDetails(err),
      });
      if (!res.headersSent) error(res, "Internal server error", 500);
    }
  });

  server.headersTimeout = 60_000;
  server.requestTimeout = 60_000;

  const close = (): Promise<void> =>
    new Promise((resolve, reject) => {
      logger.info("Shutting down…");
      unsubscribe();
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return new Promise<ApiServerHandle>((resolve, reject) => {
    server.on("error", reject);
    server.listen(opts.port, opts.host, () => {
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : opts.port;
      const url = `http://${opts.host}:${port}`;
      logger.info(`API server listening on ${url}`);
      logger.info(`Auth: ${tokens.required ? `API token required (${tokens.tokenSource})` : "open (no token)"}`);
      logger.info(`Zone configuration: ${store.state()}`);
      resolve({ server, url, close });
    });
  });
}

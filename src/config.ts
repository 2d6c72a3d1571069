/**
 * Process settings schema (TypeBox) and loader.
 *
 * Settings come from `DNS_CONSOLE_*` environment variables, with CLI flags
 * layered on top. The Azure zone configuration itself lives in the config
 * store, not here.
 */

import { join, resolve } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const settingsSchema = Type.Object({
  host: Type.String({ minLength: 1, default: "0.0.0.0", description: "Interface the HTTP server binds to" }),
  port: Type.Integer({ minimum: 0, maximum: 65535, default: 5000, description: "HTTP port (0 = random)" }),
  dataDir: Type.String({ minLength: 1, description: "Directory holding the .env and api-token files" }),
  envFile: Type.Optional(Type.String({ minLength: 1, description: "Path of the zone configuration file" })),
  apiToken: Type.Optional(Type.String({ minLength: 1, description: "Fixed API token; overrides the token file" })),
  requestTimeoutMs: Type.Integer({ minimum: 1, default: 30_000, description: "Timeout for each Azure call" }),
  strictMx: Type.Boolean({ default: false, description: "Reject MX values without a preference" }),
  logLevel: Type.Union(
    [
      Type.Literal("trace"),
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("fatal"),
    ],
    { default: "info" },
  ),
});

export type ServerSettingsInput = Static<typeof settingsSchema>;

export type ServerSettings = Omit<ServerSettingsInput, "envFile"> & {
  envFile: string;
  tokenFile: string;
};

const ENV_VARS: Record<Exclude<keyof ServerSettingsInput, "logLevel">, string> = {
  host: "DNS_CONSOLE_HOST",
  port: "DNS_CONSOLE_PORT",
  dataDir: "DNS_CONSOLE_DATA_DIR",
  envFile: "DNS_CONSOLE_ENV_FILE",
  apiToken: "DNS_CONSOLE_API_TOKEN",
  requestTimeoutMs: "DNS_CONSOLE_REQUEST_TIMEOUT_MS",
  strictMx: "DNS_CONSOLE_STRICT_MX",
};

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid settings:\n  ${issues.join("\n  ")}`);
    this.name = "SettingsError";
    this.issues = issues;
  }
}

/**
 * Read, convert and validate settings. Blank environment values count as
 * unset; `overrides` (CLI flags) win over the environment.
 */
export function loadServerSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<keyof ServerSettingsInput, unknown>> = {},
): ServerSettings {
  const raw: Record<string, unknown> = { dataDir: process.cwd() };

  for (const [key, name] of Object.entries(ENV_VARS)) {
    const value = env[name]?.trim();
    if (value) raw[key] = value;
  }
  const logLevel = env.LOG_LEVEL?.trim();
  if (logLevel) raw.logLevel = logLevel;

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const candidate = Value.Default(settingsSchema, Value.Convert(settingsSchema, raw));
  if (!Value.Check(settingsSchema, candidate)) {
    const issues = [...Value.Errors(settingsSchema, candidate)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new SettingsError(issues);
  }

  const dataDir = resolve(candidate.dataDir);
  return {
    ...candidate,
    dataDir,
    envFile: resolve(candidate.envFile ?? join(dataDir, ".env")),
    tokenFile: join(dataDir, "api-token"),
  };
}

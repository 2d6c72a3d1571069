/**
 * Process bootstrap: settings → logger → config store → token store.
 */

import { startApiServer, type ApiServerHandle } from "./api/server.js";
import { TokenStore } from "./auth/token-store.js";
import { loadServerSettings, type ServerSettings } from "./config.js";
import { ConfigStore } from "./config-store/index.js";
import type { DnsClientFactory } from "./dns/client.js";
import { InMemoryDnsBackend } from "./dns/in-memory-client.js";
import { createLogger, type Logger, type LogTransport } from "./logging/index.js";

export type AppContext = {
  settings: ServerSettings;
  logger: Logger;
  store: ConfigStore;
  tokens: TokenStore;
  /** Undefined means the real Azure SDK client. */
  clientFactory?: DnsClientFactory;
};

export type CreateAppOptions = {
  env?: NodeJS.ProcessEnv;
  /** CLI flag values; undefined entries are ignored. */
  overrides?: Parameters<typeof loadServerSettings>[1];
  /** Serve records from an in-process zone instead of Azure. */
  inMemory?: boolean;
  clientFactory?: DnsClientFactory;
  logTransports?: LogTransport[];
};

export async function createApp(options: CreateAppOptions = {}): Promise<AppContext> {
  const env = options.env ?? process.env;
  const settings = loadServerSettings(env, options.overrides);
  const logger = createLogger("server", { level: settings.logLevel, transports: options.logTransports });

  const store = await ConfigStore.load({ envFile: settings.envFile, logger: logger.child("config") }, env);
  const tokens = await TokenStore.load({
    tokenFile: settings.tokenFile,
    fixedToken: settings.apiToken,
    logger: logger.child("auth"),
  });

  let clientFactory = options.clientFactory;
  if (!clientFactory && options.inMemory) {
    logger.warn("Serving records from an in-memory zone; nothing reaches Azure");
    clientFactory = new InMemoryDnsBackend().factory();
  }

  return { settings, logger, store, tokens, clientFactory };
}

export async function serve(app: AppContext): Promise<ApiServerHandle> {
  return startApiServer({
    host: app.settings.host,
    port: app.settings.port,
    store: app.store,
    tokens: app.tokens,
    clientFactory: app.clientFactory,
    requestTimeoutMs: app.settings.requestTimeoutMs,
    strictMx: app.settings.strictMx,
    logger: app.logger.child("api"),
  });
}

export { startApiServer, type ApiServerHandle, type ApiServerOptions } from "./api/server.js";
export { createApp, serve, type AppContext, type CreateAppOptions } from "./app.js";
export { TokenStore, extractRequestToken } from "./auth/token-store.js";
export { loadServerSettings, SettingsError, type ServerSettings } from "./config.js";
export * from "./config-store/index.js";
export * from "./dns/codec.js";
export { createAzureDnsClient, type DnsClientFactory } from "./dns/client.js";
export { ZoneGateway, DEFAULT_REQUEST_TIMEOUT_MS, type ZoneGatewayDeps } from "./dns/gateway.js";
export { InMemoryDnsBackend, InMemoryDnsZone, ZoneNotFoundError } from "./dns/in-memory-client.js";
export * from "./dns/types.js";
export * from "./errors.js";
export * from "./logging/index.js";
export * from "./types.js";

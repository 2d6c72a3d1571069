export { ConfigStore } from "./store.js";
export type { ConfigStoreOptions, ConfigChangeListener } from "./store.js";
export { readEnvFile, writeEnvFile, applyEnvUpdates, formatEnvValue, isStorableEnvValue } from "./env-file.js";

/**
 * Zone Configuration Store
 *
 * Holds the current service-principal + zone configuration and mirrors it
 * to a flat env file. Readers always see one whole frozen snapshot; writers
 * are serialized so concurrent updates apply in call order.
 *
 * An update swaps the in-memory snapshot first and then writes the file. If
 * the write fails the caller gets a PersistenceError while memory keeps the
 * new values; the next successful update brings the file back in line.
 */

import { PersistenceError, ValidationError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { createSilentLogger } from "../logging/index.js";
import {
  ZONE_CONFIG_ENV_KEYS,
  ZONE_CONFIG_FIELDS,
  emptyZoneConfig,
  isZoneConfigComplete,
  missingZoneConfigFields,
  type ConfigLifecycleState,
  type ZoneConfig,
  type ZoneConfigField,
} from "../types.js";
import { isStorableEnvValue, readEnvFile, writeEnvFile } from "./env-file.js";

export type ConfigStoreOptions = {
  /** Env file the configuration is mirrored to. */
  envFile: string;
  logger?: Logger;
};

export type ConfigChangeListener = (config: Readonly<ZoneConfig>) => void;

function freeze(config: ZoneConfig): Readonly<ZoneConfig> {
  return Object.freeze({ ...config });
}

export class ConfigStore {
  private snapshot: Readonly<ZoneConfig>;
  private writeChain: Promise<void> = Promise.resolve();
  private listeners = new Set<ConfigChangeListener>();
  private readonly envFile: string;
  private readonly logger: Logger;

  constructor(options: ConfigStoreOptions, initial: ZoneConfig = emptyZoneConfig()) {
    this.envFile = options.envFile;
    this.logger = options.logger ?? createSilentLogger();
    this.snapshot = freeze(initial);
  }

  /**
   * Seed a store from the process environment and the env file. Environment
   * variables win over file entries. Missing keys only produce a warning.
   */
  static async load(
    options: ConfigStoreOptions,
    env: NodeJS.ProcessEnv = process.env,
  ): Promise<ConfigStore> {
    const fileValues = await readEnvFile(options.envFile);
    const initial = emptyZoneConfig();
    for (const field of ZONE_CONFIG_FIELDS) {
      const key = ZONE_CONFIG_ENV_KEYS[field];
      initial[field] = (env[key] || fileValues[key] || "").trim();
    }

    const store = new ConfigStore(options, initial);
    const missing = missingZoneConfigFields(initial);
    if (missing.length > 0) {
      store.logger.warn("Azure DNS configuration is incomplete; configure it through the API", {
        missing: missing.map((field) => ZONE_CONFIG_ENV_KEYS[field]),
      });
    } else {
      store.logger.info(`Loaded configuration for zone ${initial.dnsZone}`);
    }
    return store;
  }

  /** Current snapshot, secret included. */
  get(): Readonly<ZoneConfig> {
    return this.snapshot;
  }

  isComplete(): boolean {
    return isZoneConfigComplete(this.snapshot);
  }

  missingFields(): ZoneConfigField[] {
    return missingZoneConfigFields(this.snapshot);
  }

  state(): ConfigLifecycleState {
    return this.isComplete() ? "configured" : "unconfigured";
  }

  get filePath(): string {
    return this.envFile;
  }

  /** Subscribe to snapshot swaps. Returns an unsubscribe function. */
  onChange(listener: ConfigChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Replace the whole configuration and persist it.
   * Rejects with ValidationError, leaving the snapshot alone, when a value
   * cannot be stored in the env file, and with PersistenceError when the
   * file cannot be written.
   */
  update(next: ZoneConfig): Promise<void> {
    const run = async (): Promise<void> => {
      const unstorable = ZONE_CONFIG_FIELDS.filter((field) => !isStorableEnvValue(next[field]));
      if (unstorable.length > 0) {
        const keys = unstorable.map((field) => ZONE_CONFIG_ENV_KEYS[field]);
        throw new ValidationError(`Values cannot be stored in the env file: ${keys.join(", ")}`);
      }

      const snapshot = freeze({
        tenantId: next.tenantId,
        clientId: next.clientId,
        clientSecret: next.clientSecret,
        subscriptionId: next.subscriptionId,
        resourceGroup: next.resourceGroup,
        dnsZone: next.dnsZone,
      });
      this.snapshot = snapshot;
      for (const listener of this.listeners) listener(snapshot);

      const updates: Record<string, string> = {};
      for (const field of ZONE_CONFIG_FIELDS) {
        updates[ZONE_CONFIG_ENV_KEYS[field]] = snapshot[field];
      }

      try {
        await writeEnvFile(this.envFile, updates);
      } catch (error) {
        this.logger.error("Configuration write failed; in-memory configuration was kept", {
          path: this.envFile,
          error: String(error),
        });
        throw new PersistenceError(this.envFile, error);
      }
      this.logger.info(`Configuration saved for zone ${snapshot.dnsZone}`, { path: this.envFile });
    };

    const result = this.writeChain.then(run);
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.writeChain = result.catch(() => undefined);
    return result;
  }
}

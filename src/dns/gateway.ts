/**
 * Zone Gateway
 *
 * Thin façade over the four record-set operations of the configured zone.
 * A gateway is built per request from the current configuration snapshot
 * and holds no state beyond it.
 */

import type { ConfigStore } from "../config-store/index.js";
import { ConfigIncompleteError, RemoteError, classifyAzureError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { createSilentLogger } from "../logging/index.js";
import { missingZoneConfigFields, type ZoneConfig } from "../types.js";
import { createAzureDnsClient, type DnsClientFactory } from "./client.js";
import { decodeRecordSet, encodeRecordSet } from "./codec.js";
import type { CodecOptions, DnsRecord, RecordSetOperations } from "./types.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export type ZoneGatewayDeps = {
  clientFactory?: DnsClientFactory;
  /** Per-call timeout for remote operations. */
  requestTimeoutMs?: number;
  codec?: CodecOptions;
  logger?: Logger;
};

export class ZoneGateway {
  private readonly config: Readonly<ZoneConfig>;
  private readonly clientFactory: DnsClientFactory;
  private readonly timeoutMs: number;
  private readonly codec: CodecOptions;
  private readonly logger: Logger;
  private client: RecordSetOperations | null = null;

  private constructor(config: Readonly<ZoneConfig>, deps: ZoneGatewayDeps) {
    this.config = config;
    this.clientFactory = deps.clientFactory ?? createAzureDnsClient;
    this.timeoutMs = deps.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.codec = deps.codec ?? {};
    this.logger = deps.logger ?? createSilentLogger();
  }

  /**
   * Gateway for an explicit configuration. Throws ConfigIncompleteError
   * before any client is created if a field is blank.
   */
  static forConfig(config: Readonly<ZoneConfig>, deps: ZoneGatewayDeps = {}): ZoneGateway {
    const missing = missingZoneConfigFields(config);
    if (missing.length > 0) throw new ConfigIncompleteError(missing);
    return new ZoneGateway(config, deps);
  }

  /** Gateway bound to the store's current snapshot. */
  static fromStore(store: ConfigStore, deps: ZoneGatewayDeps = {}): ZoneGateway {
    return ZoneGateway.forConfig(store.get(), deps);
  }

  /**
   * Validate candidate credentials by listing their zone. The candidate is
   * never stored.
   */
  static async testConnection(candidate: Readonly<ZoneConfig>, deps: ZoneGatewayDeps = {}): Promise<number> {
    const records = await ZoneGateway.forConfig(candidate, deps).list();
    return records.length;
  }

  get zoneName(): string {
    return this.config.dnsZone;
  }

  get resourceGroup(): string {
    return this.config.resourceGroup;
  }

  async list(): Promise<DnsRecord[]> {
    return this.call("list", async (client, abortSignal) => {
      const records: DnsRecord[] = [];
      for await (const recordSet of client.listByDnsZone(this.config.resourceGroup, this.config.dnsZone, {
        abortSignal,
      })) {
        records.push(decodeRecordSet(recordSet));
      }
      this.logger.debug(`Retrieved ${records.length} records`, { zone: this.config.dnsZone });
      return records;
    });
  }

  /** Create or overwrite the `(type, name)` record set. */
  async upsert(name: string, type: string, ttl: number, values: readonly string[]): Promise<DnsRecord> {
    const recordSet = encodeRecordSet(type, values, ttl, this.codec);
    return this.call("upsert", async (client, abortSignal) => {
      const result = await client.createOrUpdate(
        this.config.resourceGroup,
        this.config.dnsZone,
        name,
        type,
        recordSet,
        { abortSignal },
      );
      this.logger.info(`Upserted ${type} record ${name}`, { zone: this.config.dnsZone, ttl });
      return decodeRecordSet(result);
    });
  }

  /** Delete the `(type, name)` record set. Deleting a missing record succeeds. */
  async delete(name: string, type: string): Promise<void> {
    await this.call("delete", async (client, abortSignal) => {
      await client.delete(this.config.resourceGroup, this.config.dnsZone, name, type, { abortSignal });
      this.logger.info(`Deleted ${type} record ${name}`, { zone: this.config.dnsZone });
    });
  }

  private async getClient(): Promise<RecordSetOperations> {
    if (!this.client) this.client = await this.clientFactory(this.config);
    return this.client;
  }

  private async call<T>(
    operation: string,
    fn: (client: RecordSetOperations, abortSignal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const startedAt = Date.now();
    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      const client = await this.getClient();
      return await fn(client, signal);
    } catch (error) {
      const classified = signal.aborted
        ? new RemoteError(`Azure DNS ${operation} timed out after ${this.timeoutMs}ms`, { cause: error })
        : classifyAzureError(error);
      this.logger.warn(`Azure DNS ${operation} failed: ${classified.message}`, {
        zone: this.config.dnsZone,
        durationMs: Date.now() - startedAt,
      });
      throw classified;
    }
  }
}

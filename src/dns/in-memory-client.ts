/**
 * In-memory DNS zone.
 *
 * Implements the record-set operations against a Map so the console can run
 * without an Azure subscription (`serve --in-memory`) and so the HTTP layer
 * can be exercised in-process. Behaves like the provider where the console
 * depends on it: create-or-update overwrites, delete of a missing record
 * succeeds, an unknown resource group or zone fails with HTTP 404.
 */

import type { RecordSet } from "@azure/arm-dns";
import type { ZoneConfig } from "../types.js";
import type { DnsClientFactory } from "./client.js";
import type { RecordSetOperations, RemoteCallOptions } from "./types.js";

const RESOURCE_TYPE_PREFIX = "Microsoft.Network/dnszones/";

export class ZoneNotFoundError extends Error {
  readonly code: string;
  readonly statusCode = 404;

  constructor(code: "ResourceGroupNotFound" | "ResourceNotFound", message: string) {
    super(message);
    this.name = "RestError";
    this.code = code;
  }
}

export type InMemoryZoneOptions = {
  resourceGroup: string;
  zoneName: string;
  subscriptionId?: string;
};

export class InMemoryDnsZone implements RecordSetOperations {
  readonly resourceGroup: string;
  readonly zoneName: string;
  private readonly subscriptionId: string;
  private recordSets = new Map<string, RecordSet>();

  constructor(options: InMemoryZoneOptions) {
    this.resourceGroup = options.resourceGroup;
    this.zoneName = options.zoneName;
    this.subscriptionId = options.subscriptionId ?? "00000000-0000-0000-0000-000000000000";
  }

  /** A zone seeded with the apex NS record Azure creates for every zone. */
  static withDefaults(options: InMemoryZoneOptions): InMemoryDnsZone {
    const zone = new InMemoryDnsZone(options);
    zone.put("@", "NS", {
      ttl: 172_800,
      nsRecords: [{ nsdname: "ns1-01.azure-dns.com." }, { nsdname: "ns2-01.azure-dns.net." }],
    });
    return zone;
  }

  /** Store a record set directly, bypassing the write path. */
  put(name: string, type: string, parameters: RecordSet): RecordSet {
    const stored: RecordSet = {
      ...parameters,
      id: `/subscriptions/${this.subscriptionId}/resourceGroups/${this.resourceGroup}/providers/${RESOURCE_TYPE_PREFIX}${this.zoneName}/${type}/${name}`,
      name,
      type: `${RESOURCE_TYPE_PREFIX}${type}`,
      fqdn: name === "@" ? `${this.zoneName}.` : `${name}.${this.zoneName}.`,
    };
    this.recordSets.set(this.key(name, type), stored);
    return stored;
  }

  get size(): number {
    return this.recordSets.size;
  }

  async *listByDnsZone(
    resourceGroupName: string,
    zoneName: string,
    options?: RemoteCallOptions,
  ): AsyncIterable<RecordSet> {
    this.assertZone(resourceGroupName, zoneName, options);
    for (const recordSet of [...this.recordSets.values()]) {
      yield { ...recordSet };
    }
  }

  async createOrUpdate(
    resourceGroupName: string,
    zoneName: string,
    relativeRecordSetName: string,
    recordType: string,
    parameters: RecordSet,
    options?: RemoteCallOptions,
  ): Promise<RecordSet> {
    this.assertZone(resourceGroupName, zoneName, options);
    return { ...this.put(relativeRecordSetName, recordType, parameters) };
  }

  async delete(
    resourceGroupName: string,
    zoneName: string,
    relativeRecordSetName: string,
    recordType: string,
    options?: RemoteCallOptions,
  ): Promise<void> {
    this.assertZone(resourceGroupName, zoneName, options);
    this.recordSets.delete(this.key(relativeRecordSetName, recordType));
  }

  /** Client factory serving this zone for any credentials. */
  factory(): DnsClientFactory {
    return async (_config: Readonly<ZoneConfig>) => this;
  }

  private key(name: string, type: string): string {
    return `${type.toUpperCase()}/${name.toLowerCase()}`;
  }

  private assertZone(resourceGroupName: string, zoneName: string, options?: RemoteCallOptions): void {
    options?.abortSignal?.throwIfAborted();
    if (resourceGroupName.toLowerCase() !== this.resourceGroup.toLowerCase()) {
      throw new ZoneNotFoundError(
        "ResourceGroupNotFound",
        `Resource group '${resourceGroupName}' could not be found.`,
      );
    }
    if (zoneName.toLowerCase() !== this.zoneName.toLowerCase()) {
      throw new ZoneNotFoundError(
        "ResourceNotFound",
        `The Resource 'Microsoft.Network/dnszones/${zoneName}' under resource group '${resourceGroupName}' was not found.`,
      );
    }
  }
}

/**
 * One in-memory zone per (resource group, zone) pair, created on first use.
 * Lets `serve --in-memory` accept whatever configuration is saved later.
 */
export class InMemoryDnsBackend {
  private zones = new Map<string, InMemoryDnsZone>();

  zone(resourceGroup: string, zoneName: string): InMemoryDnsZone {
    const key = `${resourceGroup.toLowerCase()}/${zoneName.toLowerCase()}`;
    let zone = this.zones.get(key);
    if (!zone) {
      zone = InMemoryDnsZone.withDefaults({ resourceGroup, zoneName });
      this.zones.set(key, zone);
    }
    return zone;
  }

  factory(): DnsClientFactory {
    return async (config: Readonly<ZoneConfig>) => this.zone(config.resourceGroup, config.dnsZone);
  }
}

/**
 * Azure DNS: Type Definitions
 */

import type { RecordSet } from "@azure/arm-dns";

export const WRITABLE_RECORD_TYPES = ["A", "AAAA", "CNAME", "MX", "TXT"] as const;
export const READ_ONLY_RECORD_TYPES = ["NS", "PTR", "SRV"] as const;

export type WritableRecordType = (typeof WRITABLE_RECORD_TYPES)[number];
export type ReadOnlyRecordType = (typeof READ_ONLY_RECORD_TYPES)[number];
export type RecordType = WritableRecordType | ReadOnlyRecordType;

export const DEFAULT_TTL = 3600;

/**
 * Provider-neutral record. `type` is a string because listings also return
 * kinds the console does not model (SOA, CAA).
 */
export type DnsRecord = {
  name: string;
  type: string;
  ttl: number | null;
  fqdn: string | null;
  values: string[];
};

export type MxValue = { preference: number; exchange: string };

/** Validated input for a write, one variant per writable record type. */
export type WritableRecordInput =
  | { type: "A"; ipv4Addresses: string[] }
  | { type: "AAAA"; ipv6Addresses: string[] }
  | { type: "CNAME"; cname: string }
  | { type: "MX"; exchanges: MxValue[] }
  | { type: "TXT"; texts: string[] };

export type CodecOptions = {
  /** Reject MX values without a preference instead of dropping them. */
  strictMx?: boolean;
};

export type RemoteCallOptions = {
  abortSignal?: AbortSignal;
};

/**
 * The record-set operations the console uses. `DnsManagementClient.recordSets`
 * satisfies it, as does the in-memory zone.
 */
export interface RecordSetOperations {
  listByDnsZone(
    resourceGroupName: string,
    zoneName: string,
    options?: RemoteCallOptions,
  ): AsyncIterable<RecordSet>;

  createOrUpdate(
    resourceGroupName: string,
    zoneName: string,
    relativeRecordSetName: string,
    recordType: string,
    parameters: RecordSet,
    options?: RemoteCallOptions,
  ): Promise<RecordSet>;

  delete(
    resourceGroupName: string,
    zoneName: string,
    relativeRecordSetName: string,
    recordType: string,
    options?: RemoteCallOptions,
  ): Promise<void>;
}

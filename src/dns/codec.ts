/**
 * Record Codec
 *
 * Translates between the console's generic `{ type, values[] }` form and the
 * typed record arrays of an Azure `RecordSet`. Pure functions only.
 */

import type { RecordSet } from "@azure/arm-dns";
import { UnsupportedTypeError, ValidationError } from "../errors.js";
import {
  READ_ONLY_RECORD_TYPES,
  WRITABLE_RECORD_TYPES,
  type CodecOptions,
  type DnsRecord,
  type MxValue,
  type ReadOnlyRecordType,
  type RecordType,
  type WritableRecordInput,
  type WritableRecordType,
} from "./types.js";

// =============================================================================
// Type Guards
// =============================================================================

export function isWritableRecordType(type: string): type is WritableRecordType {
  return WRITABLE_RECORD_TYPES.some((t) => t === type);
}

export function isReadOnlyRecordType(type: string): type is ReadOnlyRecordType {
  return READ_ONLY_RECORD_TYPES.some((t) => t === type);
}

export function isReadableRecordType(type: string): type is RecordType {
  return isWritableRecordType(type) || isReadOnlyRecordType(type);
}

/** `Microsoft.Network/dnszones/MX` → `MX`. */
export function recordTypeFromResourceType(resourceType: string | undefined): string {
  return resourceType?.split("/").pop() ?? "";
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Parse an MX value of the form `<preference> <exchange>`. Returns null when
 * the value has no space to split on.
 */
export function parseMxValue(value: string): MxValue | null {
  const space = value.indexOf(" ");
  if (space === -1) return null;

  const preferenceText = value.slice(0, space).trim();
  if (!/^[+-]?\d+$/.test(preferenceText)) {
    throw new ValidationError(`Invalid MX preference in "${value}": expected an integer`);
  }
  return { preference: Number.parseInt(preferenceText, 10), exchange: value.slice(space + 1) };
}

/**
 * Validate a write request and narrow it to one record variant.
 *
 * MX values without a space are dropped unless `strictMx` is set.
 */
export function parseRecordInput(
  type: string,
  values: readonly string[],
  options: CodecOptions = {},
): WritableRecordInput {
  if (!isWritableRecordType(type)) throw new UnsupportedTypeError(type);

  switch (type) {
    case "A":
      return { type, ipv4Addresses: [...values] };
    case "AAAA":
      return { type, ipv6Addresses: [...values] };
    case "CNAME": {
      if (values.length > 1) throw new ValidationError("CNAME records can only have one value");
      const [cname] = values;
      if (cname === undefined) throw new ValidationError("CNAME records require a value");
      return { type, cname };
    }
    case "MX": {
      const exchanges: MxValue[] = [];
      for (const value of values) {
        const parsed = parseMxValue(value);
        if (parsed) {
          exchanges.push(parsed);
        } else if (options.strictMx) {
          throw new ValidationError(`Invalid MX value "${value}": expected "<preference> <exchange>"`);
        }
      }
      return { type, exchanges };
    }
    case "TXT":
      return { type, texts: [...values] };
  }
}

/** Build the Azure record set for a validated input. */
export function toRecordSet(input: WritableRecordInput, ttl: number): RecordSet {
  switch (input.type) {
    case "A":
      return { ttl, aRecords: input.ipv4Addresses.map((ipv4Address) => ({ ipv4Address })) };
    case "AAAA":
      return { ttl, aaaaRecords: input.ipv6Addresses.map((ipv6Address) => ({ ipv6Address })) };
    case "CNAME":
      return { ttl, cnameRecord: { cname: input.cname } };
    case "MX":
      return {
        ttl,
        mxRecords: input.exchanges.map(({ preference, exchange }) => ({ preference, exchange })),
      };
    case "TXT":
      return { ttl, txtRecords: input.texts.map((text) => ({ value: [text] })) };
  }
}

export function encodeRecordSet(
  type: string,
  values: readonly string[],
  ttl: number,
  options: CodecOptions = {},
): RecordSet {
  return toRecordSet(parseRecordInput(type, values, options), ttl);
}

// =============================================================================
// Decoding
// =============================================================================

type ValueExtractor = (recordSet: RecordSet) => string[] | undefined;

function nonEmpty<T>(items: T[] | undefined): T[] | undefined {
  return items && items.length > 0 ? items : undefined;
}

/** Checked in order; the first populated field supplies the values. */
const VALUE_EXTRACTORS: ValueExtractor[] = [
  (rs) => nonEmpty(rs.aRecords)?.map((r) => r.ipv4Address ?? ""),
  (rs) => nonEmpty(rs.aaaaRecords)?.map((r) => r.ipv6Address ?? ""),
  (rs) => (rs.cnameRecord ? [rs.cnameRecord.cname ?? ""] : undefined),
  (rs) => nonEmpty(rs.mxRecords)?.map((r) => `${r.preference ?? 0} ${r.exchange ?? ""}`),
  (rs) => nonEmpty(rs.txtRecords)?.map((r) => (r.value ?? []).join(" ")),
  (rs) => nonEmpty(rs.nsRecords)?.map((r) => r.nsdname ?? ""),
  (rs) => nonEmpty(rs.ptrRecords)?.map((r) => r.ptrdname ?? ""),
  (rs) =>
    nonEmpty(rs.srvRecords)?.map(
      (r) => `${r.priority ?? 0} ${r.weight ?? 0} ${r.port ?? 0} ${r.target ?? ""}`,
    ),
];

export function decodeValues(recordSet: RecordSet): string[] {
  for (const extract of VALUE_EXTRACTORS) {
    const values = extract(recordSet);
    if (values) return values;
  }
  return [];
}

export function decodeRecordSet(recordSet: RecordSet): DnsRecord {
  return {
    name: recordSet.name ?? "",
    type: recordTypeFromResourceType(recordSet.type),
    ttl: recordSet.ttl ?? null,
    fqdn: recordSet.fqdn ?? null,
    values: decodeValues(recordSet),
  };
}

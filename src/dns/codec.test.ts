/**
 * Record Codec: Unit Tests
 */

import { describe, it, expect } from "vitest";
import type { RecordSet } from "@azure/arm-dns";
import {
  decodeRecordSet,
  decodeValues,
  encodeRecordSet,
  isReadableRecordType,
  isWritableRecordType,
  parseMxValue,
  parseRecordInput,
  recordTypeFromResourceType,
} from "./codec.js";
import { UnsupportedTypeError, ValidationError } from "../errors.js";

describe("record codec", () => {
  describe("type guards", () => {
    it("accepts the five writable types", () => {
      for (const type of ["A", "AAAA", "CNAME", "MX", "TXT"]) {
        expect(isWritableRecordType(type)).toBe(true);
      }
    });

    it("treats NS, PTR and SRV as readable only", () => {
      for (const type of ["NS", "PTR", "SRV"]) {
        expect(isWritableRecordType(type)).toBe(false);
        expect(isReadableRecordType(type)).toBe(true);
      }
    });

    it("is case-sensitive", () => {
      expect(isWritableRecordType("a")).toBe(false);
    });
  });

  describe("recordTypeFromResourceType", () => {
    it("takes the last path segment", () => {
      expect(recordTypeFromResourceType("Microsoft.Network/dnszones/MX")).toBe("MX");
    });

    it("returns the input when there is no slash", () => {
      expect(recordTypeFromResourceType("TXT")).toBe("TXT");
    });

    it("returns an empty string for a missing type", () => {
      expect(recordTypeFromResourceType(undefined)).toBe("");
    });
  });

  describe("encoding", () => {
    it("encodes A records", () => {
      expect(encodeRecordSet("A", ["1.2.3.4", "5.6.7.8"], 300)).toEqual({
        ttl: 300,
        aRecords: [{ ipv4Address: "1.2.3.4" }, { ipv4Address: "5.6.7.8" }],
      });
    });

    it("encodes AAAA records", () => {
      expect(encodeRecordSet("AAAA", ["2001:db8::1"], 3600)).toEqual({
        ttl: 3600,
        aaaaRecords: [{ ipv6Address: "2001:db8::1" }],
      });
    });

    it("encodes a single CNAME", () => {
      expect(encodeRecordSet("CNAME", ["target.example.net"], 60)).toEqual({
        ttl: 60,
        cnameRecord: { cname: "target.example.net" },
      });
    });

    it("rejects a CNAME with two values", () => {
      expect(() => encodeRecordSet("CNAME", ["a.example.com", "b.example.com"], 60)).toThrow(
        "CNAME records can only have one value",
      );
    });

    it("rejects a CNAME with no value", () => {
      expect(() => encodeRecordSet("CNAME", [], 60)).toThrow("CNAME records require a value");
    });

    it("splits MX values into preference and exchange", () => {
      expect(encodeRecordSet("MX", ["10 mail.example.com", "20 backup.example.com"], 3600)).toEqual({
        ttl: 3600,
        mxRecords: [
          { preference: 10, exchange: "mail.example.com" },
          { preference: 20, exchange: "backup.example.com" },
        ],
      });
    });

    it("drops MX values without a space by default", () => {
      expect(encodeRecordSet("MX", ["mail.example.com", "5 mx.example.com"], 3600)).toEqual({
        ttl: 3600,
        mxRecords: [{ preference: 5, exchange: "mx.example.com" }],
      });
    });

    it("rejects MX values without a space when strictMx is set", () => {
      expect(() => encodeRecordSet("MX", ["mail.example.com"], 3600, { strictMx: true })).toThrow(
        ValidationError,
      );
    });

    it("rejects a non-integer MX preference", () => {
      expect(() => encodeRecordSet("MX", ["ten mail.example.com"], 3600)).toThrow(
        'Invalid MX preference in "ten mail.example.com": expected an integer',
      );
    });

    it("wraps each TXT value in its own entry", () => {
      expect(encodeRecordSet("TXT", ["v=spf1 -all", "hello"], 300)).toEqual({
        ttl: 300,
        txtRecords: [{ value: ["v=spf1 -all"] }, { value: ["hello"] }],
      });
    });

    it.each(["NS", "PTR", "SRV", "SOA", "a"])("rejects %s as unsupported", (type) => {
      const fn = () => encodeRecordSet(type, ["x"], 300);
      expect(fn).toThrow(UnsupportedTypeError);
      expect(fn).toThrow(`Unsupported record type: ${type}`);
    });

    it("narrows input to the matching variant", () => {
      expect(parseRecordInput("TXT", ["x"])).toEqual({ type: "TXT", texts: ["x"] });
    });
  });

  describe("parseMxValue", () => {
    it("returns null without a space", () => {
      expect(parseMxValue("mail.example.com")).toBeNull();
    });

    it("keeps everything after the first space as the exchange", () => {
      expect(parseMxValue("10 mail.example.com")).toEqual({ preference: 10, exchange: "mail.example.com" });
    });
  });

  describe("decoding", () => {
    it("decodes a listed A record set", () => {
      const recordSet: RecordSet = {
        name: "www",
        type: "Microsoft.Network/dnszones/A",
        ttl: 300,
        fqdn: "www.example.com.",
        aRecords: [{ ipv4Address: "1.2.3.4" }],
      };
      expect(decodeRecordSet(recordSet)).toEqual({
        name: "www",
        type: "A",
        ttl: 300,
        fqdn: "www.example.com.",
        values: ["1.2.3.4"],
      });
    });

    it("renders MX as '<preference> <exchange>'", () => {
      expect(decodeValues({ mxRecords: [{ preference: 10, exchange: "mail.example.com" }] })).toEqual([
        "10 mail.example.com",
      ]);
    });

    it("joins multi-string TXT entries with a space", () => {
      expect(decodeValues({ txtRecords: [{ value: ["part one", "part two"] }] })).toEqual([
        "part one part two",
      ]);
    });

    it("decodes NS, PTR and SRV for listing", () => {
      expect(decodeValues({ nsRecords: [{ nsdname: "ns1.example.net." }] })).toEqual(["ns1.example.net."]);
      expect(decodeValues({ ptrRecords: [{ ptrdname: "host.example.com." }] })).toEqual(["host.example.com."]);
      expect(
        decodeValues({ srvRecords: [{ priority: 1, weight: 5, port: 443, target: "svc.example.com." }] }),
      ).toEqual(["1 5 443 svc.example.com."]);
    });

    it("uses the first populated field in A, AAAA, CNAME, MX, TXT order", () => {
      expect(
        decodeValues({
          txtRecords: [{ value: ["ignored"] }],
          aaaaRecords: [{ ipv6Address: "2001:db8::2" }],
        }),
      ).toEqual(["2001:db8::2"]);
    });

    it("skips empty arrays", () => {
      expect(decodeValues({ aRecords: [], cnameRecord: { cname: "x.example.com" } })).toEqual(["x.example.com"]);
    });

    it("returns no values for unmodelled types and nulls for missing metadata", () => {
      expect(decodeRecordSet({ name: "@", type: "Microsoft.Network/dnszones/SOA" })).toEqual({
        name: "@",
        type: "SOA",
        ttl: null,
        fqdn: null,
        values: [],
      });
    });

    it("decodes what it encodes", () => {
      expect(decodeValues(encodeRecordSet("A", ["10.0.0.2", "10.0.0.1"], 60))).toEqual(["10.0.0.2", "10.0.0.1"]);
      expect(decodeValues(encodeRecordSet("AAAA", ["2001:db8::1"], 60))).toEqual(["2001:db8::1"]);
      expect(decodeValues(encodeRecordSet("TXT", ["b", "a"], 60))).toEqual(["b", "a"]);
      expect(decodeValues(encodeRecordSet("CNAME", ["target.example.net"], 60))).toEqual(["target.example.net"]);
      expect(decodeValues(encodeRecordSet("MX", ["10 mail.example.com"], 600))).toEqual(["10 mail.example.com"]);
    });

    it("encodes an MX set with only malformed values as empty", () => {
      expect(encodeRecordSet("MX", ["badtoken"], 3600)).toEqual({ ttl: 3600, mxRecords: [] });
    });
  });
});

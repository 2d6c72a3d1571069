/**
 * Azure DNS client factory: Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ClientSecretCredential } from "@azure/identity";
import { DnsManagementClient } from "@azure/arm-dns";
import { createAzureDnsClient } from "./client.js";

const { mockRecordSets } = vi.hoisted(() => ({
  mockRecordSets: {
    listByDnsZone: vi.fn(),
    createOrUpdate: vi.fn(),
    delete: vi.fn(),
  },
}));

vi.mock("@azure/identity", () => ({
  ClientSecretCredential: vi.fn().mockImplementation(function () {
    return { getToken: vi.fn() };
  }),
}));

vi.mock("@azure/arm-dns", () => ({
  DnsManagementClient: vi.fn().mockImplementation(function () {
    return { recordSets: mockRecordSets };
  }),
}));

const CONFIG = {
  tenantId: "tenant-1",
  clientId: "client-1",
  clientSecret: "test-secret",
  subscriptionId: "sub-1",
  resourceGroup: "rg-dns",
  dnsZone: "example.com",
};

describe("createAzureDnsClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("builds a service-principal credential from the configuration", async () => {
    await createAzureDnsClient(CONFIG);
    expect(ClientSecretCredential).toHaveBeenCalledWith("tenant-1", "client-1", "test-secret");
  });

  it("binds the management client to the subscription", async () => {
    await createAzureDnsClient(CONFIG);
    expect(DnsManagementClient).toHaveBeenCalledWith(expect.anything(), "sub-1");
  });

  it("returns the record-set operations", async () => {
    expect(await createAzureDnsClient(CONFIG)).toBe(mockRecordSets);
  });

  it("creates a fresh client for every call", async () => {
    await createAzureDnsClient(CONFIG);
    await createAzureDnsClient({ ...CONFIG, clientSecret: "other-secret" });

    expect(DnsManagementClient).toHaveBeenCalledTimes(2);
    expect(ClientSecretCredential).toHaveBeenLastCalledWith("tenant-1", "client-1", "other-secret");
  });
});

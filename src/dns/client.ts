/**
 * Azure DNS client factory.
 *
 * Builds a service-principal credential and a `DnsManagementClient` for one
 * configuration. Nothing is cached: every call returns a client bound to
 * the credentials it was given.
 */

import type { ZoneConfig } from "../types.js";
import type { RecordSetOperations } from "./types.js";

export type DnsClientFactory = (config: Readonly<ZoneConfig>) => Promise<RecordSetOperations>;

export const createAzureDnsClient: DnsClientFactory = async (config) => {
  const [{ ClientSecretCredential }, { DnsManagementClient }] = await Promise.all([
    import("@azure/identity"),
    import("@azure/arm-dns"),
  ]);

  const credential = new ClientSecretCredential(config.tenantId, config.clientId, config.clientSecret);
  const client = new DnsManagementClient(credential, config.subscriptionId);
  return client.recordSets;
};

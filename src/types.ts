/**
 * Azure DNS Console: Shared Types
 *
 * Core type definitions used across the config store, the DNS modules
 * and the HTTP API.
 */

// =============================================================================
// Zone Configuration
// =============================================================================

/**
 * Service-principal credentials plus the coordinates of the managed zone.
 * Complete only when every field is a non-empty string.
 */
export type ZoneConfig = {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  subscriptionId: string;
  resourceGroup: string;
  dnsZone: string;
};

export type ZoneConfigField = keyof ZoneConfig;

export type ConfigLifecycleState = "unconfigured" | "configured";

/** Env-file key for each configuration field. */
export const ZONE_CONFIG_ENV_KEYS = {
  tenantId: "AZURE_TENANT_ID",
  clientId: "AZURE_CLIENT_ID",
  clientSecret: "AZURE_CLIENT_SECRET",
  subscriptionId: "AZURE_SUBSCRIPTION_ID",
  resourceGroup: "AZURE_RESOURCE_GROUP",
  dnsZone: "AZURE_DNS_ZONE",
} as const satisfies Record<ZoneConfigField, string>;

export const ZONE_CONFIG_FIELDS: readonly ZoneConfigField[] = [
  "tenantId",
  "clientId",
  "clientSecret",
  "subscriptionId",
  "resourceGroup",
  "dnsZone",
];

export function emptyZoneConfig(): ZoneConfig {
  return {
    tenantId: "",
    clientId: "",
    clientSecret: "",
    subscriptionId: "",
    resourceGroup: "",
    dnsZone: "",
  };
}

/** Fields that are missing or blank. */
export function missingZoneConfigFields(config: Partial<ZoneConfig>): ZoneConfigField[] {
  return ZONE_CONFIG_FIELDS.filter((field) => !config[field]?.trim());
}

export function isZoneConfigComplete(config: Partial<ZoneConfig>): config is ZoneConfig {
  return missingZoneConfigFields(config).length === 0;
}

/**
 * Azure DNS Console CLI
 *
 * `dns-console serve`            start the HTTP API
 * `dns-console test-connection`  check the stored credentials against Azure
 * `dns-console records list`     print the zone's records
 */

import { Command } from "commander";
import { createApp, serve, type AppContext, type CreateAppOptions } from "../app.js";
import { ZoneGateway } from "../dns/gateway.js";
import type { DnsRecord } from "../dns/types.js";
import { formatErrorDetails, formatErrorMessage } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type CliDeps = {
  /** Passed to `createApp`; tests inject env, client factory and transports. */
  app?: CreateAppOptions;
  print?: (line: string) => void;
  /** Called with the exit code a failed command should end with. */
  setExitCode?: (code: number) => void;
  /** Keeps `serve` running until a signal arrives; tests replace it. */
  waitForShutdown?: () => Promise<void>;
};

type ServeFlags = {
  host?: string;
  port?: string;
  dataDir?: string;
  envFile?: string;
  inMemory?: boolean;
};

// =============================================================================
// Helpers
// =============================================================================

/** Simple table formatter for terminal output. */
function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) =>
    cells.map((c, i) => ` ${(c ?? "").padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

function recordRows(records: DnsRecord[]): string[][] {
  return records.map((r) => [r.name, r.type, r.ttl === null ? "-" : String(r.ttl), r.values.join(", ")]);
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      process.removeListener("SIGINT", done);
      process.removeListener("SIGTERM", done);
      resolve();
    };
    process.on("SIGINT", done);
    process.on("SIGTERM", done);
  });
}

// =============================================================================
// Program
// =============================================================================

export function buildProgram(deps: CliDeps = {}): Command {
  const print = deps.print ?? ((line: string) => console.log(line));
  const setExitCode = deps.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });

  const program = new Command()
    .name("dns-console")
    .description("Management console and REST API for a single Azure DNS zone");

  const load = (options: CreateAppOptions = {}): Promise<AppContext> =>
    createApp({ ...deps.app, ...options, overrides: { ...deps.app?.overrides, ...options.overrides } });

  // ---------------------------------------------------------------------------
  // serve
  // ---------------------------------------------------------------------------
  program
    .command("serve")
    .description("Start the HTTP API")
    .option("--host <host>", "Interface to bind")
    .option("-p, --port <port>", "Port to listen on")
    .option("--data-dir <dir>", "Directory for the .env and api-token files")
    .option("--env-file <path>", "Zone configuration file")
    .option("--in-memory", "Serve records from an in-process zone instead of Azure")
    .action(async (flags: ServeFlags) => {
      const app = await load({
        inMemory: flags.inMemory ?? deps.app?.inMemory,
        overrides: { host: flags.host, port: flags.port, dataDir: flags.dataDir, envFile: flags.envFile },
      });
      const handle = await serve(app);
      print(`Azure DNS Console listening on ${handle.url}`);
      if (!app.store.isComplete()) {
        print("Zone configuration is incomplete; POST /api/config to configure it.");
      }

      await (deps.waitForShutdown ?? waitForSignal)();
      await handle.close();
    });

  // ---------------------------------------------------------------------------
  // test-connection
  // ---------------------------------------------------------------------------
  program
    .command("test-connection")
    .description("List the configured zone once to check the stored credentials")
    .action(async () => {
      const app = await load();
      const config = app.store.get();

      print("Testing Azure DNS connection...");
      print(`Tenant ID:       ${config.tenantId || "(unset)"}`);
      print(`Client ID:       ${config.clientId || "(unset)"}`);
      print(`Subscription ID: ${config.subscriptionId || "(unset)"}`);
      print(`Resource Group:  ${config.resourceGroup || "(unset)"}`);
      print(`DNS Zone:        ${config.dnsZone || "(unset)"}`);
      print("-".repeat(50));

      try {
        const gateway = ZoneGateway.fromStore(app.store, {
          clientFactory: app.clientFactory,
          requestTimeoutMs: app.settings.requestTimeoutMs,
          logger: app.logger.child("gateway"),
        });
        const records = await gateway.list();
        print(`✓ Retrieved ${records.length} records from zone ${gateway.zoneName}`);

        if (records.length > 0) {
          print("");
          print(`First ${Math.min(records.length, 5)} records:`);
          for (const record of records.slice(0, 5)) {
            print(`  - ${record.name} (${record.type}) TTL: ${record.ttl ?? "-"}`);
          }
        }
        print("");
        print("✓ Connection test PASSED");
      } catch (err) {
        print("✗ Connection test FAILED");
        print(`Error: ${formatErrorMessage(err)}`);
        app.logger.debug("Connection test failure details", { details: formatErrorDetails(err) });
        setExitCode(1);
      }
    });

  // ---------------------------------------------------------------------------
  // records list
  // ---------------------------------------------------------------------------
  const records = program.command("records").description("Zone record commands");

  records
    .command("list")
    .description("Print every record in the configured zone")
    .option("--json", "Print JSON instead of a table")
    .action(async (flags: { json?: boolean }) => {
      const app = await load();
      try {
        const gateway = ZoneGateway.fromStore(app.store, {
          clientFactory: app.clientFactory,
          requestTimeoutMs: app.settings.requestTimeoutMs,
          logger: app.logger.child("gateway"),
        });
        const list = await gateway.list();
        if (flags.json) {
          print(JSON.stringify({ records: list, zone: gateway.zoneName }, null, 2));
          return;
        }
        print(`Zone ${gateway.zoneName}: ${list.length} records`);
        print(table(["Name", "Type", "TTL", "Values"], recordRows(list)));
      } catch (err) {
        print(`Error: ${formatErrorMessage(err)}`);
        setExitCode(1);
      }
    });

  return program;
}

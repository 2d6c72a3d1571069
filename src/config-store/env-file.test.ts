import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmod, mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  applyEnvUpdates,
  formatEnvValue,
  isStorableEnvValue,
  readEnvFile,
  writeEnvFile,
  writeFileAtomic,
} from "./env-file.js";
import { ValidationError } from "../errors.js";

describe("formatEnvValue", () => {
  it("single-quotes plain values", () => {
    expect(formatEnvValue("abc")).toBe("'abc'");
  });

  it("double-quotes values containing a single quote", () => {
    expect(formatEnvValue("it's")).toBe(`"it's"`);
  });

  it("falls back to backticks when both quote kinds appear", () => {
    expect(formatEnvValue(`it's "x"`)).toBe("`it's \"x\"`");
  });

  it("avoids double quotes around a backslash escape", () => {
    expect(formatEnvValue("it's a\\nb")).toBe("`it's a\\nb`");
  });

  it("rejects values with a line break", () => {
    expect(() => formatEnvValue("line1\nline2")).toThrow(ValidationError);
    expect(isStorableEnvValue("line1\rline2")).toBe(false);
  });

  it("rejects values containing every quote character", () => {
    expect(() => formatEnvValue("a'b\"c`d")).toThrow(ValidationError);
    expect(isStorableEnvValue("a'b\"c`d")).toBe(false);
  });
});

describe("applyEnvUpdates", () => {
  it("replaces existing keys in place and keeps other lines", () => {
    const content = "# zone settings\nAZURE_DNS_ZONE=old.com\nOTHER=1\n";
    expect(applyEnvUpdates(content, { AZURE_DNS_ZONE: "example.com" })).toBe(
      "# zone settings\nAZURE_DNS_ZONE='example.com'\nOTHER=1\n",
    );
  });

  it("appends keys the file lacks", () => {
    expect(applyEnvUpdates("OTHER=1\n", { AZURE_TENANT_ID: "t" })).toBe("OTHER=1\nAZURE_TENANT_ID='t'\n");
  });

  it("rewrites exported keys", () => {
    expect(applyEnvUpdates("export AZURE_CLIENT_ID=a", { AZURE_CLIENT_ID: "b" })).toBe("AZURE_CLIENT_ID='b'\n");
  });

  it("drops later lines for a key it rewrites", () => {
    expect(applyEnvUpdates("AZURE_DNS_ZONE=a\nX=1\nAZURE_DNS_ZONE=b\n", { AZURE_DNS_ZONE: "new" })).toBe(
      "AZURE_DNS_ZONE='new'\nX=1\n",
    );
  });

  it("keeps duplicate lines of keys it does not touch", () => {
    expect(applyEnvUpdates("X=1\nX=2\n", { A: "a" })).toBe("X=1\nX=2\nA='a'\n");
  });

  it("starts an empty file", () => {
    expect(applyEnvUpdates("", { A: "1", B: "" })).toBe("A='1'\nB=''\n");
  });
});

describe("env file I/O", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "dns-console-env-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a missing file as empty", async () => {
    expect(await readEnvFile(join(dir, "missing.env"))).toEqual({});
  });

  it("round-trips values with quotes, spaces and hashes", async () => {
    const path = join(dir, ".env");
    const updates = {
      AZURE_CLIENT_SECRET: "s3cr#t value",
      AZURE_TENANT_ID: "it's",
      AZURE_DNS_ZONE: "example.com",
    };
    await writeEnvFile(path, updates);
    expect(await readEnvFile(path)).toEqual(updates);
  });

  it("preserves unrelated entries", async () => {
    const path = join(dir, ".env");
    await writeFile(path, "LOG_LEVEL=debug\nAZURE_DNS_ZONE=old.com\n");
    await writeEnvFile(path, { AZURE_DNS_ZONE: "example.com" });

    expect(await readFile(path, "utf8")).toBe("LOG_LEVEL=debug\nAZURE_DNS_ZONE='example.com'\n");
  });

  it("creates parent directories and leaves no temp files behind", async () => {
    const path = join(dir, "nested", "config.env");
    await writeEnvFile(path, { A: "1" });

    expect(await readdir(join(dir, "nested"))).toEqual(["config.env"]);
  });

  it("reads back the new value when the key appeared twice", async () => {
    const path = join(dir, ".env");
    await writeFile(path, "AZURE_DNS_ZONE=a.com\nAZURE_DNS_ZONE=b.com\n");
    await writeEnvFile(path, { AZURE_DNS_ZONE: "example.com" });

    expect(await readEnvFile(path)).toEqual({ AZURE_DNS_ZONE: "example.com" });
  });

  it("round-trips a value that needs backticks", async () => {
    const path = join(dir, ".env");
    const updates = { AZURE_CLIENT_SECRET: `it's "quoted" a\\nb` };
    await writeEnvFile(path, updates);
    expect(await readEnvFile(path)).toEqual(updates);
  });

  it("leaves the file untouched when a value cannot be stored", async () => {
    const path = join(dir, ".env");
    await writeFile(path, "AZURE_DNS_ZONE=old.com\n");

    await expect(writeEnvFile(path, { AZURE_DNS_ZONE: "a\nINJECTED=1" })).rejects.toBeInstanceOf(ValidationError);
    expect(await readFile(path, "utf8")).toBe("AZURE_DNS_ZONE=old.com\n");
  });

  it("resets the mode of an existing file on replace", async () => {
    const path = join(dir, "token");
    await writeFile(path, "old\n");
    await chmod(path, 0o644);

    await writeFileAtomic(path, "new\n");
    expect((await stat(path)).mode & 0o777).toBe(0o600);
    expect(await readFile(path, "utf8")).toBe("new\n");
  });

  it("writes the file readable by the owner only", async () => {
    const path = join(dir, ".env");
    await writeEnvFile(path, { A: "1" });
    expect((await stat(path)).mode & 0o777).toBe(0o600);
  });
});

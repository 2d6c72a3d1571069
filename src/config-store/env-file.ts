/**
 * Flat KEY=value file access.
 *
 * Reads go through dotenv's parser. Writes update the named keys in place,
 * append keys the file lacks and leave every other line untouched; the new
 * content lands via a temp file and a rename.
 */

import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parse } from "dotenv";
import { ValidationError } from "../errors.js";

const KEY_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readIfExists(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return "";
    throw error;
  }
}

/** Parse an env file; a missing file reads as empty. */
export async function readEnvFile(path: string): Promise<Record<string, string>> {
  return parse(await readIfExists(path));
}

/**
 * Quote a value so dotenv reads it back verbatim, or return null when no
 * quoting does. Line breaks never survive the line-based rewrite, and dotenv
 * expands `\n` and `\r` escapes inside double quotes.
 */
function quoteEnvValue(value: string): string | null {
  if (/[\r\n]/.test(value)) return null;
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"') && !/\\[nr]/.test(value)) return `"${value}"`;
  if (!value.includes("`")) return `\`${value}\``;
  return null;
}

/** Whether `value` can be written to an env file and read back unchanged. */
export function isStorableEnvValue(value: string): boolean {
  return quoteEnvValue(value) !== null;
}

/** Quoted form of `value`; throws ValidationError when it cannot round-trip. */
export function formatEnvValue(value: string): string {
  const quoted = quoteEnvValue(value);
  if (quoted === null) {
    throw new ValidationError("Value cannot be stored in an env file: it has a line break or every quote character");
  }
  return quoted;
}

/**
 * Rewrite `content` so each key in `updates` carries its new value. The first
 * line for a key is rewritten in place and later lines for it are dropped.
 */
export function applyEnvUpdates(content: string, updates: Record<string, string>): string {
  const pending = new Map(Object.entries(updates));
  const updated = new Set(pending.keys());
  const lines = content === "" ? [] : content.replace(/\r?\n$/, "").split(/\r?\n/);

  const rewritten: string[] = [];
  for (const line of lines) {
    const key = KEY_LINE.exec(line)?.[1];
    if (key === undefined || !updated.has(key)) {
      rewritten.push(line);
      continue;
    }
    const value = pending.get(key);
    if (value === undefined) continue;
    pending.delete(key);
    rewritten.push(`${key}=${formatEnvValue(value)}`);
  }

  for (const [key, value] of pending) {
    rewritten.push(`${key}=${formatEnvValue(value)}`);
  }

  return `${rewritten.join("\n")}\n`;
}

/**
 * Replace the file at `path` with `content`, owner-only. The content goes to
 * a temp file first, so the mode holds even when the file already existed.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await writeFile(tmpPath, content, { mode: 0o600 });
    await rename(tmpPath, path);
  } catch (error) {
    await unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}

/** Set `updates` in the env file at `path`, creating it if needed. */
export async function writeEnvFile(path: string, updates: Record<string, string>): Promise<void> {
  const next = applyEnvUpdates(await readIfExists(path), updates);
  await writeFileAtomic(path, next);
}

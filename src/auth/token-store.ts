/**
 * API Token Store
 *
 * Guards the HTTP API with a bearer token. The token comes either from the
 * settings (fixed) or from a token file that `regenerate()` rewrites. With
 * no token at all the API is open.
 */

import { randomBytes, timingSafeEqual } from "node:crypto";
import { readFile } from "node:fs/promises";
import type { IncomingMessage } from "node:http";
import { writeFileAtomic } from "../config-store/env-file.js";
import type { Logger } from "../logging/index.js";
import { createSilentLogger } from "../logging/index.js";

const TOKEN_BYTES = 32;

export type TokenSource = "settings" | "file" | "none";

export type TokenStoreOptions = {
  /** File a regenerated token is written to. */
  tokenFile: string;
  /** Fixed token from the settings; takes precedence over the file. */
  fixedToken?: string;
  logger?: Logger;
};

function safeEqual(a: string, b: string): boolean {
  const expected = Buffer.from(a, "utf-8");
  const received = Buffer.from(b, "utf-8");
  if (expected.length !== received.length) return false;
  return timingSafeEqual(expected, received);
}

/** Token from `Authorization: Bearer …` or `X-API-Key`. */
export function extractRequestToken(req: Pick<IncomingMessage, "headers">): string | undefined {
  const apiKey = req.headers["x-api-key"];
  if (typeof apiKey === "string" && apiKey.length > 0) return apiKey;

  const authorization = req.headers.authorization;
  if (authorization?.startsWith("Bearer ")) {
    const token = authorization.slice("Bearer ".length).trim();
    return token.length > 0 ? token : undefined;
  }
  return undefined;
}

export class TokenStore {
  private token: string | null;
  private source: TokenSource;
  private readonly tokenFile: string;
  private readonly logger: Logger;

  private constructor(options: TokenStoreOptions, token: string | null, source: TokenSource) {
    this.tokenFile = options.tokenFile;
    this.logger = options.logger ?? createSilentLogger();
    this.token = token;
    this.source = source;
    if (token) this.logger.addSecret(token);
  }

  static async load(options: TokenStoreOptions): Promise<TokenStore> {
    if (options.fixedToken) {
      return new TokenStore(options, options.fixedToken, "settings");
    }

    let fileToken = "";
    try {
      fileToken = (await readFile(options.tokenFile, "utf8")).trim();
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) throw error;
    }
    return fileToken
      ? new TokenStore(options, fileToken, "file")
      : new TokenStore(options, null, "none");
  }

  get required(): boolean {
    return this.token !== null;
  }

  get tokenSource(): TokenSource {
    return this.source;
  }

  current(): string | null {
    return this.token;
  }

  verify(candidate: string | undefined): boolean {
    if (this.token === null) return true;
    if (!candidate) return false;
    return safeEqual(this.token, candidate);
  }

  authenticate(req: Pick<IncomingMessage, "headers">): boolean {
    return this.verify(extractRequestToken(req));
  }

  /**
   * Issue a new token and write it to the token file (owner-only).
   * A token fixed in the settings cannot be regenerated.
   */
  async regenerate(): Promise<string> {
    if (this.source === "settings") {
      throw new Error("The API token is fixed by DNS_CONSOLE_API_TOKEN and cannot be regenerated");
    }
    const token = randomBytes(TOKEN_BYTES).toString("hex");
    await writeFileAtomic(this.tokenFile, `${token}\n`);

    this.token = token;
    this.source = "file";
    this.logger.addSecret(token);
    this.logger.info("API token regenerated", { path: this.tokenFile });
    return token;
  }
}

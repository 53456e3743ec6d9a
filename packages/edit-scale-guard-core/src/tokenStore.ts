import path from "node:path";
import fs from "node:fs/promises";
import type { Dir } from "node:fs";
import crypto from "node:crypto";
import { GuardError, errnoCode, describeError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";

/**
 * Retry tokens: one short-lived record per blocked proposal fingerprint.
 *
 * A token lets the same proposal through exactly once if it is resubmitted
 * before the TTL elapses. Re-issuing overwrites the entry and restarts the
 * window. The check-then-delete in tryConsume is not atomic against a racing
 * consumer or sweep; two racers may both see the token and both allow.
 */

export type SweepResult = {
  checked: number;
  removed: number;
};

export interface RetryTokenStore {
  readonly ttlMs: number;
  tryConsume(key: string): Promise<boolean>;
  issue(key: string): Promise<void>;
  sweepExpired(maxChecked: number): Promise<SweepResult>;
}

export type Clock = () => number;

const TOKEN_SUFFIX = ".token";
const TEMP_PREFIX = ".token.tmp.";

export type FileRetryTokenStoreOptions = {
  dir: string;
  ttlSeconds: number;
  now?: Clock;
  logger?: Logger;
};

export class FileRetryTokenStore implements RetryTokenStore {
  readonly dir: string;
  readonly ttlMs: number;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(options: FileRetryTokenStoreOptions) {
    this.dir = options.dir;
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  tokenPath(key: string): string {
    return path.join(this.dir, `${key}${TOKEN_SUFFIX}`);
  }

  async tryConsume(key: string): Promise<boolean> {
    const file = this.tokenPath(key);
    const issuedAt = await this.readIssuedAt(file);
    if (issuedAt === undefined) return false;

    const elapsed = this.now() - issuedAt;
    await this.remove(file);
    if (elapsed < this.ttlMs) {
      this.logger.info("token_consume", { key, elapsed_ms: elapsed });
      return true;
    }
    this.logger.debug("token_expired", { key, elapsed_ms: elapsed });
    return false;
  }

  async issue(key: string): Promise<void> {
    const issuedAt = this.now();
    const tmp = path.join(this.dir, `${TEMP_PREFIX}${crypto.randomBytes(6).toString("hex")}`);
    try {
      await fs.writeFile(tmp, `${issuedAt}\n`, { encoding: "utf8", mode: 0o600 });
      await fs.rename(tmp, this.tokenPath(key));
    } catch (err) {
      await this.remove(tmp).catch(() => undefined);
      throw new GuardError("STORE_UNWRITABLE", `Cannot record retry token in ${this.dir}: ${describeError(err)}`, {
        cause: err,
      });
    }
    this.logger.debug("token_record", { key, ts: issuedAt });
  }

  async sweepExpired(maxChecked: number): Promise<SweepResult> {
    const result: SweepResult = { checked: 0, removed: 0 };
    if (maxChecked <= 0) return result;

    let dir: Dir;
    try {
      dir = await fs.opendir(this.dir);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return result;
      throw err;
    }

    // Every directory entry visited counts against the batch, tokens or not.
    const now = this.now();
    let visited = 0;
    for await (const entry of dir) {
      if (visited++ >= maxChecked) break;
      const name = entry.name;
      if (!name.endsWith(TOKEN_SUFFIX) || name.startsWith(".")) continue;

      const file = path.join(this.dir, name);
      const issuedAt = await this.readIssuedAt(file);
      // Gone since it was listed: a concurrent consumer or sweeper got there first.
      if (issuedAt === undefined) continue;

      result.checked++;
      if (now - issuedAt >= this.ttlMs) {
        await this.remove(file);
        result.removed++;
      }
    }

    this.logger.debug("cleanup", { checked: result.checked, removed: result.removed, window_ms: this.ttlMs });
    return result;
  }

  /**
   * Issuance time of the token at `file`, undefined if there is none.
   * Unparseable content reads as 0, which is always expired.
   */
  private async readIssuedAt(file: string): Promise<number | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return undefined;
      throw err;
    }
    const first = raw.split("\n", 1)[0]?.trim() ?? "";
    return /^\d+$/.test(first) ? Number.parseInt(first, 10) : 0;
  }

  private async remove(file: string): Promise<void> {
    try {
      await fs.unlink(file);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
    }
  }
}

/**
 * Single-process store. Node runs each decision to completion between awaits,
 * so the map needs no further locking.
 */
export class MemoryRetryTokenStore implements RetryTokenStore {
  readonly ttlMs: number;
  private readonly now: Clock;
  private readonly tokens = new Map<string, number>();

  constructor(options: { ttlSeconds: number; now?: Clock }) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.tokens.size;
  }

  issuedAt(key: string): number | undefined {
    return this.tokens.get(key);
  }

  async tryConsume(key: string): Promise<boolean> {
    const issuedAt = this.tokens.get(key);
    if (issuedAt === undefined) return false;
    this.tokens.delete(key);
    return this.now() - issuedAt < this.ttlMs;
  }

  async issue(key: string): Promise<void> {
    this.tokens.set(key, this.now());
  }

  async sweepExpired(maxChecked: number): Promise<SweepResult> {
    const result: SweepResult = { checked: 0, removed: 0 };
    const now = this.now();
    for (const [key, issuedAt] of [...this.tokens]) {
      if (result.checked >= maxChecked) break;
      result.checked++;
      if (now - issuedAt >= this.ttlMs) {
        this.tokens.delete(key);
        result.removed++;
      }
    }
    return result;
  }
}

/**
 * Used when the cache location cannot be written. Nothing is remembered, so a
 * blocked proposal can never be retried through.
 */
export class StatelessRetryTokenStore implements RetryTokenStore {
  readonly ttlMs = 0;

  async tryConsume(): Promise<boolean> {
    return false;
  }

  async issue(): Promise<void> {
    // nothing to record
  }

  async sweepExpired(): Promise<SweepResult> {
    return { checked: 0, removed: 0 };
  }
}

export function isStateless(store: RetryTokenStore): boolean {
  return store instanceof StatelessRetryTokenStore;
}

/**
 * Open the file-backed store at `dir`, falling back to the stateless store
 * when the directory cannot be created.
 */
export async function openRetryTokenStore(
  dir: string,
  ttlSeconds: number,
  options: { now?: Clock; logger?: Logger } = {},
): Promise<RetryTokenStore> {
  const logger = options.logger ?? silentLogger;
  try {
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });
    await fs.access(dir, fs.constants.W_OK);
  } catch (err) {
    const failure = new GuardError("STORE_UNWRITABLE", `Retry-token cache ${dir} is not writable: ${describeError(err)}`, {
      cause: err,
    });
    logger.warn("store_unwritable", { dir, error: failure.message });
    return new StatelessRetryTokenStore();
  }
  return new FileRetryTokenStore({ dir, ttlSeconds, now: options.now, logger });
}

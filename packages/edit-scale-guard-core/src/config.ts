import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { Ajv } from "ajv";
import { fallback } from "fallback-chain-js";
import { isLogLevel, type LogLevel } from "./log.js";

export type GuardConfig = {
  // Change percentage above which a proposal is denied pending a retry.
  hardThreshold: number;
  // Change percentage above which a proposal is allowed but flagged.
  softThreshold: number;
  // Files with fewer lines are never evaluated.
  minLines: number;
  // Globs for paths the guard skips entirely.
  excludePatterns: string[];
  retryWindowSeconds: number;
  cacheDir: string;
  // Upper bound on token entries inspected per expiry sweep.
  cleanupBatch: number;
  logLevel: LogLevel;
  // Prefix of every stderr line the guard writes.
  logTag: string;
  auditLogPath?: string;
};

export type ConfigEnv = Record<string, string | undefined>;

export type LoadedConfig = {
  config: GuardConfig;
  source: string | null;
  // Problems found while loading; the offending values were ignored.
  notes: string[];
};

export const ENV_PREFIX = "EDIT_SCALE_GUARD_";

export async function defaultCacheDir(env: ConfigEnv = process.env): Promise<string> {
  const base = await fallback([
    () => {
      const v = env.XDG_CACHE_HOME;
      if (!v || v.trim().length === 0) throw new Error("missing XDG_CACHE_HOME");
      return v;
    },
    () => path.join(env.HOME ?? os.homedir(), ".cache"),
  ]);
  return path.join(base, "edit-scale-guard");
}

export function defaultConfig(cacheDir: string): GuardConfig {
  return {
    hardThreshold: 50,
    softThreshold: 25,
    minLines: 20,
    excludePatterns: [],
    retryWindowSeconds: 120,
    cacheDir,
    cleanupBatch: 20,
    logLevel: "off",
    logTag: "edit-scale-guard",
  };
}

type ConfigFile = Partial<GuardConfig>;

const ajv = new Ajv({ allErrors: true });

const configFileSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    hardThreshold: { type: "integer", minimum: 0, maximum: 100 },
    softThreshold: { type: "integer", minimum: 0, maximum: 100 },
    minLines: { type: "integer", minimum: 0 },
    excludePatterns: { type: "array", items: { type: "string" } },
    retryWindowSeconds: { type: "integer", minimum: 0 },
    cacheDir: { type: "string", minLength: 1 },
    cleanupBatch: { type: "integer", minimum: 0 },
    logLevel: { type: "string", enum: ["off", "error", "warn", "info", "debug"] },
    logTag: { type: "string", minLength: 1 },
    auditLogPath: { type: "string", minLength: 1 },
  },
};

const validateConfigFile = ajv.compile<ConfigFile>(configFileSchema);

function configCandidates(env: ConfigEnv, cwd: string): string[] {
  const home = env.HOME ?? os.homedir();
  return [
    env[`${ENV_PREFIX}CONFIG`],
    path.join(cwd, ".edit-scale-guard.json"),
    path.join(home, ".config", "edit-scale-guard", "config.json"),
  ].filter((p): p is string => typeof p === "string" && p.length > 0);
}

async function findConfigFile(candidates: string[]): Promise<string | null> {
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // next candidate
    }
  }
  return null;
}

async function readConfigFile(filePath: string, notes: string[]): Promise<ConfigFile> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    notes.push(`config file ${filePath} ignored: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
  if (!validateConfigFile(parsed)) {
    notes.push(`config file ${filePath} ignored: ${ajv.errorsText(validateConfigFile.errors)}`);
    return {};
  }
  return parsed;
}

function readIntEnv(env: ConfigEnv, name: string, notes: string[]): number | undefined {
  const raw = env[`${ENV_PREFIX}${name}`];
  if (raw === undefined || raw.trim() === "") return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    notes.push(`${ENV_PREFIX}${name}=${raw} is not a non-negative integer; using default`);
    return undefined;
  }
  return Number.parseInt(raw.trim(), 10);
}

const intEnvFields = [
  ["hardThreshold", "THRESHOLD"],
  ["softThreshold", "WARN_THRESHOLD"],
  ["minLines", "MIN_LINES"],
  ["retryWindowSeconds", "RETRY_WINDOW"],
  ["cleanupBatch", "CLEANUP_BATCH"],
] as const;

function readEnvOverrides(env: ConfigEnv, notes: string[]): ConfigFile {
  const out: ConfigFile = {};
  for (const [field, name] of intEnvFields) {
    const value = readIntEnv(env, name, notes);
    if (value !== undefined) out[field] = value;
  }

  const patterns = env[`${ENV_PREFIX}ALLOW_PATTERNS`];
  if (patterns !== undefined && patterns.trim() !== "") {
    out.excludePatterns = patterns.split(":").filter((p) => p.length > 0);
  }

  const cacheDir = env[`${ENV_PREFIX}CACHE_DIR`];
  if (cacheDir && cacheDir.trim() !== "") out.cacheDir = cacheDir;

  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level !== undefined && level.trim() !== "") {
    const normalized = level.trim().toLowerCase();
    if (isLogLevel(normalized)) out.logLevel = normalized;
    else notes.push(`${ENV_PREFIX}LOG_LEVEL=${level} is not one of off|error|warn|info|debug; using default`);
  }

  const tag = env[`${ENV_PREFIX}LOG_TAG`];
  if (tag && tag.trim() !== "") out.logTag = tag.trim();

  const audit = env[`${ENV_PREFIX}AUDIT_LOG`];
  if (audit && audit.trim() !== "") out.auditLogPath = audit;

  return out;
}

/**
 * Resolve the effective configuration: defaults, then the first config file
 * found, then EDIT_SCALE_GUARD_* environment variables. Never throws.
 */
export async function loadConfig(env: ConfigEnv = process.env, cwd: string = process.cwd()): Promise<LoadedConfig> {
  const notes: string[] = [];
  const base = defaultConfig(await defaultCacheDir(env));

  const source = await findConfigFile(configCandidates(env, cwd));
  const fromFile = source ? await readConfigFile(source, notes) : {};
  const fromEnv = readEnvOverrides(env, notes);

  const config: GuardConfig = {
    ...base,
    ...fromFile,
    ...fromEnv,
  };

  if (config.softThreshold > config.hardThreshold) {
    notes.push(
      `softThreshold ${config.softThreshold} exceeds hardThreshold ${config.hardThreshold}; warnings will never fire`,
    );
  }

  return { config, source, notes };
}

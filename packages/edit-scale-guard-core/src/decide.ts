import path from "node:path";
import { minimatch } from "minimatch";
import type { GuardConfig } from "./config.js";
import { describeError, isGuardError } from "./errors.js";
import { estimateChange, type ChangeEstimate } from "./estimate.js";
import { fingerprint } from "./fingerprint.js";
import { silentLogger, type Logger } from "./log.js";
import { labelForKind, toolNameForKind, type EditOperation, type ExistingFile } from "./operation.js";
import { isStateless, type RetryTokenStore } from "./tokenStore.js";

export type Verdict = "allow" | "warn" | "deny";

export type DecisionReason =
  | "below_min_lines"
  | "excluded"
  | "empty_file"
  | "estimate_failed"
  | "within_threshold"
  | "over_warn_threshold"
  | "retry_accepted"
  | "over_threshold"
  | "store_unavailable";

export type Decision = {
  verdict: Verdict;
  percent: number;
  message: string;
  reason: DecisionReason;
};

/**
 * Outcome of the side-effect-free checks. "block" becomes a deny or, for a
 * matching retry, an allow once the retry-token store has been consulted.
 */
export type Assessment =
  | {
      outcome: "allow";
      reason: "below_min_lines" | "excluded" | "empty_file" | "estimate_failed" | "within_threshold";
      percent: number;
      estimate?: ChangeEstimate;
      // Exclusion glob that matched, when reason is "excluded".
      pattern?: string;
    }
  | { outcome: "warn"; reason: "over_warn_threshold"; percent: number; estimate: ChangeEstimate }
  | { outcome: "block"; reason: "over_threshold"; percent: number; estimate: ChangeEstimate };

export type DecideDeps = {
  store: RetryTokenStore;
  logger?: Logger;
  cwd?: string;
};

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

/**
 * First exclusion glob matching the path, tried against the absolute path and
 * the path relative to `cwd`. Bare patterns such as "*.lock" match basenames.
 */
export function matchExcludePattern(filePath: string, patterns: readonly string[], cwd: string = process.cwd()): string | null {
  const candidates = [toPosix(filePath), toPosix(path.relative(cwd, filePath))];
  for (const pattern of patterns) {
    if (candidates.some((c) => minimatch(c, pattern, { dot: true, matchBase: true }))) return pattern;
  }
  return null;
}

export function assess(existing: ExistingFile, op: EditOperation, config: GuardConfig, cwd?: string): Assessment {
  if (existing.lineCount < config.minLines) {
    return { outcome: "allow", reason: "below_min_lines", percent: 0 };
  }

  const pattern = matchExcludePattern(existing.path, config.excludePatterns, cwd);
  if (pattern) {
    return { outcome: "allow", reason: "excluded", percent: 0, pattern };
  }

  if (existing.byteCount === 0) {
    return { outcome: "allow", reason: "empty_file", percent: 0 };
  }

  let estimate: ChangeEstimate;
  try {
    estimate = estimateChange(existing, op);
  } catch (err) {
    if (isGuardError(err, "INVALID_INPUT")) {
      return { outcome: "allow", reason: "estimate_failed", percent: 0 };
    }
    throw err;
  }

  if (estimate.percent > config.hardThreshold) {
    return { outcome: "block", reason: "over_threshold", percent: estimate.percent, estimate };
  }
  if (estimate.percent > config.softThreshold) {
    return { outcome: "warn", reason: "over_warn_threshold", percent: estimate.percent, estimate };
  }
  return { outcome: "allow", reason: "within_threshold", percent: estimate.percent, estimate };
}

export function describeEstimate(filePath: string, estimate: ChangeEstimate): string[] {
  switch (estimate.kind) {
    case "full_rewrite":
      return [
        `File: ${filePath}`,
        `Existing size: ${estimate.oldLines} lines, ${estimate.oldBytes} bytes`,
        `New size: ${estimate.newLines} lines, ${estimate.newBytes} bytes`,
        `Unchanged lines: ${estimate.unchangedLines}`,
        `Estimated change: ${estimate.percent}%`,
      ];
    case "single_region_replace":
      return [
        `File: ${filePath}`,
        `Replacing: ${estimate.replacedLines} lines (${estimate.replacedBytes} bytes)`,
        `Percentage of file: ${estimate.percent}%`,
      ];
    case "multi_region_replace":
      return [
        `File: ${filePath}`,
        `Number of edits: ${estimate.editCount}`,
        `Total bytes being replaced: ${estimate.replacedBytes}`,
        `Percentage of file: ${estimate.percent}%`,
      ];
  }
}

export function warningMessage(op: EditOperation, percent: number): string {
  return `WARNING - moderately large ${labelForKind[op.kind]} (${percent}%) file=${op.targetPath}`;
}

export function blockedHeader(op: EditOperation, percent: number, threshold: number, retryWindowSeconds: number): string {
  return [
    "EDIT_SCALE_GUARD v1",
    "action=blocked",
    "stage=first_attempt",
    `tool=${toolNameForKind[op.kind]}`,
    `percent=${percent}`,
    `threshold=${threshold}`,
    `retry_window_s=${retryWindowSeconds}`,
    `file=${op.targetPath}`,
  ].join(" ");
}

function denyMessage(op: EditOperation, estimate: ChangeEstimate, config: GuardConfig, retryable: boolean): string {
  const window = retryable ? config.retryWindowSeconds : 0;
  const guidance = retryable
    ? [
        `- If the large change is truly necessary, retry the SAME operation now (within ${window}s).`,
        "  The retry will be allowed to proceed to the normal user permission prompt.",
      ]
    : [
        "- Retry tokens cannot be recorded right now, so a retry will be blocked as well.",
        "  Split the change into smaller edits, or ask the user to apply it.",
      ];
  return [
    blockedHeader(op, estimate.percent, config.hardThreshold, window),
    "",
    `[LARGE EDIT WARNING] ~${estimate.percent}% of file would be modified (threshold: ${config.hardThreshold}%)`,
    "",
    ...describeEstimate(op.targetPath, estimate),
    "",
    "GUIDANCE:",
    "- Try to make the change smaller and more targeted.",
    "- If a smaller change is possible, do that instead.",
    ...guidance,
  ].join("\n");
}

async function blockOrRetry(
  op: EditOperation,
  estimate: ChangeEstimate,
  config: GuardConfig,
  deps: DecideDeps,
): Promise<Decision> {
  const logger = deps.logger ?? silentLogger;
  const { store } = deps;
  const key = fingerprint(op);
  const fields = { tool: toolNameForKind[op.kind], file: op.targetPath, percent: estimate.percent };

  try {
    await store.sweepExpired(config.cleanupBatch);
  } catch (err) {
    logger.warn("cleanup_failed", { error: describeError(err) });
  }

  try {
    if (await store.tryConsume(key)) {
      logger.info("allow", { ...fields, reason: "retry_accepted" });
      return { verdict: "allow", percent: estimate.percent, message: "retry accepted", reason: "retry_accepted" };
    }
    await store.issue(key);
  } catch (err) {
    logger.warn("deny", { ...fields, reason: "store_unavailable", error: describeError(err) });
    return {
      verdict: "deny",
      percent: estimate.percent,
      message: denyMessage(op, estimate, config, false),
      reason: "store_unavailable",
    };
  }

  const retryable = !isStateless(store);
  logger.warn("deny", { ...fields, threshold: config.hardThreshold, reason: retryable ? "large_change" : "stateless" });
  return {
    verdict: "deny",
    percent: estimate.percent,
    message: denyMessage(op, estimate, config, retryable),
    reason: retryable ? "over_threshold" : "store_unavailable",
  };
}

/**
 * Decide whether a proposed operation on `existing` may proceed.
 */
export async function decide(
  existing: ExistingFile,
  op: EditOperation,
  config: GuardConfig,
  deps: DecideDeps,
): Promise<Decision> {
  const logger = deps.logger ?? silentLogger;
  const result = assess(existing, op, config, deps.cwd);

  switch (result.outcome) {
    case "allow":
      logger.info("allow", {
        tool: toolNameForKind[op.kind],
        file: op.targetPath,
        reason: result.reason,
        percent: result.percent,
        pattern: result.pattern,
        old_lines: existing.lineCount,
      });
      return { verdict: "allow", percent: result.percent, message: "", reason: result.reason };
    case "warn":
      logger.warn("warn", { tool: toolNameForKind[op.kind], file: op.targetPath, percent: result.percent });
      return {
        verdict: "warn",
        percent: result.percent,
        message: warningMessage(op, result.percent),
        reason: result.reason,
      };
    case "block":
      logger.info("large_detected", {
        tool: toolNameForKind[op.kind],
        file: op.targetPath,
        percent: result.percent,
        threshold: config.hardThreshold,
      });
      return blockOrRetry(op, result.estimate, config, deps);
  }
}

import { GuardError } from "./errors.js";
import type { EditOperation, ExistingFile, RegionReplacement } from "./operation.js";

export type FullRewriteEstimate = {
  kind: "full_rewrite";
  percent: number;
  oldLines: number;
  oldBytes: number;
  newLines: number;
  newBytes: number;
  unchangedLines: number;
};

export type SingleRegionEstimate = {
  kind: "single_region_replace";
  percent: number;
  existingBytes: number;
  replacedBytes: number;
  replacedLines: number;
};

export type MultiRegionEstimate = {
  kind: "multi_region_replace";
  percent: number;
  existingBytes: number;
  editCount: number;
  replacedBytes: number;
};

export type ChangeEstimate = FullRewriteEstimate | SingleRegionEstimate | MultiRegionEstimate;

export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 100;
  return Math.min(100, Math.max(0, Math.floor(value)));
}

function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

// A trailing newline terminates the last line rather than starting an empty one.
export function splitLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split("\n");
  if (content.endsWith("\n")) lines.pop();
  return lines;
}

function lowerBound(sorted: number[], target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? Infinity) < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Count old lines that still appear, in order, in the new lines.
 *
 * Greedy containment scan: each old line is matched to its first occurrence
 * at or after the cursor, which then moves past it. Unmatched old lines leave
 * the cursor where it is. This is not a longest-common-subsequence and can
 * under- or over-count when lines are duplicated or reordered.
 */
export function countRetainedLines(oldLines: readonly string[], newLines: readonly string[]): number {
  const positions = new Map<string, number[]>();
  newLines.forEach((line, idx) => {
    const list = positions.get(line);
    if (list) list.push(idx);
    else positions.set(line, [idx]);
  });

  let cursor = 0;
  let retained = 0;
  for (const line of oldLines) {
    const list = positions.get(line);
    if (!list) continue;
    const at = list[lowerBound(list, cursor)];
    if (at === undefined) continue;
    retained++;
    cursor = at + 1;
  }
  return retained;
}

function sumReplacedBytes(replacements: readonly RegionReplacement[]): number {
  // Overlapping spans are counted once per span, so the sum may exceed the file size.
  return replacements.reduce((sum, r) => sum + byteLength(r.oldText), 0);
}

/**
 * Estimate what share of `existing` the operation would alter.
 * Throws INVALID_INPUT for an empty file; callers allow in that case.
 */
export function estimateChange(existing: ExistingFile, op: EditOperation): ChangeEstimate {
  if (existing.byteCount === 0 || existing.lineCount === 0) {
    throw new GuardError("INVALID_INPUT", `Cannot estimate change against empty file ${existing.path}`);
  }

  switch (op.kind) {
    case "full_rewrite": {
      const oldLines = splitLines(existing.content);
      const newLines = splitLines(op.content);
      const unchangedLines = countRetainedLines(oldLines, newLines);
      const retainedPercent = Math.floor((unchangedLines * 100) / oldLines.length);
      return {
        kind: op.kind,
        percent: clampPercent(100 - retainedPercent),
        oldLines: oldLines.length,
        oldBytes: existing.byteCount,
        newLines: newLines.length,
        newBytes: byteLength(op.content),
        unchangedLines,
      };
    }
    case "single_region_replace": {
      const replacedBytes = byteLength(op.replacement.oldText);
      return {
        kind: op.kind,
        percent: clampPercent((replacedBytes * 100) / existing.byteCount),
        existingBytes: existing.byteCount,
        replacedBytes,
        replacedLines: splitLines(op.replacement.oldText).length,
      };
    }
    case "multi_region_replace": {
      const replacedBytes = sumReplacedBytes(op.replacements);
      return {
        kind: op.kind,
        percent: clampPercent((replacedBytes * 100) / existing.byteCount),
        existingBytes: existing.byteCount,
        editCount: op.replacements.length,
        replacedBytes,
      };
    }
    default: {
      const unreachable: never = op;
      throw new GuardError("UNSUPPORTED_KIND", `Unknown operation: ${JSON.stringify(unreachable)}`);
    }
  }
}

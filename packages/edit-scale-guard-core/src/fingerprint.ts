import crypto from "node:crypto";
import type { EditOperation } from "./operation.js";

function sha256(payload: string): string {
  return crypto.createHash("sha256").update(payload, "utf8").digest("hex");
}

/**
 * Digest of the operation's payload alone. Multi-region payloads keep their
 * submitted order, so the same spans in a different order hash differently.
 */
export function payloadDigest(op: EditOperation): string {
  switch (op.kind) {
    case "full_rewrite":
      return sha256(op.content);
    case "single_region_replace":
      return sha256(`${op.replacement.oldText}\0${op.replacement.newText}`);
    case "multi_region_replace":
      return sha256(JSON.stringify(op.replacements.map((r) => [r.oldText, r.newText])));
  }
}

/**
 * Stable identifier for "this exact edit to this file", used as the retry-token key.
 */
export function fingerprint(op: EditOperation): string {
  return sha256(`${op.targetPath}\n${op.kind}\n${payloadDigest(op)}\n`);
}

#!/usr/bin/env tsx
import { runHook } from "./hook.js";

/**
 * Install as a PreToolUse hook with matcher "Write|Edit|MultiEdit".
 *
 * IMPORTANT:
 *  - Do NOT write anything to stdout except the deny JSON.
 *  - Use stderr for warnings and logs.
 */

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8");
}

async function main(): Promise<void> {
  const raw = await readAllStdin();
  const result = await runHook(raw);
  for (const line of result.stderr) console.error(line);
  if (result.stdout) process.stdout.write(result.stdout);
}

main().catch((err) => {
  // No stdout means allow.
  console.error("edit-scale-guard hook fatal:", err);
  process.exitCode = 0;
});

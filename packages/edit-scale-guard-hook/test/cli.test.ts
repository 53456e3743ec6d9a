import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { z } from "zod";
import { runHook } from "../src/hook.js";

const T0 = 1_700_000_000_000;

const denySchema = z.object({
  hookSpecificOutput: z.object({
    hookEventName: z.literal("PreToolUse"),
    permissionDecision: z.literal("deny"),
    permissionDecisionReason: z.string(),
  }),
});

function numbered(count: number, prefix: string): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}`);
}

function joinLines(lines: string[]): string {
  return lines.map((l) => `${l}\n`).join("");
}

async function makeTempWorkspace() {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "esg-hook-"));
  const home = path.join(root, "home");
  const workspace = path.join(root, "workspace");
  await fs.mkdir(home, { recursive: true });
  await fs.mkdir(workspace, { recursive: true });
  const env: Record<string, string | undefined> = {
    HOME: home,
    EDIT_SCALE_GUARD_CACHE_DIR: path.join(root, "cache"),
  };
  return { root, workspace, env };
}

async function writeBigFile(workspace: string): Promise<{ file: string; old: string[] }> {
  const old = numbered(100, "line");
  const file = path.join(workspace, "big.ts");
  await fs.writeFile(file, joinLines(old), "utf8");
  return { file, old };
}

function payload(workspace: string, toolName: string, toolInput: Record<string, unknown>): string {
  return JSON.stringify({
    hook_event_name: "PreToolUse",
    session_id: "test-session",
    cwd: workspace,
    tool_name: toolName,
    tool_input: toolInput,
  });
}

function denyReason(stdout: string): string {
  return denySchema.parse(JSON.parse(stdout)).hookSpecificOutput.permissionDecisionReason;
}

describe("edit-scale-guard hook", () => {
  it("blocks a large rewrite, lets the identical retry through, then blocks again", async () => {
    const { workspace, env } = await makeTempWorkspace();
    const { file, old } = await writeBigFile(workspace);
    const raw = payload(workspace, "Write", {
      file_path: "big.ts",
      content: joinLines([...old.slice(0, 40), ...numbered(60, "fresh")]),
    });
    const now = () => T0;

    const first = await runHook(raw, { env, cwd: workspace, now });
    expect(denyReason(first.stdout).split("\n")[0]).toBe(
      `EDIT_SCALE_GUARD v1 action=blocked stage=first_attempt tool=Write percent=60 threshold=50 retry_window_s=120 file=${file}`,
    );

    const retry = await runHook(raw, { env, cwd: workspace, now });
    expect(retry.stdout).toBe("");
    expect(retry.decision?.reason).toBe("retry_accepted");

    const third = await runHook(raw, { env, cwd: workspace, now });
    expect(third.decision?.verdict).toBe("deny");
    expect(third.stdout).not.toBe("");
  });

  it("warns on stderr for moderately large edits", async () => {
    const { workspace, env } = await makeTempWorkspace();
    const { file, old } = await writeBigFile(workspace);
    const raw = payload(workspace, "Write", {
      file_path: file,
      content: joinLines([...old.slice(0, 70), ...numbered(30, "fresh")]),
    });

    const res = await runHook(raw, { env, cwd: workspace });
    expect(res.stdout).toBe("");
    expect(res.stderr).toEqual([`[edit-scale-guard] WARNING - moderately large write (30%) file=${file}`]);
  });

  it("allows silently when the file does not exist yet", async () => {
    const { workspace, env } = await makeTempWorkspace();
    const res = await runHook(payload(workspace, "Write", { file_path: "new.ts", content: "x\n" }), { env, cwd: workspace });
    expect(res).toEqual({ stdout: "", stderr: [], decision: null });
  });

  it("allows silently for input it cannot use", async () => {
    const { workspace, env } = await makeTempWorkspace();
    await writeBigFile(workspace);
    for (const raw of [
      "{not json",
      payload(workspace, "Write", { content: "x" }),
      payload(workspace, "Write", { file_path: "big.ts" }),
      payload(workspace, "Write", { file_path: "big.ts", content: null }),
      payload(workspace, "Bash", { command: "ls", file_path: "big.ts" }),
    ]) {
      const res = await runHook(raw, { env, cwd: workspace });
      expect(res).toEqual({ stdout: "", stderr: [], decision: null });
    }
  });

  it("allows with an advisory when the target cannot be read", async () => {
    const { workspace, env } = await makeTempWorkspace();
    const res = await runHook(payload(workspace, "Edit", { file_path: workspace, old_string: "a", new_string: "b" }), {
      env,
      cwd: workspace,
    });
    expect(res.stdout).toBe("");
    expect(res.stderr).toHaveLength(1);
    expect(res.stderr[0]?.startsWith(`[edit-scale-guard] could not read ${workspace}; allowing (`)).toBe(true);
  });

  it("never offers a retry when the cache cannot be written", async () => {
    const { root, workspace, env } = await makeTempWorkspace();
    const { old } = await writeBigFile(workspace);
    const blocker = path.join(root, "blocker");
    await fs.writeFile(blocker, "", "utf8");
    const stateless = { ...env, EDIT_SCALE_GUARD_CACHE_DIR: path.join(blocker, "cache") };
    const raw = payload(workspace, "Write", { file_path: "big.ts", content: joinLines(old.slice(0, 10)) });

    for (let i = 0; i < 2; i++) {
      const res = await runHook(raw, { env: stateless, cwd: workspace });
      expect(res.decision?.reason).toBe("store_unavailable");
      expect(denyReason(res.stdout).split("\n")[0]).toContain("percent=90 threshold=50 retry_window_s=0");
    }
  });

  it("skips paths matching the allow patterns", async () => {
    const { workspace, env } = await makeTempWorkspace();
    const { file } = await writeBigFile(workspace);
    const res = await runHook(payload(workspace, "Write", { file_path: file, content: "" }), {
      env: { ...env, EDIT_SCALE_GUARD_ALLOW_PATTERNS: "*.md:*.ts" },
      cwd: workspace,
    });
    expect(res.stdout).toBe("");
    expect(res.decision?.reason).toBe("excluded");
  });

  it("records blocks in the audit log when enabled", async () => {
    const { root, workspace, env } = await makeTempWorkspace();
    const { file } = await writeBigFile(workspace);
    const audit = path.join(root, "audit.jsonl");
    // 600 of 792 bytes: 75%
    const oldString = (await fs.readFile(file, "utf8")).slice(0, 600);
    const res = await runHook(payload(workspace, "Edit", { file_path: file, old_string: oldString, new_string: "" }), {
      env: { ...env, EDIT_SCALE_GUARD_AUDIT_LOG: audit },
      cwd: workspace,
    });
    expect(res.decision?.verdict).toBe("deny");

    const entries = (await fs.readFile(audit, "utf8")).trim().split("\n");
    expect(entries).toHaveLength(1);
    expect(JSON.parse(entries[0] ?? "{}")).toMatchObject({
      event: "deny",
      reason: "over_threshold",
      tool: "Edit",
      file_path: file,
      session_id: "test-session",
    });
  });

  it("prefixes stderr lines with the configured tag", async () => {
    const { workspace, env } = await makeTempWorkspace();
    const { file, old } = await writeBigFile(workspace);
    const raw = payload(workspace, "Write", {
      file_path: file,
      content: joinLines([...old.slice(0, 70), ...numbered(30, "fresh")]),
    });

    const res = await runHook(raw, {
      env: { ...env, EDIT_SCALE_GUARD_LOG_TAG: "claude.large-edit", EDIT_SCALE_GUARD_LOG_LEVEL: "warn" },
      cwd: workspace,
    });
    expect(res.stderr).toEqual([
      `[claude.large-edit] warn event=warn tool=Write file=${file} percent=30`,
      `[claude.large-edit] WARNING - moderately large write (30%) file=${file}`,
    ]);
  });

  it("writes logs to stderr at the configured level", async () => {
    const { workspace, env } = await makeTempWorkspace();
    const res = await runHook(payload(workspace, "Write", { file_path: "new.ts", content: "x\n" }), {
      env: { ...env, EDIT_SCALE_GUARD_LOG_LEVEL: "info" },
      cwd: workspace,
    });
    expect(res.stderr).toEqual([
      `[edit-scale-guard] info event=allow reason=new_file tool=Write file=${path.join(workspace, "new.ts")}`,
    ]);
  });
});

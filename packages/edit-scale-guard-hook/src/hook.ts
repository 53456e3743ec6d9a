import {
  appendAudit,
  createLogger,
  decide,
  describeError,
  isGuardError,
  loadConfig,
  openRetryTokenStore,
  parseHookInput,
  readExistingFile,
  toEditOperation,
  toolNameForKind,
  type Clock,
  type ConfigEnv,
  type Decision,
  type EditOperation,
  type ExistingFile,
  type HookInput,
  type Logger,
} from "edit-scale-guard-core";

/**
 * Edit Scale Guard PreToolUse hook
 *
 * The host sends one JSON record per proposed Write/Edit/MultiEdit on stdin.
 * Protocol:
 *  - allow: exit 0 with NOTHING on stdout
 *  - warn: exit 0, one advisory line on stderr
 *  - deny: exit 0 with a permissionDecision:"deny" JSON object on stdout
 * Every failure path allows.
 */

export type PreToolUseDeny = {
  hookSpecificOutput: {
    hookEventName: "PreToolUse";
    permissionDecision: "deny";
    permissionDecisionReason: string;
  };
};

export type HookResult = {
  // Exactly what goes to stdout; empty unless the proposal is denied.
  stdout: string;
  stderr: string[];
  decision: Decision | null;
};

export type RunHookOptions = {
  env?: ConfigEnv;
  cwd?: string;
  now?: Clock;
};

export function denyResponse(reason: string): PreToolUseDeny {
  return {
    hookSpecificOutput: {
      hookEventName: "PreToolUse",
      permissionDecision: "deny",
      permissionDecisionReason: reason,
    },
  };
}

function allowSilently(stderr: string[]): HookResult {
  return { stdout: "", stderr, decision: null };
}

function parseOperation(raw: string, logger: Logger): { input: HookInput; op: EditOperation } | null {
  let input: HookInput;
  try {
    input = parseHookInput(raw);
  } catch (err) {
    logger.debug("exit", { reason: "input_parse", error: describeError(err) });
    return null;
  }
  try {
    return { input, op: toEditOperation(input) };
  } catch (err) {
    const reason = isGuardError(err, "UNSUPPORTED_KIND") ? "unknown_tool" : "input_incomplete";
    logger.debug("exit", { reason, tool: input.tool_name, error: describeError(err) });
    return null;
  }
}

export async function runHook(raw: string, options: RunHookOptions = {}): Promise<HookResult> {
  const env = options.env ?? process.env;
  const stderr: string[] = [];
  const sink = (line: string) => stderr.push(line);

  const { config, source, notes } = await loadConfig(env, options.cwd ?? process.cwd());
  const logger = createLogger({ level: config.logLevel, tag: config.logTag, sink });
  for (const note of notes) logger.warn("config_note", { note });
  logger.debug("hook_invoked", {
    config: source,
    cache_dir: config.cacheDir,
    threshold: config.hardThreshold,
    warn_threshold: config.softThreshold,
    retry_window_s: config.retryWindowSeconds,
    cleanup_batch: config.cleanupBatch,
    input_bytes: raw.length,
  });

  const parsed = parseOperation(raw, logger);
  if (!parsed) return allowSilently(stderr);
  const { input, op } = parsed;
  const tool = toolNameForKind[op.kind];

  let existing: ExistingFile | null;
  try {
    existing = await readExistingFile(op.targetPath);
  } catch (err) {
    // FILE_UNREADABLE: advisory only.
    stderr.push(`[${config.logTag}] could not read ${op.targetPath}; allowing (${describeError(err)})`);
    logger.error("allow", { reason: "file_unreadable", tool, file: op.targetPath });
    return allowSilently(stderr);
  }
  if (!existing) {
    logger.info("allow", { reason: "new_file", tool, file: op.targetPath });
    return allowSilently(stderr);
  }

  const store = await openRetryTokenStore(config.cacheDir, config.retryWindowSeconds, { now: options.now, logger });
  const decision = await decide(existing, op, config, { store, logger, cwd: input.cwd ?? options.cwd });

  if (decision.verdict !== "allow" || decision.reason === "retry_accepted") {
    await appendAudit(
      config.auditLogPath,
      {
        event: decision.verdict,
        reason: decision.reason,
        tool,
        file_path: op.targetPath,
        percent: decision.percent,
        session_id: input.session_id,
      },
      logger,
    );
  }

  switch (decision.verdict) {
    case "allow":
      return { stdout: "", stderr, decision };
    case "warn":
      stderr.push(`[${config.logTag}] ${decision.message}`);
      return { stdout: "", stderr, decision };
    case "deny":
      return { stdout: JSON.stringify(denyResponse(decision.message)), stderr, decision };
  }
}

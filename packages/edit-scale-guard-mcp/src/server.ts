import path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  assess,
  describeError,
  fingerprint,
  readExistingFile,
  toEditOperation,
  toolNameForKind,
  type GuardConfig,
  type RetryTokenStore,
} from "edit-scale-guard-core";

/**
 * Edit Scale Guard MCP Server
 *
 * Lets an agent ask, before proposing an edit, how large the guard considers
 * it. Previews never issue or consume retry tokens; only the hook does.
 *
 * IMPORTANT: This is an STDIO MCP server.
 * Never write to stdout except MCP JSON-RPC. Use console.error for logs.
 */

export const SERVER_NAME = "edit-scale-guard";
export const SERVER_VERSION = "0.1.0";

export type GuardServerOptions = {
  config: GuardConfig;
  store: RetryTokenStore;
  cwd?: string;
};

function text(value: string) {
  return { content: [{ type: "text" as const, text: value }] };
}

function failure(value: string) {
  return { ...text(`❌ ${value}`), isError: true };
}

export function createGuardServer(options: GuardServerOptions): McpServer {
  const { config, store } = options;
  const cwd = options.cwd ?? process.cwd();

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "edit_guard_preview",
    {
      description:
        "Estimate how much of an existing file a proposed Write/Edit/MultiEdit would change and report whether the guard would allow, warn or block it. Does not consume or issue retry tokens.",
      inputSchema: {
        file_path: z.string().min(1).describe("Path of the file to be modified; relative paths resolve against the server's working directory."),
        tool_name: z.enum(["Write", "Edit", "MultiEdit"]),
        content: z.string().optional().describe("Full new content (Write)."),
        old_string: z.string().optional().describe("Text being replaced (Edit)."),
        new_string: z.string().optional().describe("Replacement text (Edit)."),
        edits: z
          .array(z.object({ old_string: z.string(), new_string: z.string() }))
          .optional()
          .describe("Ordered replacements (MultiEdit)."),
      },
    },
    async ({ file_path, tool_name, content, old_string, new_string, edits }) => {
      try {
        const op = toEditOperation({
          tool_name,
          tool_input: { file_path, content, old_string, new_string, edits },
          cwd,
        });
        const existing = await readExistingFile(op.targetPath);
        if (!existing) {
          return text(
            JSON.stringify({ file: op.targetPath, tool: tool_name, outcome: "allow", reason: "new_file", percent: 0 }, null, 2),
          );
        }

        const result = assess(existing, op, config, cwd);
        const payload = {
          file: op.targetPath,
          relative: path.relative(cwd, op.targetPath),
          tool: toolNameForKind[op.kind],
          outcome: result.outcome,
          reason: result.reason,
          percent: result.percent,
          thresholds: { hard: config.hardThreshold, soft: config.softThreshold, minLines: config.minLines },
          existing: { lines: existing.lineCount, bytes: existing.byteCount },
          estimate: result.estimate ?? null,
          fingerprint: fingerprint(op),
          retry_window_s: config.retryWindowSeconds,
        };
        return text(JSON.stringify(payload, null, 2));
      } catch (err) {
        return failure(describeError(err));
      }
    },
  );

  server.registerTool(
    "edit_guard_get_config",
    {
      description: "Get the effective guard configuration (thresholds, exclusions, retry window, cache location).",
      inputSchema: {},
    },
    async () => text(JSON.stringify(config, null, 2)),
  );

  server.registerTool(
    "edit_guard_sweep_tokens",
    {
      description: "Remove expired retry tokens from the cache, inspecting at most max_checked entries.",
      inputSchema: {
        max_checked: z.number().int().min(1).max(10000).optional().describe("Defaults to the configured cleanup batch."),
      },
    },
    async ({ max_checked }) => {
      try {
        const result = await store.sweepExpired(max_checked ?? config.cleanupBatch);
        return text(JSON.stringify(result, null, 2));
      } catch (err) {
        return failure(`Sweep failed: ${describeError(err)}`);
      }
    },
  );

  return server;
}

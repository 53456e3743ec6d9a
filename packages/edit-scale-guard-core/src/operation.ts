import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";
import { GuardError, errnoCode, describeError } from "./errors.js";

export type EditKind = "full_rewrite" | "single_region_replace" | "multi_region_replace";

export type RegionReplacement = {
  readonly oldText: string;
  readonly newText: string;
};

export type FullRewrite = {
  readonly kind: "full_rewrite";
  readonly targetPath: string;
  readonly content: string;
};

export type SingleRegionReplace = {
  readonly kind: "single_region_replace";
  readonly targetPath: string;
  readonly replacement: RegionReplacement;
};

export type MultiRegionReplace = {
  readonly kind: "multi_region_replace";
  readonly targetPath: string;
  readonly replacements: readonly RegionReplacement[];
};

export type EditOperation = FullRewrite | SingleRegionReplace | MultiRegionReplace;

export type ExistingFile = {
  readonly path: string;
  readonly content: string;
  readonly lineCount: number;
  readonly byteCount: number;
};

// Host tool name for each kind; used in messages and the blocked header.
export const toolNameForKind: Record<EditKind, string> = {
  full_rewrite: "Write",
  single_region_replace: "Edit",
  multi_region_replace: "MultiEdit",
};

// Short label used in warnings ("moderately large multi-edit").
export const labelForKind: Record<EditKind, string> = {
  full_rewrite: "write",
  single_region_replace: "edit",
  multi_region_replace: "multi-edit",
};

const hookInputSchema = z.object({
  tool_name: z.string().optional(),
  tool_input: z.record(z.unknown()).optional(),
  cwd: z.string().optional(),
  hook_event_name: z.string().optional(),
  session_id: z.string().optional(),
});

export type HookInput = z.infer<typeof hookInputSchema>;

const editSchema = z.object({
  old_string: z.string().optional(),
  new_string: z.string().optional(),
});

/**
 * Parse the JSON record the host runtime writes to the hook's stdin.
 */
export function parseHookInput(raw: string): HookInput {
  let parsed: unknown;
  try {
    parsed = raw.trim() ? JSON.parse(raw) : {};
  } catch (err) {
    throw new GuardError("INPUT_PARSE", `Invalid JSON payload: ${describeError(err)}`, { cause: err });
  }
  const result = hookInputSchema.safeParse(parsed);
  if (!result.success) {
    throw new GuardError("INPUT_PARSE", `Unexpected payload shape: ${result.error.message}`);
  }
  return result.data;
}

function optionalString(input: Record<string, unknown>, key: string): string {
  const value = input[key];
  if (value === undefined || value === null) return "";
  if (typeof value !== "string") {
    throw new GuardError("INPUT_PARSE", `tool_input.${key} must be a string`);
  }
  return value;
}

function requiredString(input: Record<string, unknown>, key: string): string {
  const value = input[key];
  if (typeof value !== "string") {
    throw new GuardError("INPUT_PARSE", `tool_input.${key} is missing`);
  }
  return value;
}

function toReplacements(value: unknown): RegionReplacement[] {
  if (value === undefined || value === null) return [];
  const result = z.array(editSchema).safeParse(value);
  if (!result.success) {
    throw new GuardError("INPUT_PARSE", `tool_input.edits is malformed: ${result.error.message}`);
  }
  return result.data.map((e) => ({ oldText: e.old_string ?? "", newText: e.new_string ?? "" }));
}

/**
 * Map a host tool call onto the operation descriptor the estimator understands.
 */
export function toEditOperation(input: HookInput): EditOperation {
  const toolInput = input.tool_input ?? {};
  const rawPath = toolInput.file_path;
  if (typeof rawPath !== "string" || rawPath.trim().length === 0) {
    throw new GuardError("INPUT_PARSE", "tool_input.file_path is missing");
  }
  const targetPath = path.resolve(input.cwd ?? process.cwd(), rawPath);

  switch (input.tool_name) {
    case "Write":
      return { kind: "full_rewrite", targetPath, content: requiredString(toolInput, "content") };
    case "Edit":
      return {
        kind: "single_region_replace",
        targetPath,
        replacement: {
          oldText: optionalString(toolInput, "old_string"),
          newText: optionalString(toolInput, "new_string"),
        },
      };
    case "MultiEdit":
      return { kind: "multi_region_replace", targetPath, replacements: toReplacements(toolInput.edits) };
    default:
      throw new GuardError("UNSUPPORTED_KIND", `Unsupported tool: ${input.tool_name ?? "(none)"}`);
  }
}

export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const newlines = content.split("\n").length - 1;
  return content.endsWith("\n") ? newlines : newlines + 1;
}

export function toExistingFile(filePath: string, content: string): ExistingFile {
  return {
    path: filePath,
    content,
    lineCount: countLines(content),
    byteCount: Buffer.byteLength(content, "utf8"),
  };
}

/**
 * Read the file an operation targets. Returns null when it does not exist yet.
 */
export async function readExistingFile(filePath: string): Promise<ExistingFile | null> {
  try {
    const content = await fs.readFile(filePath, "utf8");
    return toExistingFile(filePath, content);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw new GuardError("FILE_UNREADABLE", `Cannot read ${filePath}: ${describeError(err)}`, { cause: err });
  }
}

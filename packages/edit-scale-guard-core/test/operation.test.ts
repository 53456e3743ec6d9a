import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { GuardError, type GuardErrorCode } from "../src/errors.js";
import { parseHookInput, readExistingFile, toEditOperation } from "../src/operation.js";

function codeOf(fn: () => unknown): GuardErrorCode | null {
  try {
    fn();
  } catch (err) {
    return err instanceof GuardError ? err.code : null;
  }
  return null;
}

describe("parseHookInput", () => {
  it("reads the host's PreToolUse record", () => {
    const input = parseHookInput(
      JSON.stringify({ tool_name: "Write", tool_input: { file_path: "a.ts", content: "x" }, cwd: "/work" }),
    );
    expect(input).toEqual({ tool_name: "Write", tool_input: { file_path: "a.ts", content: "x" }, cwd: "/work" });
  });

  it("treats empty stdin as an empty record", () => {
    expect(parseHookInput("  \n")).toEqual({});
  });

  it("rejects malformed JSON and shapes", () => {
    expect(codeOf(() => parseHookInput("{not json"))).toBe("INPUT_PARSE");
    expect(codeOf(() => parseHookInput(JSON.stringify({ tool_name: 42 })))).toBe("INPUT_PARSE");
  });
});

describe("toEditOperation", () => {
  it("maps Write to a full rewrite resolved against cwd", () => {
    const op = toEditOperation({ tool_name: "Write", tool_input: { file_path: "src/a.ts", content: "body" }, cwd: "/work" });
    expect(op).toEqual({ kind: "full_rewrite", targetPath: path.resolve("/work", "src/a.ts"), content: "body" });
  });

  it("maps Edit to a single region replacement", () => {
    const op = toEditOperation({
      tool_name: "Edit",
      tool_input: { file_path: "/work/a.ts", old_string: "foo", new_string: "bar", replace_all: false },
    });
    expect(op).toEqual({
      kind: "single_region_replace",
      targetPath: "/work/a.ts",
      replacement: { oldText: "foo", newText: "bar" },
    });
  });

  it("maps MultiEdit to ordered replacements", () => {
    const op = toEditOperation({
      tool_name: "MultiEdit",
      tool_input: {
        file_path: "/work/a.ts",
        edits: [
          { old_string: "one", new_string: "1" },
          { old_string: "two", new_string: "2" },
        ],
      },
    });
    expect(op).toEqual({
      kind: "multi_region_replace",
      targetPath: "/work/a.ts",
      replacements: [
        { oldText: "one", newText: "1" },
        { oldText: "two", newText: "2" },
      ],
    });
  });

  it("defaults missing payload fields to empty", () => {
    expect(toEditOperation({ tool_name: "Edit", tool_input: { file_path: "/work/a.ts" } })).toEqual({
      kind: "single_region_replace",
      targetPath: "/work/a.ts",
      replacement: { oldText: "", newText: "" },
    });
    expect(toEditOperation({ tool_name: "MultiEdit", tool_input: { file_path: "/work/a.ts" } })).toEqual({
      kind: "multi_region_replace",
      targetPath: "/work/a.ts",
      replacements: [],
    });
  });

  it("rejects a Write without string content", () => {
    expect(codeOf(() => toEditOperation({ tool_name: "Write", tool_input: { file_path: "/work/a.ts" } }))).toBe(
      "INPUT_PARSE",
    );
    expect(
      codeOf(() => toEditOperation({ tool_name: "Write", tool_input: { file_path: "/work/a.ts", content: null } })),
    ).toBe("INPUT_PARSE");
    expect(toEditOperation({ tool_name: "Write", tool_input: { file_path: "/work/a.ts", content: "" } })).toEqual({
      kind: "full_rewrite",
      targetPath: "/work/a.ts",
      content: "",
    });
  });

  it("classifies what it cannot map", () => {
    expect(codeOf(() => toEditOperation({ tool_name: "Bash", tool_input: { file_path: "/work/a.ts" } }))).toBe(
      "UNSUPPORTED_KIND",
    );
    expect(codeOf(() => toEditOperation({ tool_name: "Write", tool_input: {} }))).toBe("INPUT_PARSE");
    expect(codeOf(() => toEditOperation({ tool_name: "Write", tool_input: { file_path: "/a", content: 7 } }))).toBe(
      "INPUT_PARSE",
    );
    expect(
      codeOf(() => toEditOperation({ tool_name: "MultiEdit", tool_input: { file_path: "/a", edits: "nope" } })),
    ).toBe("INPUT_PARSE");
  });
});

describe("readExistingFile", () => {
  it("returns null for a file that does not exist yet", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "esg-read-"));
    expect(await readExistingFile(path.join(dir, "new.ts"))).toBeNull();
  });

  it("reads content with line and byte counts", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "esg-read-"));
    const file = path.join(dir, "a.txt");
    await fs.writeFile(file, "one\ntwo\nthree\n", "utf8");
    expect(await readExistingFile(file)).toEqual({ path: file, content: "one\ntwo\nthree\n", lineCount: 3, byteCount: 14 });
  });

  it("reports an unreadable target", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "esg-read-"));
    await expect(readExistingFile(dir)).rejects.toMatchObject({ name: "GuardError", code: "FILE_UNREADABLE" });
  });
});

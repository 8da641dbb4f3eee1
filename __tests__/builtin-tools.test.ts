import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BuiltinToolSource, BUILTIN_SOURCE_ID } from "../src/builtin-tools/BuiltinToolSource.js";
import type { ToolCallContext, ToolDescriptor } from "../src/types/ToolDescriptor.js";

const ctx: ToolCallContext = { runId: "run-1", stepId: "step-1" };

async function call(
  source: BuiltinToolSource,
  name: string,
  args: Record<string, unknown>,
  callCtx: ToolCallContext = ctx,
): Promise<unknown> {
  const def = await source.getTool(name);
  if (!def) throw new Error(`missing tool ${name}`);
  const descriptor: ToolDescriptor = { ...def, source: source.id, cachedAt: 0 };
  const { result } = await source.invoke(descriptor, args, callCtx);
  return result;
}

describe("BuiltinToolSource", () => {
  it("lists the built-in tools under the builtin source id", async () => {
    const source = new BuiltinToolSource();
    expect(source.id).toBe(BUILTIN_SOURCE_ID);
    const names = (await source.listTools()).map((t) => t.name).sort();
    expect(names).toEqual([
      "builtin/fs.readText",
      "builtin/fs.writeText",
      "builtin/hash.text",
      "builtin/json.select",
      "builtin/template.render",
      "builtin/text.truncate",
    ]);
  });

  it("rejects an unknown tool name", async () => {
    const source = new BuiltinToolSource();
    const descriptor: ToolDescriptor = {
      name: "builtin/nope",
      version: "1.0.0",
      inputSchema: {},
      outputSchema: {},
      source: "builtin",
      cachedAt: 0,
    };
    await expect(source.invoke(descriptor, {}, ctx)).rejects.toThrow(
      "Built-in tool handler not found: builtin/nope",
    );
  });

  describe("text.truncate", () => {
    const source = new BuiltinToolSource();

    it("keeps short text", async () => {
      expect(await call(source, "builtin/text.truncate", { text: "hi", maxChars: 8 })).toEqual({
        text: "hi",
        truncated: false,
        originalLength: 2,
      });
    });

    it("cuts long text and appends the suffix", async () => {
      expect(await call(source, "builtin/text.truncate", { text: "hello world", maxChars: 8 })).toEqual({
        text: "hello...",
        truncated: true,
        originalLength: 11,
      });
    });

    it("uses a custom suffix", async () => {
      expect(
        await call(source, "builtin/text.truncate", { text: "abcdefgh", maxChars: 5, suffix: "~" }),
      ).toEqual({ text: "abcd~", truncated: true, originalLength: 8 });
    });

    it("cuts at the last word boundary in word mode", async () => {
      expect(
        await call(source, "builtin/text.truncate", {
          text: "the quick brown fox",
          maxChars: 14,
          boundary: "word",
        }),
      ).toEqual({ text: "the quick...", truncated: true, originalLength: 19 });
    });
  });

  it("hashes text with SHA-256", async () => {
    const source = new BuiltinToolSource();
    expect(await call(source, "builtin/hash.text", { text: "abc" })).toEqual({
      sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    });
  });

  describe("json.select", () => {
    const source = new BuiltinToolSource();

    it("selects with a JMESPath expression", async () => {
      expect(
        await call(source, "builtin/json.select", { json: { a: { b: [1, 2, 3] } }, path: "a.b[1]" }),
      ).toEqual({ value: 2, matched: true });
    });

    it("returns null for a path that matches nothing", async () => {
      expect(await call(source, "builtin/json.select", { json: { a: 1 }, path: "missing" })).toEqual({
        value: null,
        matched: false,
      });
    });

    it("returns the fallback when nothing matches", async () => {
      expect(
        await call(source, "builtin/json.select", { json: { a: 1 }, path: "missing", default: "none" }),
      ).toEqual({ value: "none", matched: false });
    });

    it("reports an invalid expression as input-invalid", async () => {
      await expect(call(source, "builtin/json.select", { json: {}, path: "a.[" })).rejects.toMatchObject({
        kind: "input-invalid",
      });
    });
  });

  describe("template.render", () => {
    const source = new BuiltinToolSource();

    it("renders a Mustache template", async () => {
      expect(
        await call(source, "builtin/template.render", {
          template: "Hello {{name}}, you have {{count}} items",
          data: { name: "Ada", count: 3 },
        }),
      ).toEqual({ text: "Hello Ada, you have 3 items" });
    });

    it("uses partials and escapes HTML unless told not to", async () => {
      const args = {
        template: "{{> greet}}",
        data: { name: "<b>Ada</b>" },
        partials: { greet: "Hi {{name}}" },
      };
      expect(await call(source, "builtin/template.render", args)).toEqual({
        text: "Hi &lt;b&gt;Ada&lt;&#x2F;b&gt;",
      });
      expect(await call(source, "builtin/template.render", { ...args, escapeHtml: false })).toEqual({
        text: "Hi <b>Ada</b>",
      });
    });
  });

  describe("file tools", () => {
    let workDir: string;

    beforeEach(async () => {
      workDir = await mkdtemp(join(tmpdir(), "builtin-tools-"));
    });

    afterEach(async () => {
      await rm(workDir, { recursive: true, force: true });
    });

    it("writes and reads a file inside the configured working directory", async () => {
      const source = new BuiltinToolSource({ workDir });
      const written = await call(source, "builtin/fs.writeText", { path: "notes/a.txt", text: "abc" });
      expect(written).toEqual({
        path: "notes/a.txt",
        bytes: 3,
        sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
      });
      expect(await readFile(join(workDir, "notes", "a.txt"), "utf-8")).toBe("abc");

      expect(await call(source, "builtin/fs.readText", { path: "notes/a.txt" })).toEqual({
        path: "notes/a.txt",
        text: "abc",
        bytes: 3,
        truncated: false,
      });
    });

    it("takes the working directory from the call context", async () => {
      const source = new BuiltinToolSource();
      await call(source, "builtin/fs.writeText", { path: "b.txt", text: "x" }, { ...ctx, workDir });
      expect(await readFile(join(workDir, "b.txt"), "utf-8")).toBe("x");
    });

    it("refuses to replace a file in create mode", async () => {
      const source = new BuiltinToolSource({ workDir });
      await call(source, "builtin/fs.writeText", { path: "c.txt", text: "one" });
      await expect(call(source, "builtin/fs.writeText", { path: "c.txt", text: "two" })).rejects.toMatchObject({
        kind: "tool-error",
        message: "File already exists: c.txt",
      });

      await call(source, "builtin/fs.writeText", { path: "c.txt", text: "two", mode: "overwrite" });
      await call(source, "builtin/fs.writeText", { path: "c.txt", text: "+", mode: "append" });
      expect(await readFile(join(workDir, "c.txt"), "utf-8")).toBe("two+");
    });

    it("enforces the read size limit", async () => {
      const source = new BuiltinToolSource({ workDir, maxReadBytes: 4 });
      await call(source, "builtin/fs.writeText", { path: "big.txt", text: "0123456789" });
      await expect(call(source, "builtin/fs.readText", { path: "big.txt" })).rejects.toMatchObject({
        kind: "resource-limit",
        message: "File size 10 bytes exceeds limit of 4 bytes",
      });
      expect(await call(source, "builtin/fs.readText", { path: "big.txt", truncate: true })).toEqual({
        path: "big.txt",
        text: "0123",
        bytes: 4,
        truncated: true,
      });
    });

    it("denies file access without a working directory", async () => {
      const source = new BuiltinToolSource();
      await expect(call(source, "builtin/fs.readText", { path: "a.txt" })).rejects.toMatchObject({
        kind: "forbidden-file-access",
        message: 'File access to "a.txt" denied: no working directory granted',
      });
    });

    it("denies paths that leave the working directory", async () => {
      const source = new BuiltinToolSource({ workDir });
      await expect(
        call(source, "builtin/fs.writeText", { path: "../escape.txt", text: "x" }),
      ).rejects.toMatchObject({ kind: "forbidden-file-access" });
    });
  });
});

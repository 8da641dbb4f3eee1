import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, realpath, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { isWithinRoot, resolveGrantedPath, resolveScopedPath } from "../src/sandbox/pathScope.js";

describe("pathScope", () => {
  let root: string;
  let outside: string;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "scope-root-")));
    outside = await realpath(await mkdtemp(join(tmpdir(), "scope-outside-")));
    await mkdir(join(root, "sub"));
    await writeFile(join(root, "sub", "file.txt"), "inside");
    await writeFile(join(outside, "secret.txt"), "outside");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    await rm(outside, { recursive: true, force: true });
  });

  it("resolves existing files inside the root", async () => {
    expect(await resolveScopedPath("sub/file.txt", root)).toBe(join(root, "sub", "file.txt"));
  });

  it("resolves write targets that do not exist yet", async () => {
    expect(await resolveScopedPath("sub/new.txt", root)).toBe(join(root, "sub", "new.txt"));
  });

  it("rejects relative escapes", async () => {
    await expect(resolveScopedPath("../x.txt", root)).rejects.toMatchObject({
      kind: "forbidden-file-access",
    });
  });

  it("rejects absolute paths outside the root", async () => {
    await expect(resolveScopedPath(join(outside, "secret.txt"), root)).rejects.toMatchObject({
      kind: "forbidden-file-access",
    });
  });

  it("rejects symlinks that point outside the root", async () => {
    await symlink(join(outside, "secret.txt"), join(root, "link.txt"));
    await expect(resolveScopedPath("link.txt", root)).rejects.toMatchObject({
      kind: "forbidden-file-access",
    });
  });

  it("rejects new paths below a symlinked directory that points outside the root", async () => {
    await symlink(outside, join(root, "link"));
    await expect(resolveScopedPath("link/newdir/out.txt", root)).rejects.toMatchObject({
      kind: "forbidden-file-access",
      details: { resolvedPath: join(outside, "newdir", "out.txt") },
    });
  });

  it("resolves nested new paths below an existing directory", async () => {
    expect(await resolveScopedPath("sub/a/b/c.txt", root)).toBe(join(root, "sub", "a", "b", "c.txt"));
  });

  it("rejects dangling symlinks", async () => {
    await symlink(join(outside, "missing.txt"), join(root, "dangling.txt"));
    await expect(resolveScopedPath("dangling.txt", root)).rejects.toMatchObject({
      kind: "forbidden-file-access",
    });
  });

  it("treats a missing grant as a violation", async () => {
    await expect(resolveGrantedPath("a.txt", undefined)).rejects.toMatchObject({
      kind: "forbidden-file-access",
      message: 'File access to "a.txt" denied: no working directory granted',
    });
  });

  it("isWithinRoot compares whole path segments", () => {
    expect(isWithinRoot("/data/work", "/data/work")).toBe(true);
    expect(isWithinRoot("/data/work/a", "/data/work")).toBe(true);
    expect(isWithinRoot("/data/workshop", "/data/work")).toBe(false);
  });
});

import { resolve, normalize, dirname, join, sep } from "node:path";
import { realpath, lstat } from "node:fs/promises";
import { createTaggedError } from "../core/Retry.js";

/**
 * Resolve an input path to an absolute path inside the granted directory.
 * Throws forbidden-file-access when the resolved path escapes it.
 *
 * Symlinks are resolved on the nearest existing ancestor, so a write target
 * under a linked directory that does not exist yet is checked where it lands.
 */
export async function resolveScopedPath(inputPath: string, scopeRoot: string): Promise<string> {
  // macOS /var -> /private/var and similar platform symlinks
  const root = await realpathOr(resolve(scopeRoot), normalize(resolve(scopeRoot)));
  const resolved = resolve(root, inputPath);

  const real = await realpathOfNearest(resolved);

  if (!isWithinRoot(real, root)) {
    throw createTaggedError(
      "forbidden-file-access",
      `Path "${inputPath}" resolves to "${real}" which is outside "${root}"`,
      { inputPath, resolvedPath: real, scopeRoot: root },
    );
  }

  return real;
}

/**
 * Same as resolveScopedPath, but a missing grant is itself a violation.
 */
export async function resolveGrantedPath(
  inputPath: string,
  workDir: string | undefined,
): Promise<string> {
  if (!workDir) {
    throw createTaggedError(
      "forbidden-file-access",
      `File access to "${inputPath}" denied: no working directory granted`,
      { inputPath },
    );
  }
  return resolveScopedPath(inputPath, workDir);
}

export function isWithinRoot(path: string, root: string): boolean {
  const normalizedPath = normalize(path);
  const normalizedRoot = normalize(root);
  return normalizedPath === normalizedRoot || normalizedPath.startsWith(normalizedRoot + sep);
}

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

async function realpathOfNearest(path: string): Promise<string> {
  const missing: string[] = [];
  let current = path;
  while (!(await exists(current))) {
    const parent = dirname(current);
    if (parent === current) return normalize(path);
    missing.unshift(current.slice(parent.length).replace(/^[\\/]+/, ""));
    current = parent;
  }
  try {
    return join(await realpath(current), ...missing);
  } catch (error) {
    // dangling symlink: its target cannot be checked
    throw createTaggedError("forbidden-file-access", `Path "${path}" has an unresolvable link`, {
      resolvedPath: current,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

async function realpathOr(path: string, fallback: string): Promise<string> {
  try {
    return await realpath(path);
  } catch {
    return fallback;
  }
}

import { createRequire } from "node:module";
import { createTaggedError } from "../core/Retry.js";

const hostRequire = createRequire(import.meta.url);

/**
 * Modules inline code may load when no allow-list is configured.
 */
export const DEFAULT_ALLOWED_MODULES: readonly string[] = [
  "node:path",
  "node:querystring",
  "node:assert",
  "path",
  "querystring",
  "assert",
];

/**
 * Host OS, process, file and network modules. Never loadable, whatever the config says.
 */
const ALWAYS_DENIED = new Set([
  "fs",
  "fs/promises",
  "child_process",
  "cluster",
  "dgram",
  "dns",
  "http",
  "http2",
  "https",
  "inspector",
  "module",
  "net",
  "os",
  "process",
  "repl",
  "tls",
  "v8",
  "vm",
  "worker_threads",
]);

/**
 * Shape of a module as seen from inside the sandbox: its callable members
 * and its JSON-representable constants.
 */
export interface ModuleShape {
  callable: boolean;
  functions: string[];
  constants: Record<string, string | number | boolean | null>;
}

export function isAlwaysDenied(name: string): boolean {
  return ALWAYS_DENIED.has(name.startsWith("node:") ? name.slice("node:".length) : name);
}

/**
 * Build the effective allow-list: configured names minus the always-denied set.
 */
export function buildAllowList(configured: readonly string[] = DEFAULT_ALLOWED_MODULES): Set<string> {
  return new Set(configured.filter((name) => !isAlwaysDenied(name)));
}

/**
 * Host side of `require` inside the sandbox. Modules never cross the
 * boundary; only their shape does, and member calls are relayed with JSON
 * arguments and JSON results.
 */
export class ModuleHost {
  private readonly loaded = new Map<string, unknown>();

  constructor(private readonly allowed: ReadonlySet<string>) {}

  isAllowed(name: string): boolean {
    return this.allowed.has(name) && !isAlwaysDenied(name);
  }

  describe(name: string): ModuleShape {
    const mod = this.load(name);
    const shape: ModuleShape = { callable: typeof mod === "function", functions: [], constants: {} };
    if (mod === null || (typeof mod !== "object" && typeof mod !== "function")) {
      return shape;
    }
    for (const key of Object.keys(mod).sort()) {
      const value: unknown = Reflect.get(mod, key);
      if (typeof value === "function") {
        shape.functions.push(key);
      } else if (
        value === null ||
        typeof value === "string" ||
        typeof value === "number" ||
        typeof value === "boolean"
      ) {
        shape.constants[key] = value;
      }
    }
    return shape;
  }

  /**
   * Call a member (or the module itself, for member "") with JSON arguments.
   */
  invoke(name: string, member: string, args: unknown[]): unknown {
    const mod = this.load(name);
    const target: unknown =
      member === ""
        ? mod
        : mod !== null && (typeof mod === "object" || typeof mod === "function")
          ? Reflect.get(mod, member)
          : undefined;
    if (typeof target !== "function") {
      throw new Error(`${name}${member ? `.${member}` : ""} is not a function`);
    }
    return Reflect.apply(target, mod, args);
  }

  private load(name: string): unknown {
    if (!this.isAllowed(name)) {
      throw createTaggedError("forbidden-import", `Module "${name}" is not allowed`, { module: name });
    }
    if (!this.loaded.has(name)) {
      this.loaded.set(name, hostRequire(name));
    }
    return this.loaded.get(name);
  }
}

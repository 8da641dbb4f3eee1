import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import type { AgentFlowOptions, EngineSettings } from "../engine/AgentFlow.js";
import type { SandboxConfig } from "../sandbox/StepExecutor.js";
import type { BuiltinToolsConfig } from "../builtin-tools/types.js";
import type { RetryPolicy } from "../types/Workflow.js";
import type { DebugOptions, LogLevel } from "../observability/Logger.js";

/** Default config filename used when no path is given (CLI). */
export const DEFAULT_CONFIG_FILE = "agent-flow.yaml";

export interface EngineConfigLoadResult {
  configPath: string;
  rawConfig: unknown;
  options: AgentFlowOptions;
}

type Section = Record<string, unknown>;

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

/**
 * Map a parsed config document to facade options. Relative paths resolve
 * against `configDir`. Values of the wrong type are rejected with the key
 * that holds them.
 */
export function mapEngineConfig(raw: unknown, configDir: string): AgentFlowOptions {
  const config = section(raw, "config");
  const engine = section(config.engine, "engine");
  const registry = section(config.registry, "registry");
  const sandbox = section(config.sandbox, "sandbox");
  const builtin = section(config.builtinTools, "builtinTools");
  const debug = section(config.debug, "debug");

  const engineSettings: EngineSettings = {
    maxParallelism: optionalNumber(engine.maxParallelism, "engine.maxParallelism"),
    defaultTimeoutMs: optionalNumber(engine.defaultTimeoutMs, "engine.defaultTimeoutMs"),
    defaultRetry:
      engine.defaultRetry === undefined ? undefined : mapRetry(engine.defaultRetry, "engine.defaultRetry"),
    toolResolution: optionalEnum(engine.toolResolution, ["strict", "deferred"], "engine.toolResolution"),
  };

  const sandboxConfig: Partial<SandboxConfig> = {
    allowedModules: optionalStringList(sandbox.allowedModules, "sandbox.allowedModules"),
    workDir: optionalPath(sandbox.workDir, configDir, "sandbox.workDir"),
    memoryLimitMb: optionalNumber(sandbox.memoryLimitMb, "sandbox.memoryLimitMb"),
    maxOutputBytes: optionalNumber(sandbox.maxOutputBytes, "sandbox.maxOutputBytes"),
    maxToolCalls: optionalNumber(sandbox.maxToolCalls, "sandbox.maxToolCalls"),
    codeToolCalls: optionalBoolean(sandbox.codeToolCalls, "sandbox.codeToolCalls"),
  };

  const builtinTools: Partial<BuiltinToolsConfig> & { enabled?: boolean } = {
    enabled: optionalBoolean(builtin.enabled, "builtinTools.enabled"),
    workDir: optionalPath(builtin.workDir, configDir, "builtinTools.workDir"),
    maxReadBytes: optionalNumber(builtin.maxReadBytes, "builtinTools.maxReadBytes"),
  };

  const debugOptions: DebugOptions = {
    enabled: optionalBoolean(debug.enabled, "debug.enabled"),
    level: optionalEnum(debug.level, LOG_LEVELS, "debug.level"),
    includeArgs: optionalBoolean(debug.includeArgs, "debug.includeArgs"),
    includeResults: optionalBoolean(debug.includeResults, "debug.includeResults"),
    logEvents: optionalBoolean(debug.logEvents, "debug.logEvents"),
  };

  return {
    engine: compact(engineSettings),
    registry: compact({ ttlMs: optionalNumber(registry.ttlMs, "registry.ttlMs") }),
    sandbox: compact(sandboxConfig),
    builtinTools: compact(builtinTools),
    maxEvents: optionalNumber(config.maxEvents, "maxEvents"),
    debug: compact(debugOptions),
  };
}

export async function loadEngineConfig(configPath: string): Promise<EngineConfigLoadResult> {
  const resolvedPath = path.resolve(process.cwd(), configPath);
  const rawConfigText = await fs.readFile(resolvedPath, "utf-8");
  const rawConfig = yaml.load(rawConfigText) ?? {};
  const options = mapEngineConfig(rawConfig, path.dirname(resolvedPath));
  return {
    configPath: resolvedPath,
    rawConfig,
    options,
  };
}

function mapRetry(value: unknown, key: string): Partial<RetryPolicy> {
  const retry = section(value, key);
  return compact({
    maxRetries: optionalNumber(retry.maxRetries, `${key}.maxRetries`),
    backoff: optionalEnum(retry.backoff, ["fixed", "exponential"], `${key}.backoff`),
    delayMs: optionalNumber(retry.delayMs, `${key}.delayMs`),
  });
}

function section(value: unknown, key: string): Section {
  if (value === undefined || value === null) return {};
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`Invalid config: ${key} must be a mapping`);
  }
  return Object.fromEntries(Object.entries(value));
}

function optionalNumber(value: unknown, key: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Invalid config: ${key} must be a number`);
  }
  return value;
}

function optionalBoolean(value: unknown, key: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`Invalid config: ${key} must be true or false`);
  }
  return value;
}

function optionalEnum<T extends string>(value: unknown, allowed: readonly T[], key: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Invalid config: ${key} must be one of ${allowed.join(", ")}`);
  }
  return match;
}

function optionalStringList(value: unknown, key: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    throw new Error(`Invalid config: ${key} must be a list of strings`);
  }
  return value.map(String);
}

function optionalPath(value: unknown, configDir: string, key: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid config: ${key} must be a path`);
  }
  return path.isAbsolute(value) ? value : path.resolve(configDir, value);
}

/** Drop keys whose value is undefined so defaults further down still apply. */
function compact<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      out[key] = value[key];
    }
  }
  return out;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

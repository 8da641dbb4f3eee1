export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export interface DebugOptions {
  enabled?: boolean;
  level?: LogLevel;
  /** Log validated tool arguments (redacted) */
  includeArgs?: boolean;
  /** Log a summary of each tool result */
  includeResults?: boolean;
  /** Mirror lifecycle events into the log */
  logEvents?: boolean;
  prefix?: string;
}

export type ResolvedDebugOptions = Required<DebugOptions>;

/**
 * One line handed to a sink. `fields` holds the bound context merged with
 * the call's metadata.
 */
export interface LogRecord {
  level: Exclude<LogLevel, "silent">;
  prefix: string;
  message: string;
  fields: Record<string, unknown>;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  readonly options: ResolvedDebugOptions;
  /** Same sink and level under a different prefix */
  child(prefix: string): Logger;
  /** Same prefix, with fields attached to every record */
  with(fields: Record<string, unknown>): Logger;
  isEnabled(level: LogLevel): boolean;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  trace(message: string, meta?: Record<string, unknown>): void;
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const REDACTED_KEYS = /"(password|token|secret|key|auth)":\s*"[^"]*"/gi;

/**
 * Writes `[prefix] [LEVEL] message {fields}` to the console method that
 * matches the level.
 */
export const consoleSink: LogSink = ({ level, prefix, message, fields }) => {
  const meta = Object.keys(fields).length > 0 ? ` ${sanitizeForLog(fields, 1000)}` : "";
  const line = `[${prefix}] [${level.toUpperCase()}] ${message}${meta}`;
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else if (level === "info") console.info(line);
  else console.log(line);
};

/**
 * Level-gated logger. Silent unless enabled by options or by
 * AGENT_FLOW_LOG_LEVEL / AGENT_FLOW_DEBUG / DEBUG.
 */
export function createLogger(options: DebugOptions = {}, sink: LogSink = consoleSink): Logger {
  return buildLogger(resolveDebugOptions(options), sink, {});
}

function buildLogger(
  resolved: ResolvedDebugOptions,
  sink: LogSink,
  bound: Record<string, unknown>,
): Logger {
  const isEnabled = (level: LogLevel) =>
    resolved.enabled && level !== "silent" && SEVERITY[level] <= SEVERITY[resolved.level];

  const emit = (level: LogRecord["level"]) => (message: string, meta?: Record<string, unknown>) => {
    if (!isEnabled(level)) return;
    sink({ level, prefix: resolved.prefix, message, fields: { ...bound, ...meta } });
  };

  return {
    options: resolved,
    child: (prefix) => buildLogger({ ...resolved, prefix }, sink, bound),
    with: (fields) => buildLogger(resolved, sink, { ...bound, ...fields }),
    isEnabled,
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
    trace: emit("trace"),
  };
}

export function resolveDebugOptions(options: DebugOptions = {}): ResolvedDebugOptions {
  const envLevel = levelFromEnv(process.env);
  const enabled = options.enabled ?? (envLevel !== undefined && envLevel !== "silent");
  return {
    enabled,
    level: options.level ?? envLevel ?? (enabled ? "debug" : "silent"),
    includeArgs: options.includeArgs ?? false,
    includeResults: options.includeResults ?? false,
    logEvents: options.logEvents ?? false,
    prefix: options.prefix ?? "agent-flow",
  };
}

/**
 * JSON text of a value, cut at `maxLen`, with secret-looking string fields
 * replaced.
 */
export function sanitizeForLog(value: unknown, maxLen = 500): string {
  return clip(stringify(value), maxLen).replace(REDACTED_KEYS, "\"$1\":\"[REDACTED]\"");
}

/** Shape of a value without its content: `Array(3)`, `Object(keys: a, b)`. */
export function summarizeForLog(value: unknown, maxLen = 200): string {
  if (typeof value === "string") return clip(value, maxLen);
  if (Array.isArray(value)) return `Array(${value.length})`;
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value);
    const more = keys.length > 5 ? ", ..." : "";
    return `Object(keys: ${keys.slice(0, 5).join(", ")}${more})`;
  }
  return String(value);
}

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // cycles, BigInt
    return String(value);
  }
}

function clip(text: string, maxLen: number): string {
  return text.length > maxLen ? `${text.slice(0, maxLen)}...` : text;
}

const ENV_LEVELS: ReadonlyArray<[string, LogLevel]> = [
  ["trace", "trace"],
  ["debug", "debug"],
  ["info", "info"],
  ["warn", "warn"],
  ["error", "error"],
  ["silent", "silent"],
];

function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = env.AGENT_FLOW_LOG_LEVEL ?? env.AGENT_FLOW_DEBUG ?? env.DEBUG;
  if (raw === undefined) return undefined;
  const value = raw.trim().toLowerCase();
  if (value === "" || value === "0" || value === "false" || value === "off") return "silent";
  if (value === "1" || value === "true" || value === "yes") return "debug";
  return ENV_LEVELS.find(([needle]) => value.includes(needle))?.[1] ?? "debug";
}

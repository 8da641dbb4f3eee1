import { readFile, writeFile, readdir, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import pTimeout from "p-timeout";
import type { SandboxResult, StepError, ViolationKind } from "../types/Sandbox.js";
import { createTaggedError, isTaggedError } from "../core/Retry.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import { analyzeCode } from "./CodeAnalyzer.js";
import { launchBridge, type BridgeHost } from "./ContextBridge.js";
import { ModuleHost, buildAllowList, DEFAULT_ALLOWED_MODULES } from "./modules.js";
import { resolveGrantedPath } from "./pathScope.js";
import { isViolationKind } from "./ToolCaller.js";

export const STEP_FILENAME = "step-code.js";

const MAX_DIAGNOSTIC_LINES = 1_000;

export interface CodeSandboxOptions {
  /** Modules inline code may require or import */
  allowedModules?: readonly string[];
  logger?: Logger;
}

export interface CodeRunLimits {
  timeoutMs: number;
  memoryLimitMb: number;
  maxOutputBytes: number;
  maxToolCalls: number;
  workDir?: string;
  signal?: AbortSignal;
}

export interface CodeRunServices {
  /** Present when inline code may call tools */
  callTool?: (name: string, args: unknown) => Promise<unknown>;
}

interface Violation {
  kind: ViolationKind;
  message: string;
}

interface ThrownDescription {
  name: string;
  message: string;
  stack: string;
}

/**
 * Per-run host state behind the bridge: deadline, tool budget and the first
 * recorded violation.
 */
class SandboxSession implements BridgeHost {
  readonly diagnostics: string[] = [];
  violation?: Violation;
  cancelled = false;
  toolCalls = 0;
  private abortMessage?: string;
  private finished = false;
  readonly deadline: number;
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private readonly onTrip: Array<() => void> = [];

  constructor(
    private readonly limits: CodeRunLimits,
    private readonly services: CodeRunServices,
    private readonly modules: ModuleHost,
    private readonly logger: Logger,
  ) {
    this.deadline = Date.now() + limits.timeoutMs;
  }

  /** Resolves as soon as a violation or cancellation is recorded. */
  readonly tripped = new Promise<void>((resolve) => {
    this.onTrip.push(resolve);
  });

  trip(kind: ViolationKind, message: string): void {
    this.violation ??= { kind, message };
    this.halt(message);
  }

  cancel(): void {
    this.cancelled = true;
    this.halt("Step cancelled");
  }

  finish(): void {
    this.finished = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  remainingMs(): number {
    return Math.max(0, this.deadline - Date.now());
  }

  log(line: string): void {
    if (this.diagnostics.length < MAX_DIAGNOSTIC_LINES) {
      this.diagnostics.push(line);
    }
  }

  checkpoint(): string {
    if (this.abortMessage !== undefined) {
      return this.abortMessage;
    }
    if (Date.now() > this.deadline) {
      this.trip("resource-limit", `Execution time limit of ${this.limits.timeoutMs}ms exceeded`);
    }
    return this.abortMessage ?? "";
  }

  call(op: unknown, payload: unknown): string {
    if (typeof op !== "string" || typeof payload !== "string") {
      return "EInvalid sandbox call";
    }
    try {
      switch (op) {
        case "log": {
          const entry: unknown = JSON.parse(payload);
          if (Array.isArray(entry) && typeof entry[0] === "string" && typeof entry[1] === "string") {
            this.log(entry[0] === "log" ? entry[1] : `[${entry[0]}] ${entry[1]}`);
          }
          return "V";
        }
        case "checkpoint":
          return this.checkpoint();
        case "require":
          return encodeValue(this.requireModule(payload));
        case "module": {
          const request: unknown = JSON.parse(payload);
          if (
            !Array.isArray(request) ||
            typeof request[0] !== "string" ||
            typeof request[1] !== "string" ||
            !Array.isArray(request[2])
          ) {
            return "EMalformed module call";
          }
          return encodeValue(this.modules.invoke(request[0], request[1], request[2]));
        }
        default:
          return `EUnknown sandbox operation: ${op}`;
      }
    } catch (error) {
      return `E${errorMessage(error)}`;
    }
  }

  async callAsync(op: unknown, payload: unknown): Promise<string> {
    if (typeof op !== "string" || typeof payload !== "string") {
      return "EInvalid sandbox call";
    }
    if (this.abortMessage !== undefined) {
      return `E${this.abortMessage}`;
    }
    if (this.finished) {
      return "ESandbox session is closed";
    }
    try {
      return encodeValue(await this.runAsync(op, payload));
    } catch (error) {
      return `E${errorMessage(error)}`;
    }
  }

  private requireModule(name: string): unknown {
    if (!this.modules.isAllowed(name)) {
      const message = `Module "${name}" is not allowed`;
      this.trip("forbidden-import", message);
      throw new Error(message);
    }
    return this.modules.describe(name);
  }

  private async runAsync(op: string, payload: string): Promise<unknown> {
    const request: unknown = JSON.parse(payload);
    switch (op) {
      case "files.read": {
        const path = await this.scopedPath(request);
        return readFile(path, "utf-8");
      }
      case "files.write": {
        const path = await this.scopedPath(request);
        const text = field(request, "text");
        if (typeof text !== "string") {
          throw new Error("files.write expects text content");
        }
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, text, "utf-8");
        return { path: field(request, "path"), bytes: Buffer.byteLength(text, "utf-8") };
      }
      case "files.list": {
        const path = await this.scopedPath(request);
        return (await readdir(path)).sort();
      }
      case "tools.call":
        return this.callTool(request);
      case "sleep": {
        const ms = typeof request === "number" ? Math.max(0, request) : 0;
        return new Promise<void>((resolve) => {
          const timer = setTimeout(() => {
            this.timers.delete(timer);
            resolve();
          }, ms);
          this.timers.add(timer);
        });
      }
      default:
        throw new Error(`Unknown sandbox operation: ${op}`);
    }
  }

  private async scopedPath(request: unknown): Promise<string> {
    const path = field(request, "path");
    if (typeof path !== "string") {
      throw new Error("File operations expect a string path");
    }
    try {
      return await resolveGrantedPath(path, this.limits.workDir);
    } catch (error) {
      if (isTaggedError(error) && error.kind === "forbidden-file-access") {
        this.trip("forbidden-file-access", error.message);
      }
      throw error;
    }
  }

  private async callTool(request: unknown): Promise<unknown> {
    const { callTool } = this.services;
    const name = field(request, "name");
    if (!callTool) {
      throw new Error("Tool calls are disabled for inline code");
    }
    if (typeof name !== "string") {
      throw new Error("tools.call expects a tool name");
    }
    if (++this.toolCalls > this.limits.maxToolCalls) {
      const message = `Tool call limit of ${this.limits.maxToolCalls} exceeded`;
      this.trip("resource-limit", message);
      throw createTaggedError("resource-limit", message);
    }
    try {
      return await callTool(name, field(request, "args"));
    } catch (error) {
      if (isTaggedError(error) && error.kind === "forbidden-file-access") {
        this.trip("forbidden-file-access", error.message);
      }
      throw error;
    }
  }

  private halt(message: string): void {
    this.abortMessage ??= message;
    for (const resolve of this.onTrip.splice(0)) {
      resolve();
    }
  }
}

/**
 * Runs inline step code in a fresh `node:vm` context with string and wasm
 * code generation disabled. Code is checked and instrumented first; at run
 * time it only sees the bridge globals (`inputs`, `console`, `require`,
 * `files`, `sleep` and, when enabled, `tools`).
 */
export class CodeSandbox {
  private readonly allowList: Set<string>;
  private readonly modules: ModuleHost;
  private readonly logger: Logger;

  constructor(options: CodeSandboxOptions = {}) {
    this.allowList = buildAllowList(options.allowedModules ?? DEFAULT_ALLOWED_MODULES);
    this.modules = new ModuleHost(this.allowList);
    this.logger = options.logger ?? createLogger({ prefix: "CodeSandbox" });
  }

  /**
   * Effective module allow-list.
   */
  get allowedModules(): ReadonlySet<string> {
    return this.allowList;
  }

  async run(
    code: string,
    inputs: Record<string, unknown>,
    limits: CodeRunLimits,
    services: CodeRunServices = {},
  ): Promise<SandboxResult> {
    const startedAt = Date.now();
    const finish = (partial: Omit<SandboxResult, "durationMs" | "resourceLimitExceeded" | "toolCalls">, toolCalls = 0): SandboxResult => ({
      ...partial,
      resourceLimitExceeded: partial.violation === "resource-limit",
      durationMs: Date.now() - startedAt,
      toolCalls,
    });

    const analysis = analyzeCode(code, this.allowList);
    if (!analysis.ok) {
      const { kind, message, line, column } = analysis.finding;
      const error: StepError = { kind, message, details: line !== undefined ? { line, column } : undefined };
      return finish({
        success: false,
        output: null,
        diagnostics: [line !== undefined ? `${message} (line ${line})` : message],
        error,
        violation: isViolationKind(kind) ? kind : undefined,
      });
    }

    if (limits.signal?.aborted) {
      return finish({
        success: false,
        output: null,
        diagnostics: [],
        error: { kind: "cancelled", message: "Step cancelled before it started" },
      });
    }

    const session = new SandboxSession(limits, services, this.modules, this.logger);
    const onAbort = () => session.cancel();
    limits.signal?.addEventListener("abort", onAbort, { once: true });

    let tagged: string | undefined;
    try {
      tagged = await this.execute(analysis.code, inputs, limits, session, services);
    } finally {
      session.finish();
      limits.signal?.removeEventListener("abort", onAbort);
    }

    const result = this.classify(tagged, session, limits);
    this.logger.debug("Inline code finished", {
      success: result.success,
      kind: result.error?.kind,
      toolCalls: session.toolCalls,
    });
    return finish(result, session.toolCalls);
  }

  private async execute(
    instrumented: string,
    inputs: Record<string, unknown>,
    limits: CodeRunLimits,
    session: SandboxSession,
    services: CodeRunServices,
  ): Promise<string | undefined> {
    const timeLimit = `Execution time limit of ${limits.timeoutMs}ms exceeded`;
    const worker = launchBridge(session, {
      inputsJson: JSON.stringify(inputs),
      exposeTools: services.callTool !== undefined,
      // Same first line as the source, so reported line numbers match it.
      code: `(async function () { "use strict"; ${instrumented}\n}).call(undefined)`,
      filename: STEP_FILENAME,
      deadline: session.deadline,
      timeoutMs: limits.timeoutMs,
      memoryLimitMb: limits.memoryLimitMb,
    });

    const stopped = session.tripped.then(() => undefined);
    try {
      const outcome = await pTimeout(Promise.race([worker.outcome, stopped]), {
        milliseconds: session.remainingMs(),
        message: timeLimit,
      });
      if (outcome === undefined) {
        return undefined;
      }
      if (outcome.kind === "settled") {
        return outcome.tagged;
      }
      if (outcome.kind === "crashed") {
        return `E${JSON.stringify({ name: "Error", message: outcome.message, stack: "" })}`;
      }
      session.trip(
        "resource-limit",
        outcome.kind === "timeout" ? timeLimit : `Memory limit of ${limits.memoryLimitMb}MB exceeded`,
      );
      return undefined;
    } catch (error) {
      session.trip("resource-limit", errorMessage(error));
      return undefined;
    } finally {
      await worker.terminate();
    }
  }

  private classify(
    tagged: string | undefined,
    session: SandboxSession,
    limits: CodeRunLimits,
  ): Omit<SandboxResult, "durationMs" | "resourceLimitExceeded" | "toolCalls"> {
    const diagnostics = session.diagnostics;
    const fail = (error: StepError, violation?: ViolationKind) => {
      diagnostics.push(`${error.kind}: ${error.message}`);
      return { success: false, output: null, diagnostics, error, violation };
    };

    if (session.violation) {
      const { kind, message } = session.violation;
      return fail({ kind, message }, kind);
    }
    if (session.cancelled) {
      return fail({ kind: "cancelled", message: "Step cancelled" });
    }
    if (tagged === undefined) {
      return fail({ kind: "code-error", message: "Step code did not settle" });
    }

    const tag = tagged[0];
    const body = tagged.slice(1);
    if (tag === "V") {
      const bytes = Buffer.byteLength(body, "utf-8");
      if (bytes > limits.maxOutputBytes) {
        const message = `Output of ${bytes} bytes exceeds limit of ${limits.maxOutputBytes} bytes`;
        return fail({ kind: "resource-limit", message }, "resource-limit");
      }
      const output: unknown = JSON.parse(body);
      return { success: true, output, diagnostics };
    }
    if (tag === "X") {
      return fail({ kind: "output-invalid", message: `Step output is not JSON-serialisable: ${body}` });
    }

    const thrown = parseThrown(body);
    if (thrown.name === "EvalError") {
      return fail(
        { kind: "forbidden-eval", message: `Dynamic code generation is disabled: ${thrown.message}` },
        "forbidden-eval",
      );
    }
    if (thrown.name === "RangeError" && thrown.message.includes("Maximum call stack")) {
      return fail({ kind: "resource-limit", message: thrown.message }, "resource-limit");
    }
    const line = stepLine(thrown.stack);
    return fail({
      kind: "code-error",
      message: `${thrown.name}: ${thrown.message}`,
      details: line !== undefined ? { line } : undefined,
    });
  }
}

function encodeValue(value: unknown): string {
  const json = JSON.stringify(value);
  return json === undefined ? "V" : `V${json}`;
}

function field(request: unknown, key: string): unknown {
  return request !== null && typeof request === "object" ? Reflect.get(request, key) : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseThrown(body: string): ThrownDescription {
  try {
    const parsed: unknown = JSON.parse(body);
    const name = field(parsed, "name");
    const message = field(parsed, "message");
    const stack = field(parsed, "stack");
    return {
      name: typeof name === "string" ? name : "Error",
      message: typeof message === "string" ? message : body,
      stack: typeof stack === "string" ? stack : "",
    };
  } catch {
    return { name: "Error", message: body, stack: "" };
  }
}

function stepLine(stack: string): number | undefined {
  const match = new RegExp(`${STEP_FILENAME.replace(".", "\\.")}:(\\d+)`).exec(stack);
  return match?.[1] !== undefined ? Number(match[1]) : undefined;
}

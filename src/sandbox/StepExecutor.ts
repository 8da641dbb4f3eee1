import type { Step } from "../types/Workflow.js";
import type { ExecutionLimits, SandboxResult, StepError } from "../types/Sandbox.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import { SchemaValidator } from "../core/SchemaValidator.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import { analyzeCode, type CodeAnalysis } from "./CodeAnalyzer.js";
import { CodeSandbox } from "./CodeSandbox.js";
import { DEFAULT_ALLOWED_MODULES } from "./modules.js";
import { ToolCaller, isViolationKind, toStepError } from "./ToolCaller.js";

/**
 * Sandbox settings shared by every code step.
 */
export interface SandboxConfig {
  /** Modules inline code may import (always-denied modules are dropped) */
  allowedModules: readonly string[];
  memoryLimitMb: number;
  maxOutputBytes: number;
  /** Tool calls a single code step may make */
  maxToolCalls: number;
  /** Expose `tools.call` to inline code */
  codeToolCalls: boolean;
  /** Directory granted for file access when the step limits name none */
  workDir?: string;
}

export const DEFAULT_SANDBOX_CONFIG: SandboxConfig = {
  allowedModules: DEFAULT_ALLOWED_MODULES,
  memoryLimitMb: 256,
  maxOutputBytes: 1024 * 1024,
  maxToolCalls: 10,
  codeToolCalls: true,
};

export interface StepExecutorOptions {
  registry: ToolRegistry;
  validator?: SchemaValidator;
  logger?: Logger;
  sandbox?: Partial<SandboxConfig>;
}

/**
 * Executes one step, either a registry tool or inline code, under the given
 * limits. Never throws: every outcome is a SandboxResult.
 */
export class StepExecutor {
  readonly config: SandboxConfig;
  private readonly toolCaller: ToolCaller;
  private readonly sandbox: CodeSandbox;
  private readonly logger: Logger;

  constructor(options: StepExecutorOptions) {
    this.config = { ...DEFAULT_SANDBOX_CONFIG, ...options.sandbox };
    this.logger = options.logger ?? createLogger({ prefix: "StepExecutor" });
    this.toolCaller = new ToolCaller({
      registry: options.registry,
      validator: options.validator,
      logger: this.logger,
    });
    this.sandbox = new CodeSandbox({
      allowedModules: this.config.allowedModules,
      logger: this.logger,
    });
  }

  /**
   * Static check of inline code against this executor's allow-list.
   */
  analyze(code: string): CodeAnalysis {
    return analyzeCode(code, this.sandbox.allowedModules);
  }

  async execute(
    step: Step,
    inputs: Record<string, unknown>,
    limits: ExecutionLimits,
  ): Promise<SandboxResult> {
    this.logger.debug("Executing step", { stepId: step.id, kind: step.kind, runId: limits.runId });
    try {
      return step.kind === "tool"
        ? await this.executeTool(step.id, step.tool, inputs, limits)
        : await this.executeCode(step.id, step.code, inputs, limits);
    } catch (error) {
      // Only reachable on a defect in the sandbox itself
      this.logger.error("Step execution crashed", {
        stepId: step.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return failure(toStepError(error, step.kind === "tool" ? "tool-error" : "code-error"), 0);
    }
  }

  private async executeTool(
    stepId: string,
    tool: string,
    inputs: Record<string, unknown>,
    limits: ExecutionLimits,
  ): Promise<SandboxResult> {
    const startedAt = Date.now();
    try {
      const output = await this.toolCaller.call(tool, inputs, {
        runId: limits.runId ?? "",
        stepId,
        signal: limits.signal,
        workDir: limits.workDir ?? this.config.workDir,
        timeoutMs: limits.timeoutMs,
      });
      return {
        success: true,
        output,
        diagnostics: [],
        resourceLimitExceeded: false,
        durationMs: Date.now() - startedAt,
        toolCalls: 1,
      };
    } catch (error) {
      return failure(toStepError(error, "tool-error"), Date.now() - startedAt, 1);
    }
  }

  private executeCode(
    stepId: string,
    code: string,
    inputs: Record<string, unknown>,
    limits: ExecutionLimits,
  ): Promise<SandboxResult> {
    const workDir = limits.workDir ?? this.config.workDir;
    const callTool = this.config.codeToolCalls
      ? (name: string, args: unknown) =>
          this.toolCaller.call(name, args, {
            runId: limits.runId ?? "",
            stepId,
            signal: limits.signal,
            workDir,
            timeoutMs: limits.timeoutMs,
          })
      : undefined;

    return this.sandbox.run(
      code,
      inputs,
      {
        timeoutMs: limits.timeoutMs,
        memoryLimitMb: limits.memoryLimitMb ?? this.config.memoryLimitMb,
        maxOutputBytes: limits.maxOutputBytes ?? this.config.maxOutputBytes,
        maxToolCalls: limits.maxToolCalls ?? this.config.maxToolCalls,
        workDir,
        signal: limits.signal,
      },
      { callTool },
    );
  }
}

function failure(error: StepError, durationMs: number, toolCalls = 0): SandboxResult {
  const violation = isViolationKind(error.kind) ? error.kind : undefined;
  return {
    success: false,
    output: null,
    diagnostics: [`${error.kind}: ${error.message}`],
    error,
    violation,
    resourceLimitExceeded: error.kind === "resource-limit",
    durationMs,
    toolCalls,
  };
}

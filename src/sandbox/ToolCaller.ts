import pTimeout from "p-timeout";
import type { ToolCallContext, ToolDescriptor } from "../types/ToolDescriptor.js";
import type { StepError, StepErrorKind, ViolationKind } from "../types/Sandbox.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import { SchemaValidator, SchemaValidationError } from "../core/SchemaValidator.js";
import { createTaggedError, isTaggedError } from "../core/Retry.js";
import { createLogger, sanitizeForLog, summarizeForLog, type Logger } from "../observability/Logger.js";

export interface ToolCallerDependencies {
  registry: ToolRegistry;
  validator?: SchemaValidator;
  logger?: Logger;
}

export interface ToolCallOptions extends ToolCallContext {
  timeoutMs: number;
}

const STEP_ERROR_KINDS: ReadonlySet<string> = new Set<StepErrorKind>([
  "forbidden-import",
  "forbidden-eval",
  "forbidden-file-access",
  "resource-limit",
  "code-error",
  "tool-error",
  "tool-not-found",
  "source-unreachable",
  "input-invalid",
  "output-invalid",
  "unbound-input",
  "cancelled",
]);

const VIOLATION_KINDS: ReadonlySet<string> = new Set<ViolationKind>([
  "forbidden-import",
  "forbidden-eval",
  "forbidden-file-access",
  "resource-limit",
]);

export function isStepErrorKind(kind: string): kind is StepErrorKind {
  return STEP_ERROR_KINDS.has(kind);
}

export function isViolationKind(kind: string): kind is ViolationKind {
  return VIOLATION_KINDS.has(kind);
}

/**
 * Classify a thrown value as a step error. Untagged errors get the fallback kind.
 */
export function toStepError(error: unknown, fallback: StepErrorKind): StepError {
  if (isTaggedError(error) && isStepErrorKind(error.kind)) {
    return { kind: error.kind, message: error.message, details: error.details };
  }
  return {
    kind: fallback,
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Pipeline step: Resolve tool from registry.
 */
export async function resolveTool(
  toolName: string,
  registry: ToolRegistry,
  logger: Logger,
): Promise<ToolDescriptor> {
  const resolution = await registry.resolve(toolName);
  if (!resolution.ok) {
    throw createTaggedError(resolution.error.kind, resolution.error.message, resolution.error.details);
  }
  if (resolution.stale) {
    logger.warn("Invoking tool with stale descriptor", { tool: toolName });
  }
  return resolution.descriptor;
}

/**
 * Pipeline step: Validate input against schema.
 */
export function validateInput(
  descriptor: ToolDescriptor,
  args: unknown,
  validator: SchemaValidator,
): unknown {
  try {
    return validator.validateOrThrow(
      descriptor.inputSchema,
      args,
      `Input validation failed for ${descriptor.name}`,
    );
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw createTaggedError("input-invalid", error.message, { errors: error.errors });
    }
    throw error;
  }
}

/**
 * Pipeline step: Invoke the owning source under a wall-clock limit.
 */
export async function invokeTool(
  descriptor: ToolDescriptor,
  args: unknown,
  options: ToolCallOptions,
  registry: ToolRegistry,
): Promise<unknown> {
  const source = registry.getSource(descriptor.source);
  if (!source) {
    throw createTaggedError(
      "tool-not-found",
      `Tool source ${descriptor.source} for ${descriptor.name} is no longer registered`,
    );
  }

  const { timeoutMs, ...ctx } = options;
  try {
    const { result } = await pTimeout(source.invoke(descriptor, args, ctx), {
      milliseconds: timeoutMs,
      signal: options.signal,
      message: `Tool ${descriptor.name} timed out after ${timeoutMs}ms`,
    });
    return result;
  } catch (error) {
    if (options.signal?.aborted) {
      throw createTaggedError("cancelled", `Tool ${descriptor.name} cancelled`);
    }
    if (error instanceof Error && error.name === "TimeoutError") {
      throw createTaggedError("resource-limit", error.message, { timeoutMs });
    }
    if (isTaggedError(error) && isStepErrorKind(error.kind)) {
      throw error;
    }
    throw createTaggedError(
      "tool-error",
      error instanceof Error ? error.message : String(error),
      { tool: descriptor.name, source: descriptor.source },
    );
  }
}

/**
 * Pipeline step: Validate output against schema.
 */
export function validateOutput(
  descriptor: ToolDescriptor,
  result: unknown,
  validator: SchemaValidator,
): unknown {
  try {
    return validator.validateOrThrow(
      descriptor.outputSchema,
      result,
      `Output validation failed for ${descriptor.name}`,
    );
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw createTaggedError("output-invalid", error.message, { errors: error.errors });
    }
    throw error;
  }
}

/**
 * Runs one tool invocation through resolve, validate, invoke and validate.
 * Failures are thrown as tagged errors carrying a step error kind.
 */
export class ToolCaller {
  private readonly registry: ToolRegistry;
  private readonly validator: SchemaValidator;
  private readonly logger: Logger;

  constructor(deps: ToolCallerDependencies) {
    this.registry = deps.registry;
    this.validator = deps.validator ?? new SchemaValidator();
    this.logger = deps.logger ?? createLogger({ prefix: "ToolCaller" });
  }

  async call(toolName: string, args: unknown, options: ToolCallOptions): Promise<unknown> {
    const descriptor = await resolveTool(toolName, this.registry, this.logger);
    const validatedArgs = validateInput(descriptor, args, this.validator);

    if (this.logger.options.includeArgs) {
      this.logger.debug("tool.args", { tool: toolName, args: sanitizeForLog(validatedArgs) });
    }
    this.logger.trace("tool.invoke", {
      tool: toolName,
      runId: options.runId,
      stepId: options.stepId,
      timeoutMs: options.timeoutMs,
    });

    const result = await invokeTool(descriptor, validatedArgs, options, this.registry);
    const output = validateOutput(descriptor, result, this.validator);

    if (this.logger.options.includeResults) {
      this.logger.debug("tool.result", { tool: toolName, result: summarizeForLog(output) });
    }
    return output;
  }
}

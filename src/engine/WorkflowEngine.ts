import { v4 as uuidv4 } from "uuid";
import { bulkhead, type BulkheadPolicy } from "cockatiel";
import type { OnError, RetryPolicy, Step, WorkflowDefinition } from "../types/Workflow.js";
import type { SandboxResult, StepError } from "../types/Sandbox.js";
import type {
  AttemptRecord,
  EngineError,
  ExecutionReport,
  RunOptions,
  SkipReason,
  StepResult,
} from "../types/Execution.js";
import type { AnyFlowEvent } from "../types/Events.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import { StepExecutor } from "../sandbox/StepExecutor.js";
import { toStepError } from "../sandbox/ToolCaller.js";
import { WorkflowValidator, type ToolResolutionMode } from "../workflow/WorkflowValidator.js";
import { transitiveDependents, type WorkflowDag } from "../workflow/Dag.js";
import { bindValue, evaluate, type BindingScope } from "../workflow/Bindings.js";
import { createTaggedError, isTaggedError, withRetry } from "../core/Retry.js";
import { EventLog } from "../observability/EventLog.js";
import { createLogger, type Logger } from "../observability/Logger.js";

export interface WorkflowEngineOptions {
  registry: ToolRegistry;
  executor?: StepExecutor;
  validator?: WorkflowValidator;
  eventLog?: EventLog;
  logger?: Logger;
  /** Steps running at once (default: 4) */
  maxParallelism?: number;
  /** Step timeout when neither step nor workflow sets one (default: 30000) */
  defaultTimeoutMs?: number;
  defaultRetry?: Partial<RetryPolicy>;
  toolResolution?: ToolResolutionMode;
}

const DEFAULT_RETRY: RetryPolicy = { maxRetries: 0, backoff: "fixed", delayMs: 0 };

/**
 * Per-run state. Only the engine writes to it; a terminal step result is
 * never rewritten.
 */
interface RunContext {
  runId: string;
  definition: WorkflowDefinition;
  dag: WorkflowDag;
  inputs: Record<string, unknown>;
  results: Map<string, StepResult>;
  attempts: AttemptRecord[];
  controller: AbortController;
  /** Logger bound to this run's id */
  log: Logger;
}

/**
 * Drives a validated workflow through its DAG. Steps start as soon as every
 * dependency is terminal, up to `maxParallelism` at a time; a failed step
 * skips its transitive dependents, and so does a step with `onError: skip`
 * without failing the run. Never throws for a step failure.
 */
export class WorkflowEngine {
  private readonly registry: ToolRegistry;
  private readonly executor: StepExecutor;
  private readonly validator: WorkflowValidator;
  private readonly eventLog: EventLog;
  private readonly logger: Logger;
  private readonly maxParallelism: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultRetry: RetryPolicy;
  private readonly runs = new Map<string, AbortController>();

  constructor(options: WorkflowEngineOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? createLogger({ prefix: "WorkflowEngine" });
    this.executor = options.executor ?? new StepExecutor({ registry: options.registry });
    this.validator =
      options.validator ??
      new WorkflowValidator({ registry: options.registry, toolResolution: options.toolResolution });
    this.eventLog = options.eventLog ?? new EventLog();
    this.maxParallelism = Math.max(1, options.maxParallelism ?? 4);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this.defaultRetry = { ...DEFAULT_RETRY, ...options.defaultRetry };
  }

  getEventLog(): EventLog {
    return this.eventLog;
  }

  /**
   * Ids of runs still in progress.
   */
  activeRuns(): string[] {
    return [...this.runs.keys()];
  }

  /**
   * Cancel a run in progress. Returns false for unknown or finished runs.
   */
  cancel(runId: string): boolean {
    const controller = this.runs.get(runId);
    if (!controller) return false;
    this.logger.info("Cancelling run", { runId });
    controller.abort();
    return true;
  }

  async run(
    workflow: string | object,
    initialInputs: Record<string, unknown> = {},
    options: RunOptions = {},
  ): Promise<ExecutionReport> {
    const runId = options.runId ?? `run-${uuidv4()}`;
    const startedAt = new Date();

    await this.registry.ensureLoaded();
    const validation = this.validator.validate(workflow);
    if (!validation.ok) {
      const { kind, message, details } = validation.error;
      this.logger.warn("Workflow rejected", { runId, kind, message });
      return this.finishRejected(runId, "", startedAt, { kind, message, details });
    }
    const { definition, dag } = validation;

    const inputs = applyInputDefaults(definition, initialInputs);
    if (!inputs.ok) {
      return this.finishRejected(runId, definition.name, startedAt, inputs.error);
    }

    if (this.runs.has(runId)) {
      // The id belongs to the live run; its event stream must not see this rejection.
      this.logger.warn("Run rejected", { runId, kind: "duplicate-run" });
      return this.finishRejected(
        runId,
        definition.name,
        startedAt,
        { kind: "duplicate-run", message: `Run ${runId} is already in progress` },
        false,
      );
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }
    this.runs.set(runId, controller);

    const ctx: RunContext = {
      runId,
      definition,
      dag,
      inputs: inputs.value,
      results: new Map(),
      attempts: [],
      controller,
      log: this.logger.with({ runId }),
    };
    for (const step of definition.steps) {
      ctx.results.set(step.id, {
        stepId: step.id,
        status: "pending",
        durationMs: 0,
        attempt: 0,
        maxAttempts: this.retryPolicy(step, definition).maxRetries + 1,
      });
    }

    this.emit({
      type: "RUN_STARTED",
      timestamp: new Date().toISOString(),
      runId,
      workflow: definition.name,
      stepCount: definition.steps.length,
    });
    ctx.log.info("Run started", { workflow: definition.name, steps: definition.steps.length });

    try {
      await this.schedule(ctx);
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      this.runs.delete(runId);
    }

    return this.finishRun(ctx, startedAt);
  }

  /**
   * Every step waits on its dependencies' promises, then enters the bulkhead.
   * Walking `dag.order` guarantees dependency promises exist first.
   */
  private async schedule(ctx: RunContext): Promise<void> {
    const gate = bulkhead(this.maxParallelism, Infinity);
    const done = new Map<string, Promise<void>>();

    for (const id of ctx.dag.order) {
      const deps = ctx.dag.dependencies.get(id) ?? [];
      const waitFor = deps.map((dep) => done.get(dep) ?? Promise.resolve());
      done.set(
        id,
        Promise.all(waitFor).then(() => this.dispatch(ctx, id, gate)),
      );
    }
    await Promise.all(done.values());
  }

  private async dispatch(ctx: RunContext, id: string, gate: BulkheadPolicy): Promise<void> {
    const deps = ctx.dag.dependencies.get(id) ?? [];
    const blocked = deps.find((dep) => ctx.results.get(dep)?.status !== "succeeded");
    if (blocked !== undefined) {
      this.skip(ctx, id, blockedReason(ctx.results.get(blocked)), blocked);
      return;
    }
    if (ctx.controller.signal.aborted) {
      this.skip(ctx, id, "cancelled");
      return;
    }

    await gate.execute(async () => {
      // Cancellation may land while queued behind the bulkhead
      if (ctx.controller.signal.aborted) {
        this.skip(ctx, id, "cancelled");
        return;
      }
      await this.runStep(ctx, id);
    });
  }

  private async runStep(ctx: RunContext, id: string): Promise<void> {
    const step = ctx.dag.steps.get(id);
    const current = ctx.results.get(id);
    if (!step || !current) return;

    const policy = this.retryPolicy(step, ctx.definition);
    const timeoutMs = step.timeoutMs ?? ctx.definition.defaults.timeoutMs ?? this.defaultTimeoutMs;
    const startedAt = new Date();

    // Bound once; every attempt replays the same inputs
    let inputs: Record<string, unknown>;
    try {
      inputs = this.bindStepInputs(ctx, step);
    } catch (error) {
      this.complete(ctx, id, startedAt, 0, { error: toStepError(error, "unbound-input") }, step.onError);
      return;
    }

    let last: SandboxResult | undefined;
    let attempt = 0;
    let outcome: { output: unknown } | { error: StepError };
    try {
      const result = await withRetry(
        async (n) => {
          attempt = n;
          const attemptStart = new Date();
          ctx.results.set(id, { ...current, status: "running", startedAt: startedAt.toISOString(), attempt: n });
          this.emit({
            type: "STEP_STARTED",
            timestamp: attemptStart.toISOString(),
            runId: ctx.runId,
            stepId: id,
            attempt: n,
          });

          last = await this.executor.execute(step, inputs, {
            timeoutMs,
            signal: ctx.controller.signal,
            runId: ctx.runId,
          });
          ctx.attempts.push({
            stepId: id,
            attempt: n,
            success: last.success,
            error: last.error,
            startedAt: attemptStart.toISOString(),
            durationMs: last.durationMs,
          });
          if (!last.success) {
            const error = last.error ?? { kind: "code-error", message: "Step failed" };
            throw createTaggedError(error.kind, error.message, error.details);
          }
          return last;
        },
        {
          maxRetries: policy.maxRetries,
          delayMs: policy.delayMs,
          backoff: policy.backoff,
          signal: ctx.controller.signal,
          onRetry: (error, failedAttempt) => {
            ctx.log.debug("Retrying step", { stepId: id, attempt: failedAttempt });
            this.emit({
              type: "STEP_RETRY",
              timestamp: new Date().toISOString(),
              runId: ctx.runId,
              stepId: id,
              attempt: failedAttempt,
              maxRetries: policy.maxRetries,
              reason: error.message,
            });
          },
        },
      );
      outcome = { output: result.output };
    } catch (error) {
      outcome = { error: this.classifyFailure(ctx, error, last) };
    }
    this.complete(ctx, id, startedAt, attempt, outcome, step.onError);
  }

  private classifyFailure(ctx: RunContext, error: unknown, last: SandboxResult | undefined): StepError {
    if (isTaggedError(error) && last?.error && error.kind === last.error.kind) {
      return last.error;
    }
    if (ctx.controller.signal.aborted) {
      return { kind: "cancelled", message: "Run cancelled" };
    }
    return toStepError(error, "code-error");
  }

  private bindStepInputs(ctx: RunContext, step: Step): Record<string, unknown> {
    const bound = bindValue(step.inputs, this.scopeFor(ctx, ctx.dag.dependencies.get(step.id) ?? []), "inputs");
    if (bound === null || typeof bound !== "object" || Array.isArray(bound)) {
      throw createTaggedError("unbound-input", `Inputs of step ${step.id} did not bind to an object`);
    }
    return Object.fromEntries(Object.entries(bound));
  }

  /**
   * Binding scope exposing only the given steps' outputs.
   */
  private scopeFor(ctx: RunContext, stepIds: readonly string[]): BindingScope {
    const steps: BindingScope["steps"] = {};
    for (const id of stepIds) {
      const result = ctx.results.get(id);
      if (result?.status === "succeeded") {
        steps[id] = { output: result.output };
      }
    }
    return { inputs: ctx.inputs, steps };
  }

  private complete(
    ctx: RunContext,
    id: string,
    startedAt: Date,
    attempt: number,
    outcome: { output: unknown } | { error: StepError },
    onError: OnError = "fail",
  ): void {
    const current = ctx.results.get(id);
    if (!current || isTerminal(current.status)) return;
    const completedAt = new Date();
    const base = {
      ...current,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
      attempt,
    };

    if ("error" in outcome && onError === "skip" && outcome.error.kind !== "cancelled") {
      ctx.results.set(id, { ...base, status: "skipped", skipReason: "on-error", output: undefined, error: outcome.error });
      ctx.log.info("Step failed and was skipped", {
        stepId: id,
        kind: outcome.error.kind,
        attempt,
        blocks: transitiveDependents(ctx.dag, id),
      });
      this.emit({
        type: "STEP_SKIPPED",
        timestamp: completedAt.toISOString(),
        runId: ctx.runId,
        stepId: id,
        reason: "on-error",
      });
      return;
    }

    if ("error" in outcome) {
      ctx.results.set(id, { ...base, status: "failed", output: undefined, error: outcome.error });
      ctx.log.warn("Step failed", {
        stepId: id,
        kind: outcome.error.kind,
        attempt,
        blocks: transitiveDependents(ctx.dag, id),
      });
      this.emit({
        type: "STEP_FAILED",
        timestamp: completedAt.toISOString(),
        runId: ctx.runId,
        stepId: id,
        attempt,
        error: outcome.error,
      });
      return;
    }

    ctx.results.set(id, { ...base, status: "succeeded", output: outcome.output, error: undefined });
    this.emit({
      type: "STEP_SUCCEEDED",
      timestamp: completedAt.toISOString(),
      runId: ctx.runId,
      stepId: id,
      attempt,
      durationMs: base.durationMs,
    });
  }

  private skip(ctx: RunContext, id: string, reason: SkipReason, blockedBy?: string): void {
    const current = ctx.results.get(id);
    if (!current || current.status !== "pending") return;
    ctx.results.set(id, { ...current, status: "skipped", skipReason: reason });
    ctx.log.debug("Step skipped", { stepId: id, reason, blockedBy });
    this.emit({
      type: "STEP_SKIPPED",
      timestamp: new Date().toISOString(),
      runId: ctx.runId,
      stepId: id,
      reason,
    });
  }

  private retryPolicy(step: Step, definition: WorkflowDefinition): RetryPolicy {
    return { ...this.defaultRetry, ...definition.defaults.retry, ...step.retry };
  }

  private finishRun(ctx: RunContext, startedAt: Date): ExecutionReport {
    const steps = ctx.definition.steps.map((step) => ctx.results.get(step.id)).filter(isStepResult);
    const failedSteps = steps.filter((r) => r.status === "failed").map((r) => r.stepId);
    const skippedSteps = steps.filter((r) => r.status === "skipped").map((r) => r.stepId);
    const errors: Record<string, StepError> = {};
    for (const result of steps) {
      if (result.error) errors[result.stepId] = result.error;
    }

    let error: EngineError | undefined;
    let outputs: Record<string, unknown> = {};
    const settled = steps.every(
      (r) => r.status === "succeeded" || (r.status === "skipped" && isToleratedSkip(r.skipReason)),
    );
    if (settled) {
      try {
        outputs = this.resolveOutputs(ctx);
      } catch (failure) {
        const { message, details } = toStepError(failure, "unbound-input");
        error = { kind: "unbound-output", message, details };
      }
    }

    const completedAt = new Date();
    const status = settled && !error ? "succeeded" : "failed";
    const cancelled = ctx.controller.signal.aborted;
    this.emit({
      type: "RUN_COMPLETED",
      timestamp: completedAt.toISOString(),
      runId: ctx.runId,
      status,
      cancelled,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    });
    ctx.log.info("Run completed", { status, failedSteps, skippedSteps });

    return {
      runId: ctx.runId,
      workflow: ctx.definition.name,
      status,
      cancelled,
      steps,
      outputs,
      failedSteps,
      skippedSteps,
      errors,
      error,
      attempts: [...ctx.attempts],
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };
  }

  private resolveOutputs(ctx: RunContext): Record<string, unknown> {
    const scope = this.scopeFor(ctx, ctx.dag.order);
    const outputs: Record<string, unknown> = {};
    for (const output of ctx.definition.outputs) {
      const path = `outputs.${output.name}`;
      outputs[output.name] =
        output.from !== undefined ? evaluate(output.from, scope, path) : bindValue(output.value, scope, path);
    }
    return outputs;
  }

  private finishRejected(
    runId: string,
    workflow: string,
    startedAt: Date,
    error: EngineError,
    announce = true,
  ): ExecutionReport {
    const completedAt = new Date();
    const durationMs = completedAt.getTime() - startedAt.getTime();
    if (announce) {
      this.emit({
        type: "RUN_COMPLETED",
        timestamp: completedAt.toISOString(),
        runId,
        status: "failed",
        cancelled: false,
        durationMs,
      });
    }
    return {
      runId,
      workflow,
      status: "failed",
      cancelled: false,
      steps: [],
      outputs: {},
      failedSteps: [],
      skippedSteps: [],
      errors: {},
      error,
      attempts: [],
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs,
    };
  }

  private emit(event: AnyFlowEvent): void {
    this.eventLog.append(event);
  }
}

/**
 * Fill declared defaults; a required input with no value and no default
 * fails the run before any step starts.
 */
export function applyInputDefaults(
  definition: WorkflowDefinition,
  provided: Record<string, unknown>,
): { ok: true; value: Record<string, unknown> } | { ok: false; error: EngineError } {
  const value: Record<string, unknown> = { ...provided };
  const missing: string[] = [];
  for (const input of definition.inputs) {
    if (value[input.name] !== undefined) continue;
    if (input.default !== undefined) {
      value[input.name] = structuredClone(input.default);
    } else if (input.required) {
      missing.push(input.name);
    }
  }
  if (missing.length > 0) {
    return {
      ok: false,
      error: {
        kind: "missing-input",
        message: `Missing required workflow input(s): ${missing.join(", ")}`,
        details: { missing },
      },
    };
  }
  return { ok: true, value };
}

function isToleratedSkip(reason: SkipReason | undefined): boolean {
  return reason === "on-error" || reason === "dependency-skipped";
}

/**
 * Why a step is skipped, given the dependency that blocks it.
 */
function blockedReason(cause: StepResult | undefined): SkipReason {
  if (cause?.skipReason === "cancelled" || cause?.error?.kind === "cancelled") return "cancelled";
  if (cause?.status === "skipped" && isToleratedSkip(cause.skipReason)) return "dependency-skipped";
  return "dependency-failed";
}

function isTerminal(status: StepResult["status"]): boolean {
  return status === "succeeded" || status === "failed" || status === "skipped";
}

function isStepResult(value: StepResult | undefined): value is StepResult {
  return value !== undefined;
}

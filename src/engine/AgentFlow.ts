import type { ToolDescriptor, ToolSource } from "../types/ToolDescriptor.js";
import type { ExecutionReport, RunOptions } from "../types/Execution.js";
import type { FlowEventType } from "../types/Events.js";
import type { RetryPolicy } from "../types/Workflow.js";
import { ToolRegistry, type RefreshReport, type ToolSearchQuery } from "../registry/ToolRegistry.js";
import { BuiltinToolSource } from "../builtin-tools/BuiltinToolSource.js";
import type { BuiltinToolsConfig } from "../builtin-tools/types.js";
import { StepExecutor, type SandboxConfig } from "../sandbox/StepExecutor.js";
import {
  WorkflowValidator,
  type ToolResolutionMode,
  type ValidationOutcome,
} from "../workflow/WorkflowValidator.js";
import { EventLog, type EventListener } from "../observability/EventLog.js";
import { createLogger, type DebugOptions, type Logger } from "../observability/Logger.js";
import { SchemaValidator } from "../core/SchemaValidator.js";
import { loadEngineConfig } from "../config/EngineConfig.js";
import { WorkflowEngine } from "./WorkflowEngine.js";

export interface EngineSettings {
  maxParallelism?: number;
  defaultTimeoutMs?: number;
  defaultRetry?: Partial<RetryPolicy>;
  toolResolution?: ToolResolutionMode;
}

export interface AgentFlowOptions {
  /** Tool sources, in priority order */
  sources?: ToolSource[];
  /** Built-in tools source; registered first unless disabled */
  builtinTools?: Partial<BuiltinToolsConfig> & { enabled?: boolean };
  registry?: { ttlMs?: number };
  engine?: EngineSettings;
  sandbox?: Partial<SandboxConfig>;
  /** Events kept in memory (default: 10000) */
  maxEvents?: number;
  debug?: DebugOptions;
}

/**
 * Entry point for frontends (CLI, MCP or REST servers): validate and run
 * workflows, list and refresh tools, cancel runs and follow lifecycle events.
 */
export class AgentFlow {
  readonly registry: ToolRegistry;
  readonly eventLog: EventLog;
  private readonly validator: WorkflowValidator;
  private readonly engine: WorkflowEngine;
  private readonly logger: Logger;

  constructor(options: AgentFlowOptions = {}) {
    this.logger = createLogger({ ...options.debug, prefix: "AgentFlow" });
    const child = (prefix: string) => this.logger.child(prefix);

    this.eventLog = new EventLog({
      maxEntries: options.maxEvents,
      logger: this.logger.options.logEvents ? child("EventLog") : undefined,
    });

    const sources: ToolSource[] = [];
    const { enabled: builtinEnabled = true, ...builtinConfig } = options.builtinTools ?? {};
    if (builtinEnabled) {
      sources.push(new BuiltinToolSource(builtinConfig));
    }
    sources.push(...(options.sources ?? []));

    this.registry = new ToolRegistry({
      sources,
      ttlMs: options.registry?.ttlMs,
      logger: child("ToolRegistry"),
      eventLog: this.eventLog,
    });

    const schemaValidator = new SchemaValidator();
    const executor = new StepExecutor({
      registry: this.registry,
      validator: schemaValidator,
      logger: child("StepExecutor"),
      sandbox: options.sandbox,
    });
    this.validator = new WorkflowValidator({
      registry: this.registry,
      toolResolution: options.engine?.toolResolution,
      logger: child("WorkflowValidator"),
    });
    this.engine = new WorkflowEngine({
      registry: this.registry,
      executor,
      validator: this.validator,
      eventLog: this.eventLog,
      logger: child("WorkflowEngine"),
      maxParallelism: options.engine?.maxParallelism,
      defaultTimeoutMs: options.engine?.defaultTimeoutMs,
      defaultRetry: options.engine?.defaultRetry,
    });
  }

  /**
   * Validate a workflow (YAML/JSON text or object). Sources never loaded are
   * discovered first so strict tool checks see them.
   */
  async validate(workflow: string | object): Promise<ValidationOutcome> {
    await this.registry.ensureLoaded();
    return this.validator.validate(workflow);
  }

  run(
    workflow: string | object,
    inputs: Record<string, unknown> = {},
    options: RunOptions = {},
  ): Promise<ExecutionReport> {
    return this.engine.run(workflow, inputs, options);
  }

  /**
   * Discovered tools, sorted by name; narrowed by text, source or tags when a
   * query is given.
   */
  async listTools(query: ToolSearchQuery = {}): Promise<ToolDescriptor[]> {
    await this.registry.ensureLoaded();
    return this.registry.search(query);
  }

  refreshTools(sourceId?: string): Promise<RefreshReport[]> {
    return this.registry.refresh(sourceId);
  }

  addSource(source: ToolSource): void {
    this.registry.addSource(source);
  }

  cancel(runId: string): boolean {
    return this.engine.cancel(runId);
  }

  activeRuns(): string[] {
    return this.engine.activeRuns();
  }

  /**
   * Subscribe to lifecycle events, optionally of one type. Returns the
   * unsubscribe function.
   */
  onEvent(listener: EventListener, type?: FlowEventType): () => void {
    return type ? this.eventLog.onType(type, listener) : this.eventLog.on(listener);
  }
}

export function createAgentFlow(options: AgentFlowOptions = {}): AgentFlow {
  return new AgentFlow(options);
}

/**
 * Build a facade from an agent-flow.yaml file. Extra sources are appended
 * after the built-in tools.
 */
export async function createAgentFlowFromConfig(
  configPath: string,
  sources: ToolSource[] = [],
): Promise<AgentFlow> {
  const { options } = await loadEngineConfig(configPath);
  return new AgentFlow({ ...options, sources: [...(options.sources ?? []), ...sources] });
}

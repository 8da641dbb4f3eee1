// === Types ===
export type {
  JsonSchema,
  ToolDefinition,
  ToolDescriptor,
  ToolCallContext,
  ToolSource,
  ViolationKind,
  StepErrorKind,
  StepError,
  ExecutionLimits,
  SandboxResult,
  BackoffStrategy,
  RetryPolicy,
  ToolStep,
  CodeStep,
  Step,
  WorkflowInput,
  WorkflowOutput,
  WorkflowDefaults,
  WorkflowDefinition,
  StepStatus,
  SkipReason,
  StepResult,
  AttemptRecord,
  EngineError,
  RunStatus,
  ExecutionReport,
  RunOptions,
  FlowEventType,
  FlowEvent,
  RunStartedEvent,
  StepStartedEvent,
  StepRetryEvent,
  StepSucceededEvent,
  StepFailedEvent,
  StepSkippedEvent,
  RunCompletedEvent,
  ToolsRefreshedEvent,
  AnyFlowEvent,
} from "./types/index.js";

// === Core ===
export { SchemaValidator, SchemaValidationError } from "./core/SchemaValidator.js";
export type { ValidationResult, SchemaValidatorOptions } from "./core/SchemaValidator.js";
export { withRetry, isRetryable, createTaggedError } from "./core/Retry.js";
export type { RetryOptions } from "./core/Retry.js";

// === Registry ===
export { ToolRegistry } from "./registry/ToolRegistry.js";
export type { ToolRegistryOptions, ToolResolution, ToolSearchQuery, RefreshReport } from "./registry/ToolRegistry.js";
export { RegistryError } from "./registry/errors.js";
export type { RegistryErrorKind } from "./registry/errors.js";
export { StaticToolSource } from "./registry/StaticToolSource.js";
export type { StaticTool, ToolHandler } from "./registry/StaticToolSource.js";

// === Built-in tools ===
export { BuiltinToolSource, BUILTIN_SOURCE_ID } from "./builtin-tools/BuiltinToolSource.js";
export type { BuiltinToolsConfig } from "./builtin-tools/types.js";

// === Sandbox ===
export { StepExecutor, DEFAULT_SANDBOX_CONFIG } from "./sandbox/StepExecutor.js";
export type { SandboxConfig, StepExecutorOptions } from "./sandbox/StepExecutor.js";
export { CodeSandbox } from "./sandbox/CodeSandbox.js";
export type { CodeSandboxOptions, CodeRunLimits, CodeRunServices } from "./sandbox/CodeSandbox.js";
export { analyzeCode, parseCode } from "./sandbox/CodeAnalyzer.js";
export type { CodeAnalysis, CodeFinding } from "./sandbox/CodeAnalyzer.js";
export { DEFAULT_ALLOWED_MODULES } from "./sandbox/modules.js";

// === Workflow ===
export { parseWorkflow, loadWorkflowFile } from "./workflow/WorkflowParser.js";
export type { ParseResult } from "./workflow/WorkflowParser.js";
export { WorkflowValidator } from "./workflow/WorkflowValidator.js";
export type {
  ToolResolutionMode,
  ValidationOutcome,
  WorkflowValidatorOptions,
} from "./workflow/WorkflowValidator.js";
export { ValidationError } from "./workflow/errors.js";
export type { ValidationErrorKind } from "./workflow/errors.js";
export { buildDag, transitiveDependents } from "./workflow/Dag.js";
export type { WorkflowDag } from "./workflow/Dag.js";

// === Engine ===
export { WorkflowEngine, applyInputDefaults } from "./engine/WorkflowEngine.js";
export type { WorkflowEngineOptions } from "./engine/WorkflowEngine.js";
export { AgentFlow, createAgentFlow, createAgentFlowFromConfig } from "./engine/AgentFlow.js";
export type { AgentFlowOptions, EngineSettings } from "./engine/AgentFlow.js";

// === Config ===
export { loadEngineConfig, mapEngineConfig, DEFAULT_CONFIG_FILE } from "./config/EngineConfig.js";
export type { EngineConfigLoadResult } from "./config/EngineConfig.js";

// === Observability ===
export { EventLog } from "./observability/EventLog.js";
export type { LogEntry, EventListener, EventLogOptions, EventQuery } from "./observability/EventLog.js";
export { createLogger, consoleSink, sanitizeForLog, summarizeForLog } from "./observability/Logger.js";
export type { Logger, LogLevel, LogRecord, LogSink, DebugOptions } from "./observability/Logger.js";

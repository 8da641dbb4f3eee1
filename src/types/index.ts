export type {
  JsonSchema,
  ToolDefinition,
  ToolDescriptor,
  ToolCallContext,
  ToolSource,
} from "./ToolDescriptor.js";

export type {
  ViolationKind,
  StepErrorKind,
  StepError,
  ExecutionLimits,
  SandboxResult,
} from "./Sandbox.js";

export type {
  BackoffStrategy,
  RetryPolicy,
  ToolStep,
  CodeStep,
  Step,
  WorkflowInput,
  WorkflowOutput,
  WorkflowDefaults,
  WorkflowDefinition,
} from "./Workflow.js";

export type {
  StepStatus,
  SkipReason,
  StepResult,
  AttemptRecord,
  EngineError,
  RunStatus,
  ExecutionReport,
  RunOptions,
} from "./Execution.js";

export type {
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
} from "./Events.js";

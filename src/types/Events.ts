import type { StepError } from "./Sandbox.js";
import type { RunStatus } from "./Execution.js";

/**
 * Lifecycle event types emitted by the engine and registry.
 */
export type FlowEventType =
  | "RUN_STARTED"
  | "STEP_STARTED"
  | "STEP_RETRY"
  | "STEP_SUCCEEDED"
  | "STEP_FAILED"
  | "STEP_SKIPPED"
  | "RUN_COMPLETED"
  | "TOOLS_REFRESHED";

/**
 * Base event structure for all lifecycle events.
 */
export interface FlowEvent {
  type: FlowEventType;
  timestamp: string; // ISO 8601
  runId?: string;
}

export interface RunStartedEvent extends FlowEvent {
  type: "RUN_STARTED";
  runId: string;
  workflow: string;
  stepCount: number;
}

export interface StepStartedEvent extends FlowEvent {
  type: "STEP_STARTED";
  runId: string;
  stepId: string;
  attempt: number;
}

export interface StepRetryEvent extends FlowEvent {
  type: "STEP_RETRY";
  runId: string;
  stepId: string;
  attempt: number;
  maxRetries: number;
  reason: string;
}

export interface StepSucceededEvent extends FlowEvent {
  type: "STEP_SUCCEEDED";
  runId: string;
  stepId: string;
  attempt: number;
  durationMs: number;
}

export interface StepFailedEvent extends FlowEvent {
  type: "STEP_FAILED";
  runId: string;
  stepId: string;
  attempt: number;
  error: StepError;
}

export interface StepSkippedEvent extends FlowEvent {
  type: "STEP_SKIPPED";
  runId: string;
  stepId: string;
  reason: string;
}

export interface RunCompletedEvent extends FlowEvent {
  type: "RUN_COMPLETED";
  runId: string;
  status: RunStatus;
  cancelled: boolean;
  durationMs: number;
}

export interface ToolsRefreshedEvent extends FlowEvent {
  type: "TOOLS_REFRESHED";
  sourceId: string;
  added: string[];
  removed: string[];
  updated: string[];
  error?: string;
}

/**
 * Union type of all lifecycle events.
 */
export type AnyFlowEvent =
  | RunStartedEvent
  | StepStartedEvent
  | StepRetryEvent
  | StepSucceededEvent
  | StepFailedEvent
  | StepSkippedEvent
  | RunCompletedEvent
  | ToolsRefreshedEvent;

import type { StepError } from "./Sandbox.js";

export type StepStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type SkipReason = "dependency-failed" | "dependency-skipped" | "on-error" | "cancelled";

export interface StepResult {
  stepId: string;
  status: StepStatus;
  output?: unknown;
  error?: StepError;
  skipReason?: SkipReason;
  startedAt?: string;
  completedAt?: string;
  durationMs: number;
  /** Number of the last attempt (1-based, 0 when never attempted) */
  attempt: number;
  maxAttempts: number;
}

/**
 * One attempt of one step, kept in the run trace.
 */
export interface AttemptRecord {
  stepId: string;
  attempt: number;
  success: boolean;
  error?: StepError;
  startedAt: string;
  durationMs: number;
}

export interface EngineError {
  kind: string;
  message: string;
  details?: unknown;
}

export type RunStatus = "succeeded" | "failed";

export interface ExecutionReport {
  runId: string;
  workflow: string;
  status: RunStatus;
  cancelled: boolean;
  /** Step results in declaration order */
  steps: StepResult[];
  outputs: Record<string, unknown>;
  failedSteps: string[];
  skippedSteps: string[];
  errors: Record<string, StepError>;
  /** Engine-level failure (validation, missing input) */
  error?: EngineError;
  attempts: AttemptRecord[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
}

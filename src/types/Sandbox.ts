/**
 * Policy violations detected by the sandbox.
 */
export type ViolationKind =
  | "forbidden-import"
  | "forbidden-eval"
  | "forbidden-file-access"
  | "resource-limit";

/**
 * Every failure kind a step can end with.
 */
export type StepErrorKind =
  | ViolationKind
  | "code-error"
  | "tool-error"
  | "tool-not-found"
  | "source-unreachable"
  | "input-invalid"
  | "output-invalid"
  | "unbound-input"
  | "cancelled";

export interface StepError {
  kind: StepErrorKind;
  message: string;
  details?: unknown;
}

/**
 * Limits applied to one step execution.
 */
export interface ExecutionLimits {
  /** Wall-clock limit in ms */
  timeoutMs: number;
  /** Heap growth ceiling for inline code, in MB */
  memoryLimitMb?: number;
  /** Maximum serialized output size, in bytes */
  maxOutputBytes?: number;
  /** Maximum tool calls from inline code */
  maxToolCalls?: number;
  /** Directory granted for file access; none when absent */
  workDir?: string;
  /** Cancellation of the surrounding run */
  signal?: AbortSignal;
  runId?: string;
}

/**
 * Outcome of one step execution. Never thrown, always returned.
 */
export interface SandboxResult {
  success: boolean;
  output: unknown;
  /** Captured console lines and error text */
  diagnostics: string[];
  error?: StepError;
  violation?: ViolationKind;
  resourceLimitExceeded: boolean;
  durationMs: number;
  /** Tool calls made from inline code */
  toolCalls: number;
}

export type BackoffStrategy = "fixed" | "exponential";

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  backoff: BackoffStrategy;
  delayMs: number;
}

/**
 * What a step failure does to the run: `fail` marks the step failed,
 * `skip` records it as skipped and lets independent work finish.
 */
export type OnError = "fail" | "skip";

interface StepBase {
  id: string;
  description?: string;
  /** Literal values or `{{ expr }}` binding templates */
  inputs: Readonly<Record<string, unknown>>;
  /** Explicit predecessors */
  dependsOn: readonly string[];
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
  /** Default: fail */
  onError?: OnError;
}

export interface ToolStep extends StepBase {
  kind: "tool";
  tool: string;
}

export interface CodeStep extends StepBase {
  kind: "code";
  code: string;
}

export type Step = ToolStep | CodeStep;

/**
 * Input the workflow declares for its caller.
 */
export interface WorkflowInput {
  name: string;
  required: boolean;
  default?: unknown;
  description?: string;
}

/**
 * Value the workflow reports once every step succeeded.
 */
export interface WorkflowOutput {
  name: string;
  /** Binding expression, e.g. `steps.fetch.output.body` */
  from?: string;
  value?: unknown;
}

export interface WorkflowDefaults {
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
}

export interface WorkflowDefinition {
  name: string;
  version?: string;
  description?: string;
  defaults: WorkflowDefaults;
  inputs: readonly WorkflowInput[];
  steps: readonly Step[];
  outputs: readonly WorkflowOutput[];
}

/**
 * JSON Schema object as accepted by the schema validator.
 */
export type JsonSchema = Record<string, unknown>;

/**
 * A tool as offered by a source, before the registry stamps it.
 */
export interface ToolDefinition {
  /** Globally unique name, recommended format: namespace/name */
  name: string;
  /** Semver version */
  version: string;
  description?: string;
  tags?: string[];

  /** JSON Schema for input validation */
  inputSchema: JsonSchema;
  /** JSON Schema for output validation */
  outputSchema: JsonSchema;
}

/**
 * Cached, immutable description of an invocable tool.
 * Replaced (never mutated) on TTL expiry or explicit refresh.
 */
export interface ToolDescriptor extends Readonly<ToolDefinition> {
  /** Id of the owning tool source */
  readonly source: string;
  /** Epoch ms when the descriptor entered the cache */
  readonly cachedAt: number;
}

/**
 * Context handed to a tool source on invocation.
 * Carries identifiers and explicitly granted scope only.
 */
export interface ToolCallContext {
  runId: string;
  stepId: string;
  signal?: AbortSignal;
  /** Directory granted to file-touching tools, if any */
  workDir?: string;
}

/**
 * Pluggable origin of tool descriptors.
 */
export interface ToolSource {
  /** Unique identifier for this source */
  readonly id: string;
  /** Enumerate every tool this source offers */
  listTools(): Promise<ToolDefinition[]>;
  /** Optional single-tool lookup; lets the registry refetch one entry */
  getTool?(name: string): Promise<ToolDefinition | undefined>;
  /** Execute the tool with validated args */
  invoke(
    descriptor: ToolDescriptor,
    args: unknown,
    ctx: ToolCallContext,
  ): Promise<{ result: unknown; raw?: unknown }>;
}

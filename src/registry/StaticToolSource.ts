import type {
  ToolCallContext,
  ToolDefinition,
  ToolDescriptor,
  ToolSource,
} from "../types/ToolDescriptor.js";

/**
 * Handler bound to one tool of a static source.
 */
export type ToolHandler = (args: unknown, ctx: ToolCallContext) => Promise<unknown> | unknown;

export interface StaticTool extends ToolDefinition {
  handler: ToolHandler;
}

/**
 * In-memory tool source: definitions and handlers registered in code.
 * Dispatches invocations to handlers by tool name.
 */
export class StaticToolSource implements ToolSource {
  private readonly tools = new Map<string, StaticTool>();

  constructor(
    readonly id: string,
    tools: StaticTool[] = [],
  ) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Register (or replace) a tool. Picked up on the registry's next fetch.
   */
  register(tool: StaticTool): void {
    this.tools.set(tool.name, tool);
  }

  /**
   * Unregister a tool by name.
   */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  async listTools(): Promise<ToolDefinition[]> {
    return [...this.tools.values()].map(toDefinition);
  }

  async getTool(name: string): Promise<ToolDefinition | undefined> {
    const tool = this.tools.get(name);
    return tool ? toDefinition(tool) : undefined;
  }

  async invoke(
    descriptor: ToolDescriptor,
    args: unknown,
    ctx: ToolCallContext,
  ): Promise<{ result: unknown }> {
    const tool = this.tools.get(descriptor.name);
    if (!tool) {
      throw new Error(
        `Tool handler not found: ${descriptor.name}. Available: [${[...this.tools.keys()].join(", ")}]`,
      );
    }
    return { result: await tool.handler(args, ctx) };
  }
}

function toDefinition({ handler: _handler, ...definition }: StaticTool): ToolDefinition {
  return definition;
}

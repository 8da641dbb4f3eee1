import type {
  ToolCallContext,
  ToolDefinition,
  ToolDescriptor,
  ToolSource,
} from "../types/ToolDescriptor.js";
import {
  DEFAULT_BUILTIN_TOOLS_CONFIG,
  type BuiltinTool,
  type BuiltinToolContext,
  type BuiltinToolsConfig,
} from "./types.js";
import { truncateTool } from "./util/truncate.js";
import { hashTextTool } from "./util/hashText.js";
import { jsonSelectTool } from "./util/jsonSelect.js";
import { templateRenderTool } from "./util/templateRender.js";
import { readTextTool } from "./fs/readText.js";
import { writeTextTool } from "./fs/writeText.js";

export const BUILTIN_SOURCE_ID = "builtin";

const ALL_BUILTIN_TOOLS: BuiltinTool[] = [
  truncateTool,
  hashTextTool,
  jsonSelectTool,
  templateRenderTool,
  readTextTool,
  writeTextTool,
];

/**
 * Tool source for the local, deterministic built-in tools.
 * Dispatches to handler functions by tool name; file tools are confined to
 * the working directory granted by the call context or the config.
 */
export class BuiltinToolSource implements ToolSource {
  readonly id: string;
  private readonly handlers = new Map<string, BuiltinTool>();
  private readonly config: BuiltinToolsConfig;

  constructor(config: Partial<BuiltinToolsConfig> = {}, id = BUILTIN_SOURCE_ID) {
    this.id = id;
    this.config = { ...DEFAULT_BUILTIN_TOOLS_CONFIG, ...config };
    for (const tool of ALL_BUILTIN_TOOLS) {
      this.handlers.set(tool.definition.name, tool);
    }
  }

  /**
   * List registered built-in tool names.
   */
  getRegisteredTools(): string[] {
    return [...this.handlers.keys()];
  }

  async listTools(): Promise<ToolDefinition[]> {
    return [...this.handlers.values()].map((tool) => tool.definition);
  }

  async getTool(name: string): Promise<ToolDefinition | undefined> {
    return this.handlers.get(name)?.definition;
  }

  async invoke(
    descriptor: ToolDescriptor,
    args: unknown,
    ctx: ToolCallContext,
  ): Promise<{ result: unknown }> {
    const tool = this.handlers.get(descriptor.name);
    if (!tool) {
      throw new Error(
        `Built-in tool handler not found: ${descriptor.name}. Available: [${this.getRegisteredTools().join(", ")}]`,
      );
    }

    const toolCtx: BuiltinToolContext = { call: ctx, config: this.config };
    return { result: await tool.handler(toRecord(args), toolCtx) };
  }
}

function toRecord(args: unknown): Record<string, unknown> {
  if (args !== null && typeof args === "object" && !Array.isArray(args)) {
    return { ...args };
  }
  return {};
}

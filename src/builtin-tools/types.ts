import type { ToolCallContext, ToolDefinition } from "../types/ToolDescriptor.js";
import { createTaggedError } from "../core/Retry.js";

/**
 * Configuration for the built-in tool source.
 */
export interface BuiltinToolsConfig {
  /** Directory file tools may touch. A call context may narrow it further. */
  workDir?: string;
  /** Maximum bytes for fs.readText (default: 5MB) */
  maxReadBytes: number;
}

export const DEFAULT_BUILTIN_TOOLS_CONFIG: BuiltinToolsConfig = {
  maxReadBytes: 5 * 1024 * 1024,
};

/**
 * Context passed to each built-in tool handler.
 */
export interface BuiltinToolContext {
  call: ToolCallContext;
  config: BuiltinToolsConfig;
}

export type BuiltinToolHandler = (
  args: Record<string, unknown>,
  ctx: BuiltinToolContext,
) => Promise<unknown>;

export interface BuiltinTool {
  definition: ToolDefinition;
  handler: BuiltinToolHandler;
}

export function defineBuiltin(
  definition: ToolDefinition,
  handler: BuiltinToolHandler,
): BuiltinTool {
  return { definition, handler };
}

export function stringArg(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== "string") {
    throw createTaggedError("input-invalid", `Argument "${key}" must be a string`);
  }
  return value;
}

export function optionalStringArg(args: Record<string, unknown>, key: string): string | undefined {
  return args[key] === undefined ? undefined : stringArg(args, key);
}

export function numberArg(args: Record<string, unknown>, key: string): number {
  const value = args[key];
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw createTaggedError("input-invalid", `Argument "${key}" must be a number`);
  }
  return value;
}

export function optionalNumberArg(args: Record<string, unknown>, key: string): number | undefined {
  return args[key] === undefined ? undefined : numberArg(args, key);
}

export function booleanArg(args: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = args[key];
  return typeof value === "boolean" ? value : fallback;
}

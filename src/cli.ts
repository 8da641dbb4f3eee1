#!/usr/bin/env node
/**
 * CLI for agent-flow-engine: validate and run workflows, list tools.
 * Usage: agent-flow <command> [workflow] [options]
 * Commands: validate | run | tools
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "node:fs/promises";
import { DEFAULT_CONFIG_FILE, loadEngineConfig } from "./config/EngineConfig.js";
import { AgentFlow, type AgentFlowOptions } from "./engine/AgentFlow.js";
import type { ToolDescriptor } from "./types/ToolDescriptor.js";
import type { ExecutionReport } from "./types/Execution.js";

type DetailLevel = "short" | "normal" | "full";

interface CliArgs {
  command: "validate" | "run" | "tools" | "help";
  workflowPath?: string;
  configPath: string;
  inputs: Record<string, unknown>;
  detail: DetailLevel;
  /** tools: only this source */
  source?: string;
  /** tools: text filter over name, description and tags */
  search?: string;
  help: boolean;
}

function parseArgv(argv: string[]): CliArgs {
  const args = argv.slice(2);
  let command: CliArgs["command"] = "help";
  let workflowPath: string | undefined;
  let configPath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  const inputs: Record<string, unknown> = {};
  let detail: DetailLevel = "normal";
  let source: string | undefined;
  let search: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg === "--config" || arg === "-c") {
      configPath = path.resolve(process.cwd(), args[++i] ?? "");
    } else if (arg === "--detail" || arg === "-d") {
      const v = (args[++i] ?? "normal").toLowerCase();
      detail = v === "short" || v === "full" ? v : "normal";
    } else if (arg === "--source") {
      source = args[++i];
    } else if (arg === "--search" || arg === "-s") {
      search = args[++i];
    } else if (arg === "--input" || arg === "-i") {
      const pair = args[++i] ?? "";
      const eq = pair.indexOf("=");
      if (eq > 0) {
        inputs[pair.slice(0, eq)] = parseInputValue(pair.slice(eq + 1));
      }
    } else if (arg && !arg.startsWith("-")) {
      if (command === "help" && (arg === "validate" || arg === "run" || arg === "tools" || arg === "help")) {
        command = arg;
      } else if (workflowPath === undefined) {
        workflowPath = path.resolve(process.cwd(), arg);
      }
    }
  }

  return { command, workflowPath, configPath, inputs, detail, source, search, help };
}

/** Values that parse as JSON keep their type; anything else stays a string. */
function parseInputValue(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return text;
  }
}

function printHelp(): void {
  const bin = "agent-flow";
  process.stdout.write(`
Usage: ${bin} <command> [workflow] [options]

Commands:
  validate <file>   Validate a workflow file; exit with code 1 if it is invalid.
  run <file>        Run a workflow and print the execution report as JSON.
  tools             List tools known to the registry (filter with --source, --search).

Options:
  --config, -c <path>     Config file path (default: ./${DEFAULT_CONFIG_FILE}, optional).
  --input, -i key=value   Workflow input; repeatable. Values are parsed as JSON when possible.
  --detail, -d <level>    short | normal | full (default: normal).
  --source <id>           tools: only tools from this source.
  --search, -s <text>     tools: match name, description or tags.
  --help, -h              Show this help.

Examples:
  ${bin} validate ./workflows/report.yaml
  ${bin} run ./workflows/report.yaml -i topic=weather -i limit=3
  ${bin} tools --detail full
  ${bin} tools --source builtin --search text
`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function createFlow(configPath: string): Promise<AgentFlow> {
  const options: AgentFlowOptions = (await fileExists(configPath))
    ? (await loadEngineConfig(configPath)).options
    : {};
  return new AgentFlow(options);
}

async function readWorkflow(workflowPath: string | undefined): Promise<string | undefined> {
  if (!workflowPath) {
    process.stderr.write("Error: a workflow file is required\n");
    return undefined;
  }
  try {
    return await fs.readFile(workflowPath, "utf-8");
  } catch {
    process.stderr.write(`Error: workflow file not found: ${workflowPath}\n`);
    return undefined;
  }
}

async function cmdValidate(args: CliArgs): Promise<number> {
  const text = await readWorkflow(args.workflowPath);
  if (text === undefined) return 1;
  const flow = await createFlow(args.configPath);
  const outcome = await flow.validate(text);
  if (!outcome.ok) {
    process.stdout.write(`${outcome.error.kind}: ${outcome.error.message}\n`);
    return 1;
  }
  const { definition, dag } = outcome;
  process.stdout.write(`Workflow "${definition.name}" is valid: ${dag.order.length} step(s).\n`);
  if (args.detail !== "short") {
    process.stdout.write(`Order: ${dag.order.join(" -> ")}\n`);
  }
  return 0;
}

function formatReport(report: ExecutionReport, detail: DetailLevel): string {
  if (detail === "short") {
    return `${report.runId} ${report.status}`;
  }
  if (detail === "full") {
    return JSON.stringify(report, null, 2);
  }
  return JSON.stringify(
    {
      runId: report.runId,
      workflow: report.workflow,
      status: report.status,
      cancelled: report.cancelled,
      outputs: report.outputs,
      failedSteps: report.failedSteps,
      skippedSteps: report.skippedSteps,
      errors: report.errors,
      error: report.error,
      steps: report.steps.map((s) => ({ id: s.stepId, status: s.status, attempt: s.attempt })),
    },
    null,
    2,
  );
}

async function cmdRun(args: CliArgs): Promise<number> {
  const text = await readWorkflow(args.workflowPath);
  if (text === undefined) return 1;
  const flow = await createFlow(args.configPath);

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);
  try {
    const report = await flow.run(text, args.inputs, { signal: controller.signal });
    process.stdout.write(formatReport(report, args.detail) + "\n");
    return report.status === "succeeded" ? 0 : 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

function formatToolShort(tool: ToolDescriptor): string {
  return tool.name;
}

function formatToolNormal(tool: ToolDescriptor): string {
  const desc = (tool.description ?? "").replace(/\n/g, " ").slice(0, 60);
  return `${tool.name}\t${tool.version}\t${tool.source}\t${desc}`;
}

function formatToolFull(tool: ToolDescriptor): string {
  return JSON.stringify(
    {
      name: tool.name,
      version: tool.version,
      source: tool.source,
      description: tool.description,
      tags: tool.tags,
      inputSchema: tool.inputSchema,
      outputSchema: tool.outputSchema,
    },
    null,
    2,
  );
}

async function cmdTools(args: CliArgs): Promise<number> {
  const flow = await createFlow(args.configPath);
  const tools = await flow.listTools({ source: args.source, text: args.search });
  const formatter =
    args.detail === "short" ? formatToolShort : args.detail === "full" ? formatToolFull : formatToolNormal;
  if (args.detail === "normal") {
    process.stdout.write("name\tversion\tsource\tdescription\n");
  }
  for (const tool of tools) {
    process.stdout.write(formatter(tool) + "\n");
  }
  return 0;
}

async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgv(argv);

  if (args.help || args.command === "help") {
    printHelp();
    return 0;
  }

  switch (args.command) {
    case "validate":
      return cmdValidate(args);
    case "run":
      return cmdRun(args);
    case "tools":
      return cmdTools(args);
    default:
      printHelp();
      return 1;
  }
}

/** Run CLI with the given argv (same shape as process.argv). Exported for tests. */
export async function run(argv: string[]): Promise<number> {
  return main(argv);
}

const isMain =
  typeof process !== "undefined" &&
  process.argv[1] !== undefined &&
  process.argv[1] === fileURLToPath(import.meta.url);

if (isMain) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      process.exit(1);
    });
}

import { describe, it, expect } from "vitest";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { readFile } from "node:fs/promises";
import { AgentFlow, createAgentFlow, createAgentFlowFromConfig } from "../src/engine/AgentFlow.js";
import type { LogEntry } from "../src/observability/EventLog.js";
import { addTool, definition, staticSource } from "./fixtures/index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const fixturesDir = path.join(__dirname, "fixtures");

const sumWorkflow = {
  name: "sum",
  inputs: [{ name: "a" }],
  steps: [{ id: "add", tool: "math.add", inputs: { a: "{{ inputs.a }}", b: 2 } }],
  outputs: [{ name: "sum", from: "steps.add.output.sum" }],
};

describe("AgentFlow", () => {
  it("registers built-in tools ahead of added sources", async () => {
    const flow = createAgentFlow({ sources: [staticSource("local", [addTool])] });
    const tools = await flow.listTools();
    expect(tools.map((t) => t.name)).toContain("builtin/text.truncate");
    expect(tools.map((t) => t.name)).toContain("math.add");
    expect(flow.registry.getSources()).toEqual(["builtin", "local"]);
  });

  it("can run without built-in tools", async () => {
    const flow = new AgentFlow({ builtinTools: { enabled: false } });
    expect(await flow.listTools()).toEqual([]);
  });

  it("validates after discovering sources", async () => {
    const flow = new AgentFlow({ sources: [staticSource("local", [addTool])] });
    const outcome = await flow.validate(sumWorkflow);
    expect(outcome.ok).toBe(true);
  });

  it("runs a workflow and streams its events", async () => {
    const flow = new AgentFlow({ sources: [staticSource("local", [addTool])] });
    const seen: string[] = [];
    const completions: LogEntry[] = [];
    const off = flow.onEvent((entry) => seen.push(entry.event.type));
    flow.onEvent((entry) => completions.push(entry), "RUN_COMPLETED");

    const report = await flow.run(sumWorkflow, { a: 40 });
    off();

    expect(report.status).toBe("succeeded");
    expect(report.outputs).toEqual({ sum: 42 });
    expect(seen).toContain("RUN_STARTED");
    expect(seen[seen.length - 1]).toBe("RUN_COMPLETED");
    expect(completions).toHaveLength(1);
    expect(flow.activeRuns()).toEqual([]);
  });

  it("reports refreshes and unknown runs", async () => {
    const flow = new AgentFlow({ builtinTools: { enabled: false } });
    flow.addSource(staticSource("local", [addTool]));
    const [report] = await flow.refreshTools("local");
    expect(report?.added).toEqual(["math.add"]);
    expect(flow.cancel("run-unknown")).toBe(false);
  });

  it("is built from a config file, appending extra sources", async () => {
    const flow = await createAgentFlowFromConfig(path.join(fixturesDir, "agent-flow.yaml"), [
      staticSource("extra", [addTool]),
    ]);
    expect(flow.registry.getSources()).toEqual(["builtin", "extra"]);

    const text = await readFile(path.join(fixturesDir, "workflows", "text-pipeline.yaml"), "utf-8");
    const report = await flow.run(text, { text: "hello world" });
    expect(report.status).toBe("succeeded");
    expect(report.outputs).toEqual({ short: "hello...", loud: "HELLO..." });
  });

  it("rejects a tool offered by no source", async () => {
    const flow = new AgentFlow({ sources: [staticSource("local", [])] });
    const outcome = await flow.validate({
      name: "x",
      steps: [{ id: "a", tool: definition("nowhere").name }],
    });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("unknown-tool");
  });
});

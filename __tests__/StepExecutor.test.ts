import { describe, it, expect } from "vitest";
import { StepExecutor } from "../src/sandbox/StepExecutor.js";
import { ToolRegistry } from "../src/registry/ToolRegistry.js";
import type { CodeStep, ToolStep } from "../src/types/Workflow.js";
import type { StaticTool } from "../src/registry/StaticToolSource.js";
import { addTool, delayedTool, echoTool, failingTool, staticSource } from "./fixtures/index.js";

const sloppyTool: StaticTool = {
  name: "util.sloppy",
  version: "1.0.0",
  inputSchema: { type: "object" },
  outputSchema: { type: "object", required: ["value"] },
  handler: () => ({ other: true }),
};

function toolStep(tool: string, id = "s1"): ToolStep {
  return { id, kind: "tool", tool, inputs: {}, dependsOn: [] };
}

function codeStep(code: string, id = "c1"): CodeStep {
  return { id, kind: "code", code, inputs: {}, dependsOn: [] };
}

function createExecutor(codeToolCalls = true) {
  const registry = new ToolRegistry({
    sources: [
      staticSource("local", [addTool, echoTool, sloppyTool, delayedTool("util.slow", 200), failingTool("util.broken")]),
    ],
  });
  return new StepExecutor({ registry, sandbox: { codeToolCalls } });
}

const limits = { timeoutMs: 1_000, runId: "run-1" };

describe("StepExecutor", () => {
  describe("tool steps", () => {
    it("invokes the tool with validated inputs", async () => {
      const result = await createExecutor().execute(toolStep("math.add"), { a: 2, b: 3 }, limits);
      expect(result.success).toBe(true);
      expect(result.output).toEqual({ sum: 5 });
      expect(result.toolCalls).toBe(1);
      expect(result.diagnostics).toEqual([]);
    });

    it("fills in schema defaults", async () => {
      const result = await createExecutor().execute(toolStep("math.add"), { a: 2 }, limits);
      expect(result.output).toEqual({ sum: 2 });
    });

    it("rejects inputs that do not match the schema", async () => {
      const result = await createExecutor().execute(toolStep("math.add"), { a: "x" }, limits);
      expect(result.success).toBe(false);
      expect(result.error?.kind).toBe("input-invalid");
      expect(result.error?.message).toBe("Input validation failed for math.add: /a must be number");
      expect(result.violation).toBeUndefined();
    });

    it("rejects outputs that do not match the schema", async () => {
      const result = await createExecutor().execute(toolStep("util.sloppy"), {}, limits);
      expect(result.error?.kind).toBe("output-invalid");
    });

    it("reports unknown tools", async () => {
      const result = await createExecutor().execute(toolStep("no_such_tool"), {}, limits);
      expect(result.error?.kind).toBe("tool-not-found");
      expect(result.diagnostics).toEqual(["tool-not-found: Tool not found: no_such_tool"]);
    });

    it("wraps errors thrown by the tool", async () => {
      const result = await createExecutor().execute(toolStep("util.broken"), {}, limits);
      expect(result.error?.kind).toBe("tool-error");
      expect(result.error?.message).toBe("util.broken is broken");
    });

    it("enforces the step timeout", async () => {
      const result = await createExecutor().execute(toolStep("util.slow"), {}, { ...limits, timeoutMs: 20 });
      expect(result.error).toMatchObject({
        kind: "resource-limit",
        message: "Tool util.slow timed out after 20ms",
      });
      expect(result.violation).toBe("resource-limit");
      expect(result.resourceLimitExceeded).toBe(true);
    });

    it("reports cancellation", async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);
      const result = await createExecutor().execute(toolStep("util.slow"), {}, {
        ...limits,
        signal: controller.signal,
      });
      expect(result.error?.kind).toBe("cancelled");
    });
  });

  describe("code steps", () => {
    it("runs code with the bound inputs", async () => {
      const result = await createExecutor().execute(codeStep("return inputs.n * 2;"), { n: 21 }, limits);
      expect(result.output).toBe(42);
    });

    it("lets code call registry tools", async () => {
      const code = "return await tools.call(\"math.add\", { a: inputs.x, b: 1 });";
      const result = await createExecutor().execute(codeStep(code), { x: 4 }, limits);
      expect(result.output).toEqual({ sum: 5 });
      expect(result.toolCalls).toBe(1);
    });

    it("surfaces tool failures inside code as code errors", async () => {
      const code = "return await tools.call(\"math.add\", { a: \"x\" });";
      const result = await createExecutor().execute(codeStep(code), {}, limits);
      expect(result.error?.kind).toBe("code-error");
      expect(result.error?.message).toBe("Error: Input validation failed for math.add: /a must be number");
    });

    it("hides tools when code tool calls are disabled", async () => {
      const result = await createExecutor(false).execute(codeStep("return typeof tools;"), {}, limits);
      expect(result.output).toBe("undefined");
    });

    it("applies a per-step tool call limit", async () => {
      const code = "await tools.call(\"util.echo\");\nawait tools.call(\"util.echo\");\nreturn 1;";
      const result = await createExecutor().execute(codeStep(code), {}, { ...limits, maxToolCalls: 1 });
      expect(result.violation).toBe("resource-limit");
      expect(result.toolCalls).toBe(2);
    });

    it("reports sandbox violations", async () => {
      const result = await createExecutor().execute(
        codeStep('import { execSync } from "child_process";\nreturn execSync("id");'),
        {},
        limits,
      );
      expect(result.success).toBe(false);
      expect(result.violation).toBe("forbidden-import");
    });
  });

  it("analyzes code against its allow-list", () => {
    const registry = new ToolRegistry();
    const executor = new StepExecutor({ registry, sandbox: { allowedModules: ["node:url"] } });
    expect(executor.analyze('import { URL } from "node:url";').ok).toBe(true);
    expect(executor.analyze('import path from "node:path";').ok).toBe(false);
  });
});

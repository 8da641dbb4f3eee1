import { describe, it, expect } from "vitest";
import { parseWorkflow } from "../../src/workflow/WorkflowParser.js";

const yamlSource = `
name: demo
version: 2
description: Fetch and shape
defaults:
  timeout_ms: 2000
  retry: { max_retries: 1 }
inputs:
  - name: topic
  - name: limit
    default: 3
steps:
  - id: fetch
    tool: util.echo
    inputs: { topic: "{{ inputs.topic }}", page_size: 10 }
    timeout_ms: 500
    retry: { max_retries: 2, backoff: exponential, delay_ms: 10 }
  - id: shape
    code: "return inputs.data;"
    depends_on: [fetch]
outputs:
  - name: result
    from: steps.shape.output
`;

describe("parseWorkflow", () => {
  it("parses YAML with snake_case keys", () => {
    const result = parseWorkflow(yamlSource);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { definition } = result;

    expect(definition.name).toBe("demo");
    expect(definition.version).toBe("2");
    expect(definition.defaults).toEqual({ timeoutMs: 2000, retry: { maxRetries: 1 } });
    expect(definition.inputs.map((i) => [i.name, i.required, i.default])).toEqual([
      ["topic", true, undefined],
      ["limit", false, 3],
    ]);
    expect(definition.steps[0]).toMatchObject({
      id: "fetch",
      kind: "tool",
      tool: "util.echo",
      inputs: { topic: "{{ inputs.topic }}", page_size: 10 },
      dependsOn: [],
      timeoutMs: 500,
      retry: { maxRetries: 2, backoff: "exponential", delayMs: 10 },
    });
    expect(definition.steps[1]).toMatchObject({ id: "shape", kind: "code", dependsOn: ["fetch"] });
    expect(definition.outputs).toEqual([{ name: "result", from: "steps.shape.output", value: undefined }]);
  });

  it("reads on_error and rejects unknown policies", () => {
    const parsed = parseWorkflow({ name: "w", steps: [{ id: "a", code: "return 1;", on_error: "skip" }, { id: "b", code: "return 2;" }] });
    if (!parsed.ok) throw parsed.error;
    expect(parsed.definition.steps.map((step) => step.onError)).toEqual(["skip", undefined]);

    const rejected = parseWorkflow({ name: "w", steps: [{ id: "a", code: "return 1;", on_error: "retry" }] });
    expect(rejected.ok).toBe(false);
    if (!rejected.ok) expect(rejected.error.kind).toBe("bad-syntax");
  });

  it("returns a deeply frozen definition", () => {
    const result = parseWorkflow(yamlSource);
    if (!result.ok) throw result.error;
    expect(Object.isFrozen(result.definition)).toBe(true);
    expect(Object.isFrozen(result.definition.steps[0]?.inputs)).toBe(true);
  });

  it("accepts JSON text and plain objects without touching the caller's object", () => {
    const doc = { name: "obj", steps: [{ id: "a", code: "return 1;" }] };
    expect(parseWorkflow(JSON.stringify(doc)).ok).toBe(true);
    expect(parseWorkflow(doc).ok).toBe(true);
    expect(Object.isFrozen(doc)).toBe(false);
  });

  it("lets an input be optional without a default", () => {
    const result = parseWorkflow({
      name: "w",
      inputs: [{ name: "tag", required: false }],
      steps: [{ id: "a", code: "return 1;" }],
    });
    expect(result.ok && result.definition.inputs[0]?.required).toBe(false);
  });

  describe("rejections", () => {
    it.each([
      ["missing steps", { name: "w" }],
      ["empty steps", { name: "w", steps: [] }],
    ])("reports empty-workflow for %s", (_label, doc) => {
      const result = parseWorkflow(doc);
      expect(result.ok || [result.error.kind, result.error.message]).toEqual(["empty-workflow", "Workflow has no steps"]);
    });

    it("reports unparsable text as bad-syntax", () => {
      const result = parseWorkflow("steps: [");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("bad-syntax");
      expect(result.error.message.startsWith("Workflow document is not valid YAML or JSON:")).toBe(true);
    });

    it("reports a scalar document as bad-syntax", () => {
      const result = parseWorkflow("just text");
      expect(result.ok || result.error.message).toBe("Workflow document must be a mapping");
    });

    it("reports unknown step keys", () => {
      const result = parseWorkflow({ name: "w", steps: [{ id: "a", tool: "x", colour: "red" }] });
      expect(result.ok || result.error.message).toBe(
        "Invalid workflow document: /steps/0 must NOT have additional properties",
      );
    });

    it("reports invalid step ids", () => {
      const result = parseWorkflow({ name: "w", steps: [{ id: "1st step", tool: "x" }] });
      expect(result.ok || result.error.kind).toBe("bad-syntax");
    });

    it("requires exactly one of tool or code", () => {
      const both = parseWorkflow({ name: "w", steps: [{ id: "a", tool: "x", code: "return 1;" }] });
      const neither = parseWorkflow({ name: "w", steps: [{ id: "b" }] });
      expect(both.ok || both.error.message).toBe('Step "a" must declare exactly one of tool or code');
      expect(neither.ok || neither.error.message).toBe('Step "b" must declare exactly one of tool or code');
    });

    it("rejects a kind that contradicts the body", () => {
      const result = parseWorkflow({ name: "w", steps: [{ id: "a", kind: "code", tool: "x" }] });
      expect(result.ok || result.error.message).toBe('Step "a" is declared as code but defines tool');
    });
  });
});

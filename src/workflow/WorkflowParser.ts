import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import type {
  RetryPolicy,
  Step,
  WorkflowDefaults,
  WorkflowDefinition,
  WorkflowInput,
  WorkflowOutput,
} from "../types/Workflow.js";
import type { JsonSchema } from "../types/ToolDescriptor.js";
import { SchemaValidator, formatSchemaErrors } from "../core/SchemaValidator.js";
import { deepFreeze } from "../util/deepFreeze.js";
import { ValidationError } from "./errors.js";

export type ParseResult =
  | { ok: true; definition: WorkflowDefinition }
  | { ok: false; error: ValidationError };

type Doc = Record<string, unknown>;

let workflowSchema: JsonSchema | undefined;

/** JSON Schema for workflow documents, read once from schemas/. */
export function getWorkflowSchema(): JsonSchema {
  if (!workflowSchema) {
    const text = readFileSync(new URL("../../schemas/workflow.schema.json", import.meta.url), "utf-8");
    const parsed: unknown = JSON.parse(text);
    if (!isDoc(parsed)) {
      throw new Error("workflow.schema.json is not a JSON object");
    }
    workflowSchema = parsed;
  }
  return workflowSchema;
}

// Documents are checked as written: no coercion, no defaults, nothing stripped
const documentValidator = new SchemaValidator({
  coerceTypes: false,
  useDefaults: false,
  removeAdditional: false,
});

/**
 * Parse a workflow from YAML/JSON text or a plain object. snake_case keys
 * (`depends_on`, `timeout_ms`, `on_error`, `max_retries`, `delay_ms`) are accepted next
 * to camelCase. The result is deep-frozen.
 */
export function parseWorkflow(source: string | object): ParseResult {
  let raw: unknown;
  try {
    // Objects are copied so freezing never reaches the caller's values
    raw = typeof source === "string" ? yaml.load(source) : structuredClone(source);
  } catch (error) {
    return fail("bad-syntax", `Workflow document is not valid YAML or JSON: ${errorText(error)}`);
  }
  if (!isDoc(raw)) {
    return fail("bad-syntax", "Workflow document must be a mapping");
  }

  const doc = camelize(raw);
  if (doc.steps === undefined || (Array.isArray(doc.steps) && doc.steps.length === 0)) {
    return fail("empty-workflow", "Workflow has no steps");
  }
  if (Array.isArray(doc.steps)) {
    doc.steps = doc.steps.map((step: unknown) => (isDoc(step) ? normalizeStep(step) : step));
  }
  if (isDoc(doc.defaults)) {
    doc.defaults = normalizeRetryHolder(camelize(doc.defaults));
  }
  if (Array.isArray(doc.inputs)) {
    doc.inputs = doc.inputs.map((item: unknown) => (isDoc(item) ? camelize(item) : item));
  }
  if (Array.isArray(doc.outputs)) {
    doc.outputs = doc.outputs.map((item: unknown) => (isDoc(item) ? camelize(item) : item));
  }

  const checked = documentValidator.validate(getWorkflowSchema(), doc);
  if (!checked.valid) {
    return fail("bad-syntax", `Invalid workflow document: ${formatSchemaErrors(checked.errors ?? [])}`, {
      errors: checked.errors,
    });
  }

  const steps: Step[] = [];
  for (const item of asDocs(doc.steps)) {
    const step = toStep(item);
    if (step instanceof ValidationError) {
      return { ok: false, error: step };
    }
    steps.push(step);
  }

  const definition: WorkflowDefinition = {
    name: String(doc.name),
    version: doc.version === undefined ? undefined : String(doc.version),
    description: typeof doc.description === "string" ? doc.description : undefined,
    defaults: toDefaults(doc.defaults),
    inputs: asDocs(doc.inputs).map(toInput),
    steps,
    outputs: asDocs(doc.outputs).map(toOutput),
  };
  return { ok: true, definition: deepFreeze(definition) };
}

/**
 * Read and parse a workflow file.
 */
export async function loadWorkflowFile(path: string): Promise<ParseResult> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    return fail("bad-syntax", `Cannot read workflow file ${path}: ${errorText(error)}`);
  }
  return parseWorkflow(text);
}

function toStep(doc: Doc): Step | ValidationError {
  const id = String(doc.id);
  const hasTool = typeof doc.tool === "string";
  const hasCode = typeof doc.code === "string";
  if (hasTool === hasCode) {
    return new ValidationError(
      "bad-syntax",
      `Step "${id}" must declare exactly one of tool or code`,
      { stepId: id },
    );
  }
  const kind = hasTool ? "tool" : "code";
  if (doc.kind !== undefined && doc.kind !== kind) {
    return new ValidationError("bad-syntax", `Step "${id}" is declared as ${String(doc.kind)} but defines ${kind}`, {
      stepId: id,
    });
  }

  const base: Omit<Step, "kind"> = {
    id,
    description: typeof doc.description === "string" ? doc.description : undefined,
    inputs: isDoc(doc.inputs) ? doc.inputs : {},
    dependsOn: Array.isArray(doc.dependsOn) ? doc.dependsOn.map(String) : [],
    retry: toRetry(doc.retry),
    timeoutMs: typeof doc.timeoutMs === "number" ? doc.timeoutMs : undefined,
    onError: doc.onError === "fail" || doc.onError === "skip" ? doc.onError : undefined,
  };
  return typeof doc.tool === "string"
    ? { ...base, kind: "tool", tool: doc.tool }
    : { ...base, kind: "code", code: String(doc.code) };
}

function toRetry(value: unknown): Partial<RetryPolicy> | undefined {
  if (!isDoc(value)) return undefined;
  const retry: Partial<RetryPolicy> = {};
  if (typeof value.maxRetries === "number") retry.maxRetries = value.maxRetries;
  if (value.backoff === "fixed" || value.backoff === "exponential") retry.backoff = value.backoff;
  if (typeof value.delayMs === "number") retry.delayMs = value.delayMs;
  return retry;
}

function toDefaults(value: unknown): WorkflowDefaults {
  if (!isDoc(value)) return {};
  return {
    timeoutMs: typeof value.timeoutMs === "number" ? value.timeoutMs : undefined,
    retry: toRetry(value.retry),
  };
}

function toInput(doc: Doc): WorkflowInput {
  return {
    name: String(doc.name),
    // Inputs without a default are required unless stated otherwise
    required: typeof doc.required === "boolean" ? doc.required : !("default" in doc),
    default: doc.default,
    description: typeof doc.description === "string" ? doc.description : undefined,
  };
}

function toOutput(doc: Doc): WorkflowOutput {
  return {
    name: String(doc.name),
    from: typeof doc.from === "string" ? doc.from : undefined,
    value: doc.value,
  };
}

function normalizeStep(step: Doc): Doc {
  return normalizeRetryHolder(camelize(step));
}

function normalizeRetryHolder(doc: Doc): Doc {
  return isDoc(doc.retry) ? { ...doc, retry: camelize(doc.retry) } : doc;
}

/**
 * Shallow snake_case to camelCase key mapping. Values are left alone, so
 * literal step inputs keep their keys.
 */
function camelize(doc: Doc): Doc {
  const out: Doc = {};
  for (const [key, value] of Object.entries(doc)) {
    out[key.replace(/_([a-z])/g, (_m, c: string) => c.toUpperCase())] = value;
  }
  return out;
}

function asDocs(value: unknown): Doc[] {
  return Array.isArray(value) ? value.filter(isDoc) : [];
}

function isDoc(value: unknown): value is Doc {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function fail(kind: ValidationError["kind"], message: string, details?: unknown): ParseResult {
  return { ok: false, error: new ValidationError(kind, message, details) };
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

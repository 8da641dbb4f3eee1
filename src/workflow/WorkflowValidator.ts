import type { Step, WorkflowDefinition } from "../types/Workflow.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import { parseCode } from "../sandbox/CodeAnalyzer.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import { checkExpression, checkTemplates, extractExpressions, stepReferences } from "./Bindings.js";
import { buildDag, type WorkflowDag } from "./Dag.js";
import { ValidationError } from "./errors.js";
import { parseWorkflow } from "./WorkflowParser.js";

/**
 * strict: every tool step must name a tool already in the registry cache.
 * deferred: tool names are resolved when the step runs.
 */
export type ToolResolutionMode = "strict" | "deferred";

export interface WorkflowValidatorOptions {
  registry?: ToolRegistry;
  toolResolution?: ToolResolutionMode;
  logger?: Logger;
}

export type ValidationOutcome =
  | { ok: true; definition: WorkflowDefinition; dag: WorkflowDag }
  | { ok: false; error: ValidationError };

/**
 * Checks a workflow in a fixed order (empty, syntax, tools, dependencies,
 * cycles) and builds its DAG. Reads the registry cache but never fetches.
 */
export class WorkflowValidator {
  private readonly registry?: ToolRegistry;
  private readonly mode: ToolResolutionMode;
  private readonly logger: Logger;

  constructor(options: WorkflowValidatorOptions = {}) {
    this.registry = options.registry;
    this.mode = options.registry ? (options.toolResolution ?? "strict") : "deferred";
    this.logger = options.logger ?? createLogger({ prefix: "WorkflowValidator" });
  }

  validate(input: string | object): ValidationOutcome {
    const parsed = parseWorkflow(input);
    if (!parsed.ok) {
      return this.reject(parsed.error);
    }
    const { definition } = parsed;

    const syntax = checkSyntax(definition);
    if (syntax) {
      return this.reject(syntax);
    }

    if (this.mode === "strict" && this.registry) {
      for (const step of definition.steps) {
        if (step.kind === "tool" && !this.registry.peek(step.tool)) {
          return this.reject(
            new ValidationError("unknown-tool", `Step "${step.id}" uses unknown tool "${step.tool}"`, {
              stepId: step.id,
              tool: step.tool,
            }),
          );
        }
      }
    }

    const stepIds = new Set(definition.steps.map((step) => step.id));
    for (const output of definition.outputs) {
      for (const ref of output.from ? stepReferences(output.from) : []) {
        if (!stepIds.has(ref)) {
          return this.reject(
            new ValidationError("unknown-dependency", `Output "${output.name}" references unknown step "${ref}"`, {
              output: output.name,
              dependency: ref,
            }),
          );
        }
      }
    }

    const dag = buildDag(definition.steps, collectReferences(definition.steps));
    if (!dag.ok) {
      return this.reject(dag.error);
    }

    this.logger.debug("Workflow valid", { workflow: definition.name, steps: dag.dag.order.length });
    return { ok: true, definition, dag: dag.dag };
  }

  private reject(error: ValidationError): ValidationOutcome {
    this.logger.debug("Workflow rejected", { kind: error.kind, message: error.message });
    return { ok: false, error };
  }
}

function checkSyntax(definition: WorkflowDefinition): ValidationError | undefined {
  const seen = new Set<string>();
  for (const step of definition.steps) {
    if (seen.has(step.id)) {
      return new ValidationError("bad-syntax", `Duplicate step id "${step.id}"`, { stepId: step.id });
    }
    seen.add(step.id);
  }

  for (const step of definition.steps) {
    if (step.kind === "code") {
      const parsed = parseCode(step.code);
      if (!parsed.ok) {
        return new ValidationError("bad-syntax", `Step "${step.id}": ${parsed.finding.message}`, {
          stepId: step.id,
          line: parsed.finding.line,
          column: parsed.finding.column,
        });
      }
    }
    const [problem] = checkTemplates(step.inputs, "inputs");
    if (problem) {
      return new ValidationError("bad-syntax", `Step "${step.id}" ${problem.path}: ${problem.message}`, {
        stepId: step.id,
        path: problem.path,
      });
    }
  }

  const names = new Set<string>();
  for (const input of definition.inputs) {
    if (names.has(input.name)) {
      return new ValidationError("bad-syntax", `Duplicate workflow input "${input.name}"`);
    }
    names.add(input.name);
  }

  for (const output of definition.outputs) {
    if ((output.from === undefined) === (output.value === undefined)) {
      return new ValidationError("bad-syntax", `Output "${output.name}" must declare exactly one of from or value`);
    }
    const problem = output.from !== undefined ? checkExpression(output.from) : undefined;
    if (problem) {
      return new ValidationError("bad-syntax", `Output "${output.name}": ${problem}`);
    }
  }
  return undefined;
}

/**
 * Implicit edges: a step binding `steps.<id>` depends on that step.
 */
function collectReferences(steps: readonly Step[]): Map<string, string[]> {
  const references = new Map<string, string[]>();
  for (const step of steps) {
    const ids = new Set<string>();
    for (const expression of extractExpressions(step.inputs)) {
      for (const id of stepReferences(expression)) {
        ids.add(id);
      }
    }
    references.set(step.id, [...ids]);
  }
  return references;
}

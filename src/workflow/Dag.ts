import type { Step } from "../types/Workflow.js";
import { ValidationError } from "./errors.js";

/**
 * Step arena plus adjacency lists by id. `order` is a topological order that
 * keeps declaration order among steps that are ready together.
 */
export interface WorkflowDag {
  steps: ReadonlyMap<string, Step>;
  /** step id -> ids it waits for */
  dependencies: ReadonlyMap<string, readonly string[]>;
  /** step id -> ids waiting for it */
  dependents: ReadonlyMap<string, readonly string[]>;
  order: readonly string[];
}

export type DagResult = { ok: true; dag: WorkflowDag } | { ok: false; error: ValidationError };

/**
 * Build the dependency graph over `steps`. Edges come from `dependsOn` and
 * from the implicit references passed in `references` (step id -> referenced
 * step ids).
 */
export function buildDag(
  steps: readonly Step[],
  references: ReadonlyMap<string, readonly string[]> = new Map(),
): DagResult {
  const arena = new Map<string, Step>();
  const index = new Map<string, number>();
  steps.forEach((step, i) => {
    arena.set(step.id, step);
    index.set(step.id, i);
  });

  const dependencies = new Map<string, string[]>();
  const dependents = new Map<string, string[]>();
  for (const step of steps) {
    dependents.set(step.id, []);
  }

  for (const step of steps) {
    const wanted = new Set([...step.dependsOn, ...(references.get(step.id) ?? [])]);
    const deps: string[] = [];
    for (const dep of wanted) {
      if (!arena.has(dep)) {
        return {
          ok: false,
          error: new ValidationError(
            "unknown-dependency",
            `Step "${step.id}" depends on unknown step "${dep}"`,
            { stepId: step.id, dependency: dep },
          ),
        };
      }
      deps.push(dep);
      dependents.get(dep)?.push(step.id);
    }
    dependencies.set(step.id, deps);
  }

  // Kahn's algorithm; the ready list stays sorted by declaration index
  const byIndex = (a: string, b: string) => (index.get(a) ?? 0) - (index.get(b) ?? 0);
  const inDegree = new Map<string, number>();
  for (const [id, deps] of dependencies) {
    inDegree.set(id, deps.length);
  }
  const ready = steps.filter((step) => inDegree.get(step.id) === 0).map((step) => step.id);
  const order: string[] = [];

  while (ready.length > 0) {
    const current = ready.shift();
    if (current === undefined) break;
    order.push(current);
    for (const next of dependents.get(current) ?? []) {
      const degree = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, degree);
      if (degree === 0) {
        ready.push(next);
        ready.sort(byIndex);
      }
    }
  }

  if (order.length !== steps.length) {
    const remaining = new Set(steps.map((step) => step.id).filter((id) => !order.includes(id)));
    const cycle = findCycle(remaining, dependencies, byIndex);
    return {
      ok: false,
      error: new ValidationError(
        "cyclic-dependency",
        `Dependency cycle: ${cycle.join(" -> ")}`,
        { cycle },
      ),
    };
  }

  return {
    ok: true,
    dag: { steps: arena, dependencies, dependents, order },
  };
}

/**
 * Every step left over by Kahn's algorithm waits on another leftover step,
 * so walking dependencies from any of them must revisit a step.
 */
function findCycle(
  remaining: ReadonlySet<string>,
  dependencies: ReadonlyMap<string, readonly string[]>,
  byIndex: (a: string, b: string) => number,
): string[] {
  const [start] = [...remaining].sort(byIndex);
  if (start === undefined) return [];

  const path: string[] = [];
  const seen = new Map<string, number>();
  let current: string | undefined = start;
  while (current !== undefined && !seen.has(current)) {
    seen.set(current, path.length);
    path.push(current);
    current = (dependencies.get(current) ?? []).filter((dep) => remaining.has(dep)).sort(byIndex)[0];
  }
  if (current === undefined) return path.reverse();

  const loop = path.slice(seen.get(current)).reverse();
  const [first] = loop;
  return first === undefined ? loop : [...loop, first];
}

/**
 * Every step that transitively depends on `stepId`, in topological order.
 */
export function transitiveDependents(dag: WorkflowDag, stepId: string): string[] {
  const found = new Set<string>();
  const stack = [...(dag.dependents.get(stepId) ?? [])];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || found.has(id)) continue;
    found.add(id);
    stack.push(...(dag.dependents.get(id) ?? []));
  }
  return dag.order.filter((id) => found.has(id));
}

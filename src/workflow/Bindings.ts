import jmespath from "jmespath";
import { createTaggedError } from "../core/Retry.js";

const FIELD_SEGMENT = /\s*(?:(\.)\s*)?(?:"((?:[^"\\]|\\.)+)"|([A-Za-z_][A-Za-z0-9_]*)|\[\s*(-?\d+)\s*\])/y;
const BINDING = /\{\{\s*(.*?)\s*\}\}/g;
const WHOLE_BINDING = /^\{\{\s*(.*?)\s*\}\}$/;
// Root references only: `inputs.steps.x` names a field, not a step.
const STEP_REFERENCE = /(?<![\w$."\]]\s*)steps\s*\.\s*(?:"((?:[^"\\]|\\.)+)"|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Data visible to binding expressions during a run.
 */
export interface BindingScope {
  inputs: Record<string, unknown>;
  steps: Record<string, { output: unknown }>;
}

export interface BindingProblem {
  /** Where the template sits, e.g. `inputs.url` */
  path: string;
  message: string;
}

/**
 * Collect every `{{ expr }}` expression inside a value, recursively.
 */
export function extractExpressions(value: unknown): string[] {
  const found: string[] = [];
  visitStrings(value, "", (text) => {
    for (const match of text.matchAll(BINDING)) {
      found.push(match[1] ?? "");
    }
  });
  return found;
}

/**
 * Step ids referenced as `steps.<id>` by an expression.
 */
export function stepReferences(expression: string): string[] {
  const ids = new Set<string>();
  for (const match of expression.matchAll(STEP_REFERENCE)) {
    const id = match[1] !== undefined ? unescapeQuoted(match[1]) : match[2];
    if (id !== undefined) ids.add(id);
  }
  return [...ids];
}

/**
 * Check a single JMESPath expression. Returns the problem text or undefined.
 */
export function checkExpression(expression: string): string | undefined {
  if (expression.trim() === "") {
    return "empty binding expression";
  }
  try {
    jmespath.search({}, expression);
    return undefined;
  } catch (error) {
    if (error instanceof Error && (error.name === "ParserError" || error.name === "LexerError")) {
      return `invalid expression "${expression}": ${error.message}`;
    }
    // Runtime errors against an empty scope are fine at this stage
    return undefined;
  }
}

/**
 * Find malformed templates: unbalanced braces, empty or unparsable expressions.
 */
export function checkTemplates(value: unknown, basePath: string): BindingProblem[] {
  const problems: BindingProblem[] = [];
  visitStrings(value, basePath, (text, path) => {
    const leftover = text.replace(BINDING, "");
    if (leftover.includes("{{") || leftover.includes("}}")) {
      problems.push({ path, message: "unbalanced {{ }} binding" });
      return;
    }
    for (const match of text.matchAll(BINDING)) {
      const problem = checkExpression(match[1] ?? "");
      if (problem) problems.push({ path, message: problem });
    }
  });
  return problems;
}

/**
 * Resolve every template in `value` against the scope. A string that is one
 * whole binding keeps the bound value's type; mixed text is interpolated.
 * Throws an `unbound-input` tagged error when an expression yields nothing.
 */
export function bindValue(value: unknown, scope: BindingScope, path = "inputs"): unknown {
  if (typeof value === "string") {
    return bindString(value, scope, path);
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => bindValue(item, scope, `${path}[${i}]`));
  }
  if (value !== null && typeof value === "object") {
    const bound: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      bound[key] = bindValue(item, scope, `${path}.${key}`);
    }
    return bound;
  }
  return value;
}

/**
 * Evaluate a bare expression (no braces) against the scope.
 */
export function evaluate(expression: string, scope: BindingScope, path: string): unknown {
  let result: unknown;
  try {
    result = jmespath.search(scope, expression);
  } catch (error) {
    throw createTaggedError(
      "unbound-input",
      `Cannot evaluate "${expression}" for ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path, expression },
    );
  }
  if (result === undefined || (result === null && !holdsNull(scope, expression))) {
    throw createTaggedError("unbound-input", `"${expression}" resolved to nothing for ${path}`, {
      path,
      expression,
    });
  }
  return result;
}

/**
 * True when the expression is a plain field path (`steps.a.output`,
 * `inputs."x-y"[0]`) that exists in the scope and holds null, as opposed to
 * a path that is missing.
 */
function holdsNull(scope: BindingScope, expression: string): boolean {
  const segments = parseFieldPath(expression);
  if (!segments) return false;
  let current: unknown = scope;
  for (const segment of segments) {
    if (typeof segment === "number") {
      if (!Array.isArray(current)) return false;
      const index = segment < 0 ? current.length + segment : segment;
      if (index < 0 || index >= current.length) return false;
      current = current[index];
    } else {
      if (current === null || typeof current !== "object" || Array.isArray(current)) return false;
      if (!Object.hasOwn(current, segment)) return false;
      current = Reflect.get(current, segment);
    }
  }
  return current === null;
}

function parseFieldPath(expression: string): Array<string | number> | undefined {
  const text = expression.trim();
  const segments: Array<string | number> = [];
  let index = 0;
  while (index < text.length) {
    FIELD_SEGMENT.lastIndex = index;
    const match = FIELD_SEGMENT.exec(text);
    if (!match) return undefined;
    const [, dot, quoted, name, position] = match;
    if (position !== undefined) {
      if (dot !== undefined || segments.length === 0) return undefined;
      segments.push(Number(position));
    } else {
      if ((dot !== undefined) !== (segments.length > 0)) return undefined;
      segments.push(quoted !== undefined ? unescapeQuoted(quoted) : (name ?? ""));
    }
    index = FIELD_SEGMENT.lastIndex;
  }
  return segments.length > 0 ? segments : undefined;
}

function bindString(text: string, scope: BindingScope, path: string): unknown {
  const whole = WHOLE_BINDING.exec(text);
  if (whole && !whole[1]?.includes("}}")) {
    return evaluate(whole[1] ?? "", scope, path);
  }
  return text.replace(BINDING, (_match, expression: string) => {
    const result = evaluate(expression, scope, path);
    return typeof result === "string" ? result : JSON.stringify(result);
  });
}

function visitStrings(value: unknown, path: string, visit: (text: string, path: string) => void): void {
  if (typeof value === "string") {
    visit(value, path);
  } else if (Array.isArray(value)) {
    value.forEach((item, i) => visitStrings(item, `${path}[${i}]`, visit));
  } else if (value !== null && typeof value === "object") {
    for (const [key, item] of Object.entries(value)) {
      visitStrings(item, path ? `${path}.${key}` : key, visit);
    }
  }
}

function unescapeQuoted(raw: string): string {
  try {
    const parsed: unknown = JSON.parse(`"${raw}"`);
    return typeof parsed === "string" ? parsed : raw;
  } catch {
    return raw;
  }
}

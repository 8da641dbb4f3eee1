import { parse, type AnyNode, type Node, type Program } from "acorn";
import { full } from "acorn-walk";
import type { StepErrorKind } from "../types/Sandbox.js";

/**
 * Identifier prefix reserved for names the sandbox injects.
 */
export const RESERVED_PREFIX = "__sandbox";

/**
 * Guard call inserted into every loop and function body.
 */
export const CHECKPOINT_CALL = `${RESERVED_PREFIX}_checkpoint__()`;

const EVAL_NAMES = new Set(["eval", "Function", "WebAssembly"]);

export interface CodeFinding {
  kind: Extract<StepErrorKind, "forbidden-import" | "forbidden-eval" | "code-error">;
  message: string;
  line?: number;
  column?: number;
}

export type CodeAnalysis =
  | { ok: true; code: string; imports: string[] }
  | { ok: false; finding: CodeFinding };

interface Edit {
  start: number;
  end: number;
  text: string;
  /** close = inserted suffix, open = inserted prefix, replace = range swap */
  role: "close" | "open" | "replace";
  /** Extent of the node the edit belongs to; orders coinciding edits */
  nodeStart: number;
  nodeEnd: number;
}

const ROLE_RANK: Record<Edit["role"], number> = { close: 0, open: 1, replace: 2 };

type NodeOfType<T extends AnyNode["type"]> = Extract<AnyNode, { type: T }>;

function is<T extends AnyNode["type"]>(node: Node, type: T): node is NodeOfType<T> {
  return node.type === type;
}

/**
 * Parse inline step code without running it.
 * Returns the first syntax problem, if any.
 */
export function parseCode(source: string): { ok: true; program: Program } | { ok: false; finding: CodeFinding } {
  try {
    const program = parse(source, {
      ecmaVersion: "latest",
      sourceType: "module",
      allowReturnOutsideFunction: true,
      allowAwaitOutsideFunction: true,
      locations: true,
    });
    return { ok: true, program };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const loc = syntaxLocation(error);
    return { ok: false, finding: { kind: "code-error", message: `Syntax error: ${message}`, ...loc } };
  }
}

/**
 * Statically check inline code against the module allow-list and the
 * dynamic-code ban, then rewrite it for the sandbox runtime: allowed imports
 * become calls to the sandbox `require`, loops and function bodies get a
 * checkpoint call. Findings are reported in source order; the first wins.
 */
export function analyzeCode(source: string, allowedModules: ReadonlySet<string>): CodeAnalysis {
  const parsed = parseCode(source);
  if (!parsed.ok) {
    return parsed;
  }

  const findings: Array<CodeFinding & { pos: number }> = [];
  const edits: Edit[] = [];
  const imports = new Set<string>();

  const report = (node: Node, kind: CodeFinding["kind"], message: string) => {
    findings.push({
      kind,
      message,
      pos: node.start,
      line: node.loc?.start.line,
      column: node.loc?.start.column,
    });
  };

  const checkModule = (node: Node, specifier: AnyNode | undefined, how: string): string | undefined => {
    if (!specifier || !is(specifier, "Literal") || typeof specifier.value !== "string") {
      report(node, "forbidden-import", `${how} with a non-literal module specifier is not allowed`);
      return undefined;
    }
    if (!allowedModules.has(specifier.value)) {
      report(node, "forbidden-import", `Module "${specifier.value}" is not allowed`);
      return undefined;
    }
    imports.add(specifier.value);
    return specifier.value;
  };

  const guardBlock = (body: Node) => {
    edits.push({
      start: body.start + 1,
      end: body.start + 1,
      text: `${CHECKPOINT_CALL};`,
      role: "open",
      nodeStart: body.start,
      nodeEnd: body.end,
    });
  };

  const guardStatement = (body: Node) => {
    if (is(body, "BlockStatement")) {
      guardBlock(body);
      return;
    }
    edits.push(
      { start: body.start, end: body.start, text: `{${CHECKPOINT_CALL};`, role: "open", nodeStart: body.start, nodeEnd: body.end },
      { start: body.end, end: body.end, text: "}", role: "close", nodeStart: body.start, nodeEnd: body.end },
    );
  };

  full(parsed.program, (node, _state, walkType) => {
    if (is(node, "Identifier")) {
      if (node.name.startsWith(RESERVED_PREFIX)) {
        report(node, "code-error", `Identifier "${node.name}" uses a reserved prefix`);
      } else if (walkType === "Identifier" && EVAL_NAMES.has(node.name)) {
        report(node, "forbidden-eval", `Dynamic code construction via ${node.name} is not allowed`);
      }
      return;
    }

    if (is(node, "ImportDeclaration")) {
      const name = checkModule(node, node.source, "import");
      if (name !== undefined) {
        edits.push({
          start: node.start,
          end: node.end,
          text: importToRequire(node, name),
          role: "replace",
          nodeStart: node.start,
          nodeEnd: node.end,
        });
      }
      return;
    }

    if (is(node, "ImportExpression")) {
      const name = checkModule(node, node.source, "import()");
      if (name !== undefined) {
        edits.push({
          start: node.start,
          end: node.end,
          text: `Promise.resolve(require(${JSON.stringify(name)}))`,
          role: "replace",
          nodeStart: node.start,
          nodeEnd: node.end,
        });
      }
      return;
    }

    if (is(node, "CallExpression")) {
      if (is(node.callee, "Identifier") && node.callee.name === "require") {
        checkModule(node, node.arguments[0], "require()");
      }
      return;
    }

    if (is(node, "MetaProperty")) {
      if (node.meta.name === "import") {
        report(node, "forbidden-import", "import.meta is not available");
      }
      return;
    }

    if (is(node, "MemberExpression")) {
      const property = node.property;
      const name = node.computed
        ? is(property, "Literal") && typeof property.value === "string"
          ? property.value
          : undefined
        : is(property, "Identifier")
          ? property.name
          : undefined;
      if (name !== undefined && EVAL_NAMES.has(name)) {
        report(node, "forbidden-eval", `Dynamic code construction via .${name} is not allowed`);
      }
      return;
    }

    if (
      is(node, "ExportNamedDeclaration") ||
      is(node, "ExportDefaultDeclaration") ||
      is(node, "ExportAllDeclaration")
    ) {
      report(node, "code-error", "Step code cannot export bindings; return the output instead");
      return;
    }

    if (
      is(node, "ForStatement") ||
      is(node, "ForInStatement") ||
      is(node, "ForOfStatement") ||
      is(node, "WhileStatement") ||
      is(node, "DoWhileStatement")
    ) {
      guardStatement(node.body);
      return;
    }

    if (is(node, "FunctionDeclaration") || is(node, "FunctionExpression")) {
      guardBlock(node.body);
      return;
    }

    if (is(node, "ArrowFunctionExpression")) {
      const body = node.body;
      if (is(body, "BlockStatement")) {
        guardBlock(body);
      } else {
        edits.push(
          { start: body.start, end: body.start, text: `(${CHECKPOINT_CALL}, `, role: "open", nodeStart: body.start, nodeEnd: body.end },
          { start: body.end, end: body.end, text: ")", role: "close", nodeStart: body.start, nodeEnd: body.end },
        );
      }
    }
  });

  if (findings.length > 0) {
    const [first] = findings.sort((a, b) => a.pos - b.pos);
    if (first) {
      const { pos: _pos, ...finding } = first;
      return { ok: false, finding };
    }
  }

  return { ok: true, code: applyEdits(source, edits), imports: [...imports].sort() };
}

function importToRequire(node: NodeOfType<"ImportDeclaration">, moduleName: string): string {
  const target = `require(${JSON.stringify(moduleName)})`;
  if (node.specifiers.length === 0) {
    return `${target};`;
  }

  const statements: string[] = [];
  const named: string[] = [];
  for (const spec of node.specifiers) {
    if (spec.type === "ImportSpecifier") {
      const imported: Node = spec.imported;
      const key = is(imported, "Identifier")
        ? imported.name
        : is(imported, "Literal")
          ? JSON.stringify(imported.value)
          : "default";
      named.push(`${key}: ${spec.local.name}`);
    } else {
      statements.push(`const ${spec.local.name} = ${target};`);
    }
  }
  if (named.length > 0) {
    statements.push(`const { ${named.join(", ")} } = ${target};`);
  }
  return statements.join(" ");
}

/**
 * Apply non-overlapping edits. Coinciding positions: closers before openers,
 * inner closers first, outer openers first.
 */
function applyEdits(source: string, edits: Edit[]): string {
  const ordered = [...edits].sort(
    (a, b) =>
      a.start - b.start ||
      ROLE_RANK[a.role] - ROLE_RANK[b.role] ||
      (a.role === "close" ? b.nodeStart - a.nodeStart : b.nodeEnd - a.nodeEnd),
  );

  let out = "";
  let cursor = 0;
  for (const edit of ordered) {
    out += source.slice(cursor, edit.start) + edit.text;
    cursor = Math.max(cursor, edit.end);
  }
  return out + source.slice(cursor);
}

function syntaxLocation(error: unknown): { line?: number; column?: number } {
  if (error !== null && typeof error === "object" && "loc" in error) {
    const loc = error.loc;
    if (loc !== null && typeof loc === "object" && "line" in loc && "column" in loc) {
      const { line, column } = loc;
      if (typeof line === "number" && typeof column === "number") {
        return { line, column };
      }
    }
  }
  return {};
}

import { describe, it, expect } from "vitest";
import { analyzeCode, parseCode } from "../src/sandbox/CodeAnalyzer.js";
import { buildAllowList } from "../src/sandbox/modules.js";

const allowed = buildAllowList();

describe("parseCode", () => {
  it("accepts top-level return and await", () => {
    expect(parseCode("const x = await Promise.resolve(1);\nreturn x;").ok).toBe(true);
  });

  it("reports syntax errors with a location", () => {
    const result = parseCode("return (");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.finding.kind).toBe("code-error");
    expect(result.finding.message.startsWith("Syntax error:")).toBe(true);
    expect(result.finding.line).toBe(1);
  });
});

describe("analyzeCode", () => {
  it("leaves plain code unchanged", () => {
    expect(analyzeCode("return inputs.a + 1;", allowed)).toEqual({
      ok: true,
      code: "return inputs.a + 1;",
      imports: [],
    });
  });

  it("rewrites allowed imports to sandbox requires", () => {
    const result = analyzeCode('import path from "node:path";\nimport { join } from "path";', allowed);
    expect(result).toEqual({
      ok: true,
      code: 'const path = require("node:path");\nconst { join: join } = require("path");',
      imports: ["node:path", "path"],
    });
  });

  it("rejects modules outside the allow-list", () => {
    const result = analyzeCode('const x = 1;\nimport cp from "child_process";', allowed);
    expect(result).toEqual({
      ok: false,
      finding: { kind: "forbidden-import", message: 'Module "child_process" is not allowed', line: 2, column: 0 },
    });
  });

  it("never allows host modules, even when configured", () => {
    const permissive = buildAllowList(["fs", "node:child_process", "path"]);
    expect([...permissive]).toEqual(["path"]);
  });

  it("rejects require with a computed specifier", () => {
    const result = analyzeCode('const name = "fs";\nrequire(name);', allowed);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.finding.kind).toBe("forbidden-import");
    expect(result.finding.message).toBe("require() with a non-literal module specifier is not allowed");
  });

  it("rejects dynamic import of a denied module", () => {
    const result = analyzeCode('const m = await import("os");', allowed);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.finding.message).toBe('Module "os" is not allowed');
  });

  it("rejects eval and the Function constructor", () => {
    const viaEval = analyzeCode('return eval("1 + 1");', allowed);
    const viaFunction = analyzeCode('return new Function("return 1")();', allowed);
    const viaMember = analyzeCode('return globalThis["eval"]("1");', allowed);

    expect(viaEval.ok || viaEval.finding.message).toBe("Dynamic code construction via eval is not allowed");
    expect(viaFunction.ok || viaFunction.finding.kind).toBe("forbidden-eval");
    expect(viaMember.ok || viaMember.finding.message).toBe("Dynamic code construction via .eval is not allowed");
  });

  it("rejects reserved identifiers", () => {
    const result = analyzeCode("__sandbox_checkpoint__ = null;", allowed);
    expect(result.ok || result.finding.kind).toBe("code-error");
  });

  it("rejects exports", () => {
    const result = analyzeCode("export const x = 1;", allowed);
    expect(result.ok || result.finding.message).toBe(
      "Step code cannot export bindings; return the output instead",
    );
  });

  it("reports the earliest finding first", () => {
    const result = analyzeCode('eval("1");\nimport os from "os";', allowed);
    expect(result.ok || result.finding.kind).toBe("forbidden-eval");
  });

  it("instruments loops and function bodies", () => {
    expect(analyzeCode("for (;;) break;", allowed)).toMatchObject({
      code: "for (;;) {__sandbox_checkpoint__();break;}",
    });
    expect(analyzeCode("while (x) { x--; }", allowed)).toMatchObject({
      code: "while (x) {__sandbox_checkpoint__(); x--; }",
    });
    expect(analyzeCode("function f() { return 1; }", allowed)).toMatchObject({
      code: "function f() {__sandbox_checkpoint__(); return 1; }",
    });
    expect(analyzeCode("const f = (x) => x + 1;", allowed)).toMatchObject({
      code: "const f = (x) => (__sandbox_checkpoint__(), x + 1);",
    });
  });
});

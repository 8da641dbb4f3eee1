import { describe, it, expect } from "vitest";
import { ToolRegistry } from "../src/registry/ToolRegistry.js";
import { EventLog } from "../src/observability/EventLog.js";
import type { ToolDefinition, ToolSource } from "../src/types/ToolDescriptor.js";
import { addTool, definition, echoTool, sleep, staticSource } from "./fixtures/index.js";

/**
 * Source that counts fetches and can be switched offline.
 */
class CountingSource implements ToolSource {
  listCalls = 0;
  getCalls = 0;
  offline = false;
  getTool?: (name: string) => Promise<ToolDefinition | undefined>;

  constructor(
    readonly id: string,
    public tools: ToolDefinition[],
    options: { perTool?: boolean; delayMs?: number } = {},
  ) {
    const delayMs = options.delayMs ?? 0;
    if (options.perTool) {
      this.getTool = async (name: string) => {
        this.getCalls++;
        await sleep(delayMs);
        if (this.offline) throw new Error("connection refused");
        return this.tools.find((t) => t.name === name);
      };
    }
    this.listDelayMs = delayMs;
  }

  private readonly listDelayMs: number;

  async listTools(): Promise<ToolDefinition[]> {
    this.listCalls++;
    await sleep(this.listDelayMs);
    if (this.offline) throw new Error("connection refused");
    return this.tools;
  }

  async invoke(): Promise<{ result: unknown }> {
    return { result: {} };
  }
}

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("ToolRegistry", () => {
  describe("resolve", () => {
    it("discovers sources lazily and stamps descriptors", async () => {
      const time = clock();
      const registry = new ToolRegistry({ sources: [staticSource("local", [addTool])], now: time.now });
      expect(registry.size).toBe(0);

      const resolution = await registry.resolve("math.add");
      expect(resolution.ok).toBe(true);
      if (!resolution.ok) return;
      expect(resolution.stale).toBe(false);
      expect(resolution.descriptor.name).toBe("math.add");
      expect(resolution.descriptor.source).toBe("local");
      expect(resolution.descriptor.cachedAt).toBe(1_000);
      expect(Object.isFrozen(resolution.descriptor)).toBe(true);
      expect(Object.isFrozen(resolution.descriptor.inputSchema)).toBe(true);
    });

    it("reports tool-not-found for unknown names", async () => {
      const registry = new ToolRegistry({ sources: [staticSource("local", [addTool])] });
      const resolution = await registry.resolve("no_such_tool");
      expect(resolution.ok).toBe(false);
      if (resolution.ok) return;
      expect(resolution.error.kind).toBe("tool-not-found");
      expect(resolution.error.message).toBe("Tool not found: no_such_tool");
    });

    it("reports source-unreachable when an unknown name may live in a failing source", async () => {
      const down = new CountingSource("remote", [definition("remote.tool")]);
      down.offline = true;
      const registry = new ToolRegistry({ sources: [down] });

      const resolution = await registry.resolve("remote.tool");
      expect(resolution.ok).toBe(false);
      if (resolution.ok) return;
      expect(resolution.error.kind).toBe("source-unreachable");
    });

    it("keeps a failing source from affecting tools of other sources", async () => {
      const down = new CountingSource("remote", [definition("remote.tool")]);
      down.offline = true;
      const registry = new ToolRegistry({ sources: [down, staticSource("local", [echoTool])] });

      const resolution = await registry.resolve("util.echo");
      expect(resolution.ok).toBe(true);
    });

    it("serves fresh entries without fetching", async () => {
      const time = clock();
      const source = new CountingSource("s", [definition("a")], { perTool: true });
      const registry = new ToolRegistry({ sources: [source], ttlMs: 100, now: time.now });

      await registry.resolve("a");
      time.advance(50);
      await registry.resolve("a");
      expect(source.listCalls).toBe(1);
      expect(source.getCalls).toBe(0);
    });

    it("refetches an expired entry from its source before returning", async () => {
      const time = clock();
      const source = new CountingSource("s", [definition("a", "1.0.0")], { perTool: true });
      const registry = new ToolRegistry({ sources: [source], ttlMs: 100, now: time.now });

      const first = await registry.resolve("a");
      if (!first.ok) throw first.error;
      expect(registry.revisionOf("a")).toBe(1);
      source.tools = [definition("a", "2.0.0")];
      time.advance(100);

      const resolution = await registry.resolve("a");
      expect(source.getCalls).toBe(1);
      expect(resolution.ok && resolution.descriptor.version).toBe("2.0.0");
      expect(registry.revisionOf("a")).toBe(2);
      expect(resolution.ok && resolution.descriptor).not.toBe(first.descriptor);
      expect(first.descriptor.version).toBe("1.0.0");
      expect(first.descriptor.cachedAt).toBe(1_000);
      expect(Object.isFrozen(first.descriptor)).toBe(true);
    });

    it("keeps the revision when a fresh entry is served", async () => {
      const time = clock();
      const registry = new ToolRegistry({ sources: [staticSource("local", [addTool])], ttlMs: 100, now: time.now });
      await registry.resolve("math.add");
      time.advance(50);
      await registry.resolve("math.add");
      expect(registry.revisionOf("math.add")).toBe(1);
      expect(registry.revisionOf("no_such_tool")).toBeUndefined();
    });

    it("coalesces concurrent refetches of an expired entry into one fetch", async () => {
      const time = clock();
      const source = new CountingSource("s", [definition("a")], { perTool: true, delayMs: 10 });
      const registry = new ToolRegistry({ sources: [source], ttlMs: 100, now: time.now });
      await registry.resolve("a");
      time.advance(500);

      const results = await Promise.all(Array.from({ length: 8 }, () => registry.resolve("a")));
      expect(results.every((r) => r.ok)).toBe(true);
      expect(source.getCalls).toBe(1);
    });

    it("coalesces concurrent re-listing for sources without per-tool lookup", async () => {
      const time = clock();
      const source = new CountingSource("s", [definition("a")], { delayMs: 10 });
      const registry = new ToolRegistry({ sources: [source], ttlMs: 100, now: time.now });
      await registry.resolve("a");
      time.advance(500);

      await Promise.all(Array.from({ length: 5 }, () => registry.resolve("a")));
      expect(source.listCalls).toBe(2);
    });

    it("returns the stale entry when the owning source is unreachable", async () => {
      const time = clock();
      const source = new CountingSource("s", [definition("a")], { perTool: true });
      const registry = new ToolRegistry({ sources: [source], ttlMs: 100, now: time.now });
      const first = await registry.resolve("a");
      source.offline = true;
      time.advance(200);

      const second = await registry.resolve("a");
      expect(second.ok).toBe(true);
      if (!second.ok || !first.ok) return;
      expect(second.stale).toBe(true);
      expect(second.descriptor).toBe(first.descriptor);
    });

    it("gives a name to the earlier source when two sources offer it", async () => {
      const registry = new ToolRegistry({
        sources: [
          new CountingSource("first", [definition("dup", "1.0.0")]),
          new CountingSource("second", [definition("dup", "9.0.0")]),
        ],
      });
      await registry.ensureLoaded();

      expect(registry.peek("dup")?.source).toBe("first");
      expect(registry.list().map((d) => d.name)).toEqual(["dup"]);
    });
  });

  describe("refresh", () => {
    it("reports added, updated and removed tools and emits TOOLS_REFRESHED", async () => {
      const eventLog = new EventLog();
      const source = new CountingSource("s", [definition("a"), definition("b")]);
      const registry = new ToolRegistry({ sources: [source], eventLog });

      const [initial] = await registry.refresh();
      expect(initial?.added).toEqual(["a", "b"]);

      source.tools = [definition("a", "1.1.0"), definition("c")];
      const [report] = await registry.refresh("s");
      expect(report).toEqual({ sourceId: "s", added: ["c"], removed: ["b"], updated: ["a"] });
      expect(registry.list().map((d) => d.name)).toEqual(["a", "c"]);

      const events = eventLog.query({ type: "TOOLS_REFRESHED" });
      expect(events).toHaveLength(2);
    });

    it("reports an error for an unknown source id", async () => {
      const registry = new ToolRegistry();
      const [report] = await registry.refresh("missing");
      expect(report?.error).toBe("Unknown tool source: missing");
    });

    it("reports a source failure without throwing", async () => {
      const source = new CountingSource("s", [definition("a")]);
      source.offline = true;
      const registry = new ToolRegistry({ sources: [source] });
      const [report] = await registry.refresh();
      expect(report?.error).toBe("connection refused");
    });
  });

  describe("listing and search", () => {
    async function loaded() {
      const registry = new ToolRegistry({
        sources: [staticSource("local", [addTool, echoTool]), new CountingSource("remote", [definition("remote.fetch")])],
      });
      await registry.ensureLoaded();
      return registry;
    }

    it("lists tools by source", async () => {
      const registry = await loaded();
      expect(registry.list().map((t) => t.name)).toEqual(["math.add", "remote.fetch", "util.echo"]);
      expect(registry.list({ source: "local" }).map((t) => t.name)).toEqual(["math.add", "util.echo"]);
      expect(registry.list({ source: "remote" }).map((t) => t.name)).toEqual(["remote.fetch"]);
      expect(registry.list({ source: "nowhere" })).toEqual([]);
    });

    it("searches names, descriptions and tags case-insensitively", async () => {
      const registry = await loaded();
      expect(registry.search("ECHO").map((t) => t.name)).toEqual(["util.echo"]);
      expect(registry.search("two numbers").map((t) => t.name)).toEqual(["math.add"]);
      expect(registry.search({ tags: ["math"] }).map((t) => t.name)).toEqual(["math.add"]);
      expect(registry.search({ text: "e", source: "remote" }).map((t) => t.name)).toEqual(["remote.fetch"]);
      expect(registry.search("xyznonexistent")).toEqual([]);
    });
  });

  describe("sources", () => {
    it("rejects a duplicate source id", () => {
      const registry = new ToolRegistry({ sources: [staticSource("local", [])] });
      expect(() => registry.addSource(staticSource("local", []))).toThrow(
        "Tool source already registered: local",
      );
    });

    it("drops a removed source's tools", async () => {
      const registry = new ToolRegistry({ sources: [staticSource("local", [addTool, echoTool])] });
      await registry.ensureLoaded();
      expect(registry.size).toBe(2);

      expect(registry.removeSource("local")).toBe(true);
      expect(registry.size).toBe(0);
      expect(registry.getSources()).toEqual([]);
    });

    it("peek never fetches", () => {
      const source = new CountingSource("s", [definition("a")]);
      const registry = new ToolRegistry({ sources: [source] });
      expect(registry.peek("a")).toBeUndefined();
      expect(source.listCalls).toBe(0);
    });
  });
});

import type { ToolDefinition, ToolDescriptor, ToolSource } from "../types/ToolDescriptor.js";
import type { ToolsRefreshedEvent } from "../types/Events.js";
import type { EventLog } from "../observability/EventLog.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import { deepFreeze } from "../util/deepFreeze.js";
import { RegistryError } from "./errors.js";

export interface ToolRegistryOptions {
  sources?: ToolSource[];
  /** Lifetime of a cached descriptor in ms (default: 60000) */
  ttlMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
  logger?: Logger;
  eventLog?: EventLog;
}

/**
 * Search query for cached tools.
 */
export interface ToolSearchQuery {
  /** Text search in name/description/tags */
  text?: string;
  source?: string;
  tags?: string[];
}

export type ToolResolution =
  | { ok: true; descriptor: ToolDescriptor; stale: boolean }
  | { ok: false; error: RegistryError };

/**
 * Outcome of (re)loading one source.
 */
export interface RefreshReport {
  sourceId: string;
  added: string[];
  removed: string[];
  updated: string[];
  error?: string;
}

interface CacheEntry {
  descriptor: ToolDescriptor;
  sourceId: string;
  fetchedAt: number;
  /** Bumped every time the descriptor is replaced */
  revision: number;
}

interface SourceState {
  source: ToolSource;
  order: number;
  loadedAt?: number;
  /** Tool names currently owned by this source */
  names: Set<string>;
}

const DEFAULT_TTL_MS = 60_000;

/**
 * Tool Registry: discovers descriptors from pluggable sources and keeps them
 * in a TTL cache. Expired entries are refetched on resolve; concurrent
 * refetches of the same key share one in-flight request.
 */
export class ToolRegistry {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly sources = new Map<string, SourceState>();
  private readonly toolFlights = new Map<string, Promise<CacheEntry | undefined>>();
  private readonly sourceFlights = new Map<string, Promise<RefreshReport>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly eventLog?: EventLog;
  private nextOrder = 0;

  constructor(options: ToolRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ prefix: "ToolRegistry" });
    this.eventLog = options.eventLog;
    for (const source of options.sources ?? []) {
      this.addSource(source);
    }
  }

  /**
   * Add a tool source. Its tools are discovered lazily.
   */
  addSource(source: ToolSource): void {
    if (this.sources.has(source.id)) {
      throw new Error(`Tool source already registered: ${source.id}`);
    }
    this.sources.set(source.id, { source, order: this.nextOrder++, names: new Set() });
  }

  /**
   * Remove a tool source and every tool it owns.
   */
  removeSource(id: string): boolean {
    const state = this.sources.get(id);
    if (!state) return false;
    for (const name of state.names) {
      this.cache.delete(name);
    }
    this.sources.delete(id);
    return true;
  }

  /**
   * Get a registered source by id.
   */
  getSource(id: string): ToolSource | undefined {
    return this.sources.get(id)?.source;
  }

  /**
   * Registered source ids, in registration order.
   */
  getSources(): string[] {
    return [...this.sources.keys()];
  }

  /**
   * Resolve a tool name to a descriptor, refetching an expired entry first.
   * An unreachable source yields the stale entry rather than nothing.
   */
  async resolve(name: string): Promise<ToolResolution> {
    const entry = this.cache.get(name);
    if (entry) {
      if (!this.isExpired(entry.fetchedAt)) {
        return { ok: true, descriptor: entry.descriptor, stale: false };
      }
      return this.revalidate(name, entry);
    }

    const reports = await this.loadSources((state) =>
      state.loadedAt === undefined || this.isExpired(state.loadedAt),
    );
    const found = this.cache.get(name);
    if (found) {
      return { ok: true, descriptor: found.descriptor, stale: false };
    }

    const failed = reports.filter((r) => r.error !== undefined);
    if (failed.length > 0) {
      return {
        ok: false,
        error: new RegistryError(
          "source-unreachable",
          `Tool ${name} is unknown and ${failed.length} source(s) could not be reached`,
          { sources: failed.map((r) => ({ id: r.sourceId, error: r.error })) },
        ),
      };
    }
    return { ok: false, error: this.notFound(name) };
  }

  /**
   * Read the cache without fetching. Expired entries are still returned.
   */
  peek(name: string): ToolDescriptor | undefined {
    return this.cache.get(name)?.descriptor;
  }

  /**
   * Check if a tool is cached.
   */
  has(name: string): boolean {
    return this.cache.has(name);
  }

  /**
   * Snapshot of the cache, sorted by name, optionally only one source's tools.
   */
  list(filter: { source?: string } = {}): ToolDescriptor[] {
    return [...this.cache.values()]
      .filter((e) => filter.source === undefined || e.sourceId === filter.source)
      .map((e) => e.descriptor)
      .sort(byName);
  }

  /**
   * Search cached descriptors. A string is shorthand for `{ text }`; text
   * matches name, description or tags case-insensitively, and `tags` keeps
   * tools carrying any of them.
   */
  search(query: string | ToolSearchQuery): ToolDescriptor[] {
    const { text, source, tags } = typeof query === "string" ? { text: query } : query;
    const needle = text?.trim().toLowerCase();
    return this.list({ source }).filter((tool) => {
      if (tags && tags.length > 0 && !tags.some((tag) => tool.tags?.includes(tag))) {
        return false;
      }
      if (!needle) return true;
      return (
        tool.name.toLowerCase().includes(needle) ||
        (tool.description?.toLowerCase().includes(needle) ?? false) ||
        (tool.tags?.some((tag) => tag.toLowerCase().includes(needle)) ?? false)
      );
    });
  }

  /**
   * Get count of cached tools.
   */
  get size(): number {
    return this.cache.size;
  }

  /**
   * Revision counter of a cached entry; increases each time it is replaced.
   */
  revisionOf(name: string): number | undefined {
    return this.cache.get(name)?.revision;
  }

  /**
   * Discover every source that has never been loaded.
   */
  async ensureLoaded(): Promise<RefreshReport[]> {
    return this.loadSources((state) => state.loadedAt === undefined);
  }

  /**
   * Force re-discovery of one source, or all of them.
   */
  async refresh(sourceId?: string): Promise<RefreshReport[]> {
    if (sourceId === undefined) {
      return this.loadSources(() => true);
    }
    if (!this.sources.has(sourceId)) {
      return [
        { sourceId, added: [], removed: [], updated: [], error: `Unknown tool source: ${sourceId}` },
      ];
    }
    return this.loadSources((state) => state.source.id === sourceId);
  }

  private async revalidate(name: string, entry: CacheEntry): Promise<ToolResolution> {
    const state = this.sources.get(entry.sourceId);
    if (!state) {
      this.cache.delete(name);
      return { ok: false, error: this.notFound(name) };
    }

    const { getTool } = state.source;
    let current: CacheEntry | undefined;
    try {
      if (getTool) {
        current = await singleFlight(this.toolFlights, `tool:${name}`, async () => {
          const def = await getTool.call(state.source, name);
          if (!def) {
            this.dropOwned(state, name);
            return undefined;
          }
          this.store(def, state);
          return this.cache.get(name);
        });
      } else {
        const report = await this.loadSource(state);
        if (report.error !== undefined) {
          throw new Error(report.error);
        }
        current = this.cache.get(name);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn("Serving stale descriptor, source refetch failed", {
        tool: name,
        source: state.source.id,
        error: message,
      });
      return { ok: true, descriptor: entry.descriptor, stale: true };
    }

    if (!current) {
      return { ok: false, error: this.notFound(name) };
    }
    return { ok: true, descriptor: current.descriptor, stale: false };
  }

  private async loadSources(select: (state: SourceState) => boolean): Promise<RefreshReport[]> {
    const selected = [...this.sources.values()].filter(select);
    // loadSource never rejects; each source is isolated from the others.
    return Promise.all(selected.map((state) => this.loadSource(state)));
  }

  private loadSource(state: SourceState): Promise<RefreshReport> {
    return singleFlight(this.sourceFlights, `source:${state.source.id}`, async () => {
      const sourceId = state.source.id;
      let definitions: ToolDefinition[];
      try {
        definitions = await state.source.listTools();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn("Tool source unreachable", { source: sourceId, error: message });
        return this.emitRefreshed({ sourceId, added: [], removed: [], updated: [], error: message });
      }

      const report: RefreshReport = { sourceId, added: [], removed: [], updated: [] };
      const seen = new Set<string>();
      for (const def of definitions) {
        if (!isValidDefinition(def)) {
          this.logger.warn("Skipping invalid tool definition", { source: sourceId, tool: def.name });
          continue;
        }
        seen.add(def.name);
        const previous = this.cache.get(def.name);
        if (!this.store(def, state)) continue;
        if (!previous || previous.sourceId !== sourceId) {
          report.added.push(def.name);
        } else if (!sameDefinition(previous.descriptor, def)) {
          report.updated.push(def.name);
        }
      }

      for (const name of [...state.names]) {
        if (!seen.has(name)) {
          this.dropOwned(state, name);
          report.removed.push(name);
        }
      }

      state.loadedAt = this.now();
      this.logger.debug("Tool source loaded", {
        source: sourceId,
        tools: state.names.size,
        added: report.added.length,
        removed: report.removed.length,
      });
      return this.emitRefreshed(report);
    });
  }

  /**
   * Cache a definition under its source. Returns false when an earlier
   * source already owns the name.
   */
  private store(def: ToolDefinition, state: SourceState): boolean {
    const existing = this.cache.get(def.name);
    if (existing && existing.sourceId !== state.source.id) {
      const owner = this.sources.get(existing.sourceId);
      if (owner && owner.order < state.order) {
        this.logger.warn("Tool name already provided by an earlier source, ignoring", {
          tool: def.name,
          owner: owner.source.id,
          source: state.source.id,
        });
        return false;
      }
      owner?.names.delete(def.name);
    }

    const fetchedAt = this.now();
    const descriptor: ToolDescriptor = deepFreeze({
      ...structuredClone(def),
      source: state.source.id,
      cachedAt: fetchedAt,
    });
    this.cache.set(def.name, {
      descriptor,
      sourceId: state.source.id,
      fetchedAt,
      revision: (existing?.revision ?? 0) + 1,
    });
    state.names.add(def.name);
    return true;
  }

  private dropOwned(state: SourceState, name: string): void {
    state.names.delete(name);
    if (this.cache.get(name)?.sourceId === state.source.id) {
      this.cache.delete(name);
    }
  }

  private emitRefreshed(report: RefreshReport): RefreshReport {
    if (this.eventLog) {
      const event: ToolsRefreshedEvent = {
        type: "TOOLS_REFRESHED",
        timestamp: new Date(this.now()).toISOString(),
        ...report,
      };
      this.eventLog.append(event);
    }
    return report;
  }

  private isExpired(since: number): boolean {
    return this.now() - since >= this.ttlMs;
  }

  private notFound(name: string): RegistryError {
    return new RegistryError("tool-not-found", `Tool not found: ${name}`, {
      availableTools: this.list()
        .slice(0, 20)
        .map((d) => d.name),
    });
  }
}

/**
 * Share one in-flight promise per key among concurrent callers.
 */
function singleFlight<T>(
  flights: Map<string, Promise<T>>,
  key: string,
  fn: () => Promise<T>,
): Promise<T> {
  const pending = flights.get(key);
  if (pending) {
    return pending;
  }
  const promise = fn().finally(() => {
    flights.delete(key);
  });
  flights.set(key, promise);
  return promise;
}

function isValidDefinition(def: ToolDefinition): boolean {
  return (
    typeof def.name === "string" &&
    def.name.length > 0 &&
    typeof def.version === "string" &&
    def.inputSchema !== null &&
    typeof def.inputSchema === "object" &&
    def.outputSchema !== null &&
    typeof def.outputSchema === "object"
  );
}

function sameDefinition(descriptor: ToolDescriptor, def: ToolDefinition): boolean {
  return (
    descriptor.version === def.version &&
    descriptor.description === def.description &&
    JSON.stringify(descriptor.tags ?? []) === JSON.stringify(def.tags ?? []) &&
    JSON.stringify(descriptor.inputSchema) === JSON.stringify(def.inputSchema) &&
    JSON.stringify(descriptor.outputSchema) === JSON.stringify(def.outputSchema)
  );
}

function byName(a: ToolDescriptor, b: ToolDescriptor): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

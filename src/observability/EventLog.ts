import { EventEmitter } from "eventemitter3";
import type { AnyFlowEvent, FlowEventType } from "../types/Events.js";
import { createLogger, type Logger } from "./Logger.js";

/**
 * An appended event and its position in the log.
 */
export interface LogEntry {
  seq: number;
  event: AnyFlowEvent;
}

export type EventListener = (entry: LogEntry) => void;

export interface EventLogOptions {
  /** History kept in memory (default: 10000); older entries are evicted */
  maxEntries?: number;
  /** Mirrors every appended event to this logger at debug level */
  logger?: Logger;
}

export interface EventQuery {
  type?: FlowEventType;
  runId?: string;
  stepId?: string;
  /** Only entries with a greater sequence number */
  since?: number;
  /** Keep the last `limit` matches */
  limit?: number;
}

const ANY = "*";

/**
 * Append-only record of run and registry lifecycle events. Sequence numbers
 * keep increasing across evictions, so `since` stays valid for pollers.
 */
export class EventLog {
  private readonly entries: LogEntry[] = [];
  private readonly emitter = new EventEmitter<Record<string, [LogEntry]>>();
  private readonly maxEntries: number;
  private readonly logger: Logger;
  private readonly mirror: boolean;
  private seq = 0;
  private evicted = 0;

  constructor(options: EventLogOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 10_000);
    this.logger = options.logger ?? createLogger({ prefix: "EventLog" });
    this.mirror = options.logger !== undefined;
  }

  append(event: AnyFlowEvent): LogEntry {
    this.seq += 1;
    const entry: LogEntry = { seq: this.seq, event };
    this.entries.push(entry);
    while (this.entries.length > this.maxEntries) {
      this.entries.shift();
      this.evicted += 1;
    }

    if (this.mirror) {
      this.logger.debug(event.type, { seq: entry.seq, ...event });
    }
    this.emitter.emit(ANY, entry);
    this.emitter.emit(event.type, entry);
    return entry;
  }

  /**
   * Subscribe to every event. Returns the unsubscribe function. A listener
   * that throws is logged and does not affect the appender or other
   * listeners.
   */
  on(listener: EventListener): () => void {
    return this.subscribe(ANY, listener);
  }

  onType(type: FlowEventType, listener: EventListener): () => void {
    return this.subscribe(type, listener);
  }

  query(filter: EventQuery = {}): LogEntry[] {
    const { since, type, runId, stepId, limit } = filter;
    const matches = this.entries.filter(
      ({ seq, event }) =>
        (since === undefined || seq > since) &&
        (type === undefined || event.type === type) &&
        (runId === undefined || event.runId === runId) &&
        (stepId === undefined || ("stepId" in event && event.stepId === stepId)),
    );
    return limit !== undefined && limit > 0 ? matches.slice(-limit) : matches;
  }

  getAll(): readonly LogEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Entries evicted since the log was created or cleared. */
  get dropped(): number {
    return this.evicted;
  }

  clear(): void {
    this.entries.length = 0;
    this.seq = 0;
    this.evicted = 0;
  }

  private subscribe(channel: string, listener: EventListener): () => void {
    const guarded: EventListener = (entry) => {
      try {
        listener(entry);
      } catch (error) {
        this.logger.warn("Event listener threw", {
          type: entry.event.type,
          seq: entry.seq,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };
    this.emitter.on(channel, guarded);
    return () => {
      this.emitter.off(channel, guarded);
    };
  }
}

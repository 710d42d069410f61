/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded history in memory
 */

import { ulid } from "ulid";
import type { TreeLogger } from "./logger";
import type { TreeChange } from "./tree/types";

export interface DirectoryChange {
  /** null when the previous directory was removed out from under the store */
  from: string | null;
  to: string;
}

export type EventInit =
  | { type: "TreeChangeEvent"; payload: TreeChange; meta?: Record<string, unknown> }
  | { type: "DirectoryChangeEvent"; payload: DirectoryChange; meta?: Record<string, unknown> };

export type EventType = EventInit["type"];

export type TreeEvent = EventInit & {
  id: string;
  timestamp: number;
};

type Listener = (evt: TreeEvent) => void;

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory; the oldest go first
  logger?: TreeLogger; // Where listener errors go
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  public history: TreeEvent[] = [];
  private config: Required<Omit<EventBusConfig, "logger">>;
  private logger?: TreeLogger;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 10000,
    };
    this.logger = config.logger;
  }

  on(type: EventType | "any", listener: Listener): void {
    let bucket = this.listeners.get(type);
    if (!bucket) {
      bucket = new Set();
      this.listeners.set(type, bucket);
    }
    bucket.add(listener);
  }

  off(type: EventType | "any", listener: Listener): void {
    this.listeners.get(type)?.delete(listener);
  }

  emit(init: EventInit): TreeEvent {
    const envelope: TreeEvent = {
      ...init,
      id: ulid(),
      timestamp: Date.now(),
    };

    // Append to history
    this.history.push(envelope);

    // Enforce history limit
    if (this.history.length > this.config.maxHistorySize) {
      this.history.splice(0, this.history.length - this.config.maxHistorySize);
    }

    this.notify(this.listeners.get(envelope.type), envelope);
    this.notify(this.listeners.get("any"), envelope);

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): TreeEvent[] {
    let filtered = this.history;

    const since = options?.since;
    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (options?.type) {
      filtered = filtered.filter((e) => e.type === options.type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }

  clearHistory(): void {
    this.history = [];
  }

  private notify(bucket: Set<Listener> | undefined, envelope: TreeEvent): void {
    if (!bucket) return;
    for (const listener of bucket) {
      try {
        listener(envelope);
      } catch (e) {
        // a failing listener never breaks the tree operation that emitted
        if (this.logger) {
          this.logger.error(e instanceof Error ? e : String(e), { event: envelope.type });
        } else {
          console.error(`[EventBus] Listener error for ${envelope.type}:`, e);
        }
      }
    }
  }
}

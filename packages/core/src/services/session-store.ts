/**
 * Session storage for PRD Chat
 *
 * The store keeps plain session records keyed by an opaque id. Documents are
 * not stored; they are rebuilt from the record's log on load.
 */

import type { SessionRecord } from "../types/index.ts";

/**
 * Get/set/clear collaborator for session records
 */
export interface SessionStore {
  get(id: string): Promise<SessionRecord | undefined>;
  set(id: string, record: SessionRecord): Promise<void>;
  /**
   * @returns true when a record was removed
   */
  delete(id: string): Promise<boolean>;
  /**
   * Ids of all live sessions
   */
  list(): Promise<string[]>;
}

/**
 * Options for InMemorySessionStore
 */
export interface InMemorySessionStoreOptions {
  /**
   * Minutes of inactivity before a record expires
   * @default 60
   */
  ttlMinutes?: number;

  /**
   * Clock used for expiry
   * @default Date.now
   */
  now?: () => number;
}

interface StoredEntry {
  record: SessionRecord;
  touchedAt: number;
}

/**
 * Map based SessionStore with idle expiry
 *
 * @remarks
 * Records are copied in and out, so callers never share state with the store.
 * Reading a record counts as activity.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly now: () => number;
  private ttlMs: number;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.ttlMs = minutesToMs(options.ttlMinutes ?? 60);
  }

  async get(id: string): Promise<SessionRecord | undefined> {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(id);
      return undefined;
    }
    entry.touchedAt = this.now();
    return structuredClone(entry.record);
  }

  async set(id: string, record: SessionRecord): Promise<void> {
    this.entries.set(id, { record: structuredClone(record), touchedAt: this.now() });
  }

  async delete(id: string): Promise<boolean> {
    return this.entries.delete(id);
  }

  async list(): Promise<string[]> {
    this.sweep();
    return [...this.entries.keys()];
  }

  /**
   * Removes expired records
   *
   * @returns Number of records removed
   */
  sweep(): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  setTtlMinutes(minutes: number): void {
    this.ttlMs = minutesToMs(minutes);
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: StoredEntry): boolean {
    return this.now() - entry.touchedAt >= this.ttlMs;
  }
}

function minutesToMs(minutes: number): number {
  return minutes * 60 * 1000;
}

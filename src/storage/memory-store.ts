/**
 * In-memory storage implementation.
 *
 * Records are deep-copied on the way in and out, so callers never hold a
 * reference into the store's own state.
 */

import { RunEvent, RunEventType } from '../domain/events';
import { Run } from '../domain/run';
import { Store, RunStore, EventStore, ListOptions } from './store';

/** Without a limit, every item from the offset on is returned. */
function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit;
  return limit === undefined ? items.slice(offset) : items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, Run>();

  async create(run: Run): Promise<Run> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<Run | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<Run>): Promise<Run | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: Run = { ...existing, ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }
}

class MemoryEventStore implements EventStore {
  private data: RunEvent[] = [];

  async create(event: RunEvent): Promise<RunEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByRun(runId: string, options?: ListOptions & { eventTypes?: RunEventType[] }): Promise<RunEvent[]> {
    const types = options?.eventTypes;
    const items = this.data.filter(
      (e) => e.runId === runId && (!types?.length || types.includes(e.type)),
    );
    return applyListOptions(items, options).map(deepCopy);
  }
}

/** Create an in-memory store. */
export function createMemoryStore(): Store {
  return {
    runs: new MemoryRunStore(),
    events: new MemoryEventStore(),
  };
}

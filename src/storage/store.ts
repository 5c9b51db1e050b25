/**
 * Storage layer interfaces.
 *
 * Defines the contract for run and event persistence with pluggable
 * backends. The CLI keeps one process-lifetime in-memory store; an
 * embedding program can supply its own.
 */

import { RunEvent, RunEventType } from '../domain/events';
import { Run } from '../domain/run';

/** Paging for list queries; no limit means no cap. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for runs. */
export interface RunStore {
  create(run: Run): Promise<Run>;
  getById(id: string): Promise<Run | null>;
  update(id: string, run: Partial<Run>): Promise<Run | null>;
}

/** Store interface for run events. */
export interface EventStore {
  create(event: RunEvent): Promise<RunEvent>;
  listByRun(runId: string, options?: ListOptions & { eventTypes?: RunEventType[] }): Promise<RunEvent[]>;
}

/** The aggregate store interface. */
export interface Store {
  runs: RunStore;
  events: EventStore;
}

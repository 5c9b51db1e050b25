/**
 * Run-time event domain model.
 *
 * Events are emitted as stable, versioned records for downstream consumers
 * such as tests or an embedding program.
 */

/** Event types emitted during a run. */
export type RunEventType =
  | 'run.created'
  | 'run.started'
  | 'run.succeeded'
  | 'run.failed'
  | 'run.canceled'
  | 'run.skipped'
  | 'step.started'
  | 'step.succeeded'
  | 'step.failed'
  | 'step.canceled'
  | 'step.skipped';

/** A run event with stable schema. */
export interface RunEvent {
  id: string;
  type: RunEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  stepId?: string;
  pipelineName: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Restrict delivery to one run. */
  runId?: string;
  /** Filter by event types. */
  eventTypes?: RunEventType[];
  callback: (event: RunEvent) => void;
}

/**
 * Run event publisher.
 *
 * Persists run and step lifecycle events and delivers them to in-process
 * subscribers registered with subscribe().
 */

import { v4 as uuid } from 'uuid';
import { Run } from '../domain/run';
import { RunEvent, RunEventType, EventSubscription } from '../domain/events';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';

export const EVENT_SCHEMA_VERSION = '1.0.0';

export class RunEventPublisher {
  private subscriptions: EventSubscription[] = [];
  private logger: Logger;

  constructor(private store: Store, logger: Logger = rootLogger) {
    this.logger = logger.child({ module: 'publisher' });
  }

  /** Publish a run lifecycle event. */
  async publishRunEvent(run: Run, eventType: RunEventType): Promise<RunEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      pipelineName: run.pipelineName,
      payload: {
        status: run.status,
        trigger: run.trigger,
        skipReason: run.skipReason,
        error: run.error,
      },
    });
  }

  /** Publish a step lifecycle event. */
  async publishStepEvent(run: Run, stepId: string, eventType: RunEventType): Promise<RunEvent> {
    const stepResult = run.stepResults[stepId];

    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      stepId,
      pipelineName: run.pipelineName,
      payload: {
        stepStatus: stepResult?.status,
        attempts: stepResult?.attempts,
        durationMs: stepResult?.durationMs,
        skipReason: stepResult?.skipReason,
        error: stepResult?.error,
      },
    });
  }

  /** Persist an event, then deliver it to matching subscribers. */
  async publishEvent(event: RunEvent): Promise<RunEvent> {
    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        this.logger.warn('Event subscriber threw', {
          subscriptionId: sub.id,
          eventType: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query events by run. */
  async getEventsByRun(runId: string, eventTypes?: RunEventType[]): Promise<RunEvent[]> {
    return this.store.events.listByRun(runId, { eventTypes });
  }

  private matchesSubscription(event: RunEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}

/**
 * Run event publisher: persistence, delivery, filtering and subscriber
 * isolation.
 */

import { createMemoryStore } from '../../src/storage/memory-store';
import { RunEventPublisher } from '../../src/data-plane/publisher';
import { pushTrigger } from '../../src/domain/pipeline';
import { RunStatus, StepRunStatus } from '../../src/domain/run';
import type { Run } from '../../src/domain/run';
import type { RunEvent } from '../../src/domain/events';
import { createRecordingLogger } from '../helpers/context';

function createMockRun(overrides?: Partial<Run>): Run {
  return {
    id: 'run_1',
    pipelineName: 'Docs',
    planHash: 'deadbeef',
    trigger: pushTrigger('main'),
    status: RunStatus.Running,
    createdAt: '2026-01-01T00:00:00Z',
    updatedAt: '2026-01-01T00:00:00Z',
    stepOrder: ['build'],
    stepResults: { build: { stepId: 'build', status: StepRunStatus.Running, attempts: 1 } },
    dryRun: false,
    ...overrides,
  };
}

describe('RunEventPublisher', () => {
  it('persists run events with the run status and trigger', async () => {
    const store = createMemoryStore();
    const publisher = new RunEventPublisher(store);

    const event = await publisher.publishRunEvent(createMockRun(), 'run.started');

    expect(event.type).toBe('run.started');
    expect(event.schemaVersion).toBe('1.0.0');
    expect(event.pipelineName).toBe('Docs');
    expect(event.payload).toEqual({
      status: 'running',
      trigger: { event: 'push', branch: 'main', ref: 'refs/heads/main' },
      skipReason: undefined,
      error: undefined,
    });
    const stored = await store.events.listByRun('run_1');
    expect(stored.map((e) => e.id)).toEqual([event.id]);
  });

  it('step events carry the step result', async () => {
    const publisher = new RunEventPublisher(createMemoryStore());

    const event = await publisher.publishStepEvent(createMockRun(), 'build', 'step.started');

    expect(event.stepId).toBe('build');
    expect(event.payload.stepStatus).toBe('running');
    expect(event.payload.attempts).toBe(1);
  });

  it('delivers events to matching subscribers only', async () => {
    const publisher = new RunEventPublisher(createMemoryStore());
    const all: RunEvent[] = [];
    const failures: RunEvent[] = [];
    const otherRun: RunEvent[] = [];

    publisher.subscribe({ id: 'all', callback: (e) => all.push(e) });
    publisher.subscribe({ id: 'failures', eventTypes: ['run.failed'], callback: (e) => failures.push(e) });
    publisher.subscribe({ id: 'other', runId: 'run_2', callback: (e) => otherRun.push(e) });

    await publisher.publishRunEvent(createMockRun(), 'run.started');
    await publisher.publishRunEvent(createMockRun({ status: RunStatus.Failed }), 'run.failed');

    expect(all.map((e) => e.type)).toEqual(['run.started', 'run.failed']);
    expect(failures.map((e) => e.type)).toEqual(['run.failed']);
    expect(otherRun).toEqual([]);
  });

  it('a throwing subscriber is logged and does not stop delivery', async () => {
    const { logger, entries } = createRecordingLogger();
    const publisher = new RunEventPublisher(createMemoryStore(), logger);
    const received: string[] = [];

    publisher.subscribe({
      id: 'broken',
      callback: () => {
        throw new Error('printer closed');
      },
    });
    publisher.subscribe({ id: 'ok', callback: (e) => received.push(e.type) });

    await expect(publisher.publishRunEvent(createMockRun(), 'run.started')).resolves.toBeDefined();
    expect(received).toEqual(['run.started']);
    expect(entries).toEqual([
      {
        level: 'warn',
        message: 'Event subscriber threw',
        context: { module: 'publisher', subscriptionId: 'broken', eventType: 'run.started', error: 'printer closed' },
      },
    ]);
  });

  it('unsubscribe stops delivery', async () => {
    const publisher = new RunEventPublisher(createMemoryStore());
    const received: string[] = [];
    const unsubscribe = publisher.subscribe({ id: 'once', callback: (e) => received.push(e.type) });

    await publisher.publishRunEvent(createMockRun(), 'run.started');
    unsubscribe();
    await publisher.publishRunEvent(createMockRun(), 'run.succeeded');

    expect(received).toEqual(['run.started']);
  });

  it('filters stored events by type', async () => {
    const publisher = new RunEventPublisher(createMemoryStore());
    await publisher.publishRunEvent(createMockRun(), 'run.started');
    await publisher.publishStepEvent(createMockRun(), 'build', 'step.started');

    const steps = await publisher.getEventsByRun('run_1', ['step.started']);
    expect(steps.map((e) => e.type)).toEqual(['step.started']);
  });
});

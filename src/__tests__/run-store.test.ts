import { describe, it, expect } from '@jest/globals';
import { PipelineEventBus } from '../pipeline/events.js';
import { RunStore } from '../pipeline/run-store.js';
import { makeRun, makeTrigger } from './test-helpers.js';

describe('RunStore', () => {
  it('lists runs newest first with paging', () => {
    const store = new RunStore();
    for (const id of ['r1', 'r2', 'r3']) store.put(makeRun({ run_id: id }));

    expect(store.list().map((r) => r.run_id)).toEqual(['r3', 'r2', 'r1']);
    expect(store.list(1, 1).map((r) => r.run_id)).toEqual(['r2']);
  });

  it('replaces a run in place of its earlier snapshot', () => {
    const store = new RunStore();
    store.put(makeRun({ run_id: 'r1', status: 'pending' }));
    store.put(makeRun({ run_id: 'r2' }));
    store.put(makeRun({ run_id: 'r1', status: 'failed' }));

    expect(store.get('r1')?.status).toBe('failed');
    expect(store.list().map((r) => r.run_id)).toEqual(['r1', 'r2']);
  });

  it('drops the oldest run past capacity', () => {
    const store = new RunStore(2);
    for (const id of ['r1', 'r2', 'r3']) store.put(makeRun({ run_id: id }));
    expect(store.get('r1')).toBeUndefined();
    expect(store.list().map((r) => r.run_id)).toEqual(['r3', 'r2']);
  });

  it('finds downstream runs by their upstream run id', () => {
    const store = new RunStore();
    store.put(makeRun({ run_id: 'ci-1' }));
    store.put(
      makeRun({
        run_id: 'cd-1',
        pipeline_id: 'cd',
        trigger: makeTrigger({ event: 'pipeline', upstream: { run_id: 'ci-1', pipeline_id: 'ci' } }),
      }),
    );
    expect(store.downstreamOf('ci-1').map((r) => r.run_id)).toEqual(['cd-1']);
    expect(store.downstreamOf('cd-1')).toEqual([]);
  });

  it('records runs from bus events', async () => {
    const store = new RunStore();
    const bus = new PipelineEventBus();
    store.attach(bus);

    bus.publish('run.started', { run: makeRun({ run_id: 'r1', status: 'pending' }) });
    await bus.drain();
    expect(store.get('r1')?.status).toBe('pending');

    const done = makeRun({ run_id: 'r1', status: 'success' });
    bus.publish('run.completed', { run: done, ref_name: 'main', commit_id: 'abc123', status: 'success' });
    await bus.drain();
    expect(store.get('r1')).toBe(done);
  });
});

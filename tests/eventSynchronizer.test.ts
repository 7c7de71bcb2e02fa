import { EventSynchronizer, StateStore, SyncReport, SyncState, TransitionEngine } from '../src/core';
import VirtualCompositor from '../src/platform/common/virtualCompositor';

function createLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function nextSync(synchronizer: EventSynchronizer): Promise<SyncReport> {
  return new Promise((resolve) => synchronizer.once('synced', resolve));
}

describe('EventSynchronizer', () => {
  let compositor: VirtualCompositor;
  let store: StateStore;
  let engine: TransitionEngine;
  let logger: ReturnType<typeof createLogger>;
  let synchronizer: EventSynchronizer;

  beforeEach(() => {
    compositor = new VirtualCompositor();
    store = new StateStore();
    logger = createLogger();
    engine = new TransitionEngine(store, compositor, compositor, { logger, callTimeoutMs: 0 });
    synchronizer = new EventSynchronizer(engine, logger);
  });

  it('moves sticky windows to each activated workspace', async () => {
    compositor.registerWindow(5);
    compositor.registerWindow(9);
    await engine.add(5);
    await engine.add(9);
    compositor.unregisterWindow(9);

    const running = synchronizer.run(compositor.subscribe());
    const synced = nextSync(synchronizer);
    compositor.activateWorkspace(3);

    await expect(synced).resolves.toEqual({ workspaceId: 3, pruned: [9], moved: [5], failed: [] });
    expect(compositor.getMoves()).toEqual([{ windowId: 5, destination: { kind: 'id', id: 3 } }]);
    expect(await store.snapshot()).toEqual({ sticky: [5], staged: [] });

    synchronizer.stop();
    await expect(running).resolves.toBeUndefined();
  });

  it('ignores events other than workspace activations', async () => {
    compositor.registerWindow(1);
    await engine.add(1);

    const running = synchronizer.run(compositor.subscribe());
    const synced = nextSync(synchronizer);
    compositor.emitEvent({ type: 'unknown', raw: { WindowFocusChanged: { id: 1 } } });
    compositor.activateWorkspace(2);

    const report = await synced;
    expect(report.workspaceId).toBe(2);
    expect(compositor.getMoves()).toHaveLength(1);

    synchronizer.stop();
    await running;
  });

  it('passes through syncing and back to idle for every activation', async () => {
    const states: SyncState[] = [];
    synchronizer.on('state-changed', (state) => states.push(state));

    const running = synchronizer.run(compositor.subscribe());
    const synced = nextSync(synchronizer);
    compositor.activateWorkspace(1);
    await synced;

    expect(states).toEqual(['syncing', 'idle']);
    expect(synchronizer.getState()).toBe('idle');

    synchronizer.stop();
    await running;
  });

  it('logs a failed sync and keeps listening', async () => {
    compositor.registerWindow(1);
    await engine.add(1);

    const running = synchronizer.run(compositor.subscribe());
    compositor.failRegistryQueries(new Error('niri is gone'));
    compositor.activateWorkspace(2);

    const synced = nextSync(synchronizer);
    await new Promise((resolve) => setImmediate(resolve));
    compositor.failRegistryQueries(undefined);
    compositor.activateWorkspace(3);

    await expect(synced).resolves.toMatchObject({ workspaceId: 3, moved: [1] });
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to handle workspace activation for workspace 2: Failed to query compositor windows: niri is gone'
    );
    expect(await store.snapshot()).toEqual({ sticky: [1], staged: [] });

    synchronizer.stop();
    await running;
  });

  it('stops with an error when the event feed is lost', async () => {
    const stopped = jest.fn();
    synchronizer.on('stopped', stopped);

    const running = synchronizer.run(compositor.subscribe());
    compositor.disconnect(new Error('socket closed'));

    await expect(running).rejects.toThrow('socket closed');
    expect(stopped).toHaveBeenCalledWith(expect.objectContaining({ message: 'socket closed' }));
    expect(synchronizer.isRunning()).toBe(false);
  });

  it('refuses to run twice at once', async () => {
    const running = synchronizer.run(compositor.subscribe());

    await expect(synchronizer.run(compositor.subscribe())).rejects.toThrow(
      'Event synchronizer is already running.'
    );

    synchronizer.stop();
    await running;
  });
});

import { StateStore, TransitionEngine } from '../src/core';
import { CommandDispatcher } from '../src/daemon/dispatcher';
import VirtualCompositor from '../src/platform/common/virtualCompositor';

function createLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('CommandDispatcher', () => {
  let compositor: VirtualCompositor;
  let store: StateStore;
  let logger: ReturnType<typeof createLogger>;
  let dispatcher: CommandDispatcher;

  beforeEach(() => {
    compositor = new VirtualCompositor();
    [1, 2, 3].forEach((windowId) => compositor.registerWindow(windowId));
    compositor.activateWorkspace(4);
    store = new StateStore();
    logger = createLogger();
    const engine = new TransitionEngine(store, compositor, compositor, { logger, callTimeoutMs: 0 });
    dispatcher = new CommandDispatcher(engine, logger);
  });

  it('adds, lists and removes sticky windows', async () => {
    expect(await dispatcher.execute('add 1')).toBe('Added\n');
    expect(await dispatcher.execute('add 1')).toBe('Already in sticky list\n');
    expect(await dispatcher.execute('add 3')).toBe('Added\n');
    expect(await dispatcher.execute('list')).toBe('[1, 3]\n');
    expect(await dispatcher.execute('remove 1')).toBe('Removed\n');
    expect(await dispatcher.execute('remove 1')).toBe('Not in sticky list\n');
  });

  it('toggles the focused window', async () => {
    compositor.focusWindow(2);

    expect(await dispatcher.execute('toggle_active')).toBe('Added active window to sticky\n');
    expect(await dispatcher.execute('toggle_active')).toBe('Removed active window from sticky\n');
  });

  it('stages and unstages single windows onto the active workspace', async () => {
    await dispatcher.execute('add 2');

    expect(await dispatcher.execute('stage 2')).toBe('Staged window\n');
    expect(await dispatcher.execute('stage --list')).toBe('[2]\n');
    expect(await dispatcher.execute('unstage 2')).toBe('Unstaged window\n');
    expect(compositor.getMoves()[1]).toEqual({ windowId: 2, destination: { kind: 'id', id: 4 } });
  });

  it('stages and unstages everything', async () => {
    await dispatcher.execute('add 1');
    await dispatcher.execute('add 2');
    compositor.failMovesFor(2);

    expect(await dispatcher.execute('stage --all')).toBe('Staged 1 windows\n');
    compositor.failMovesFor(2, false);
    expect(await dispatcher.execute('unstage --all')).toBe('Unstaged 1 windows\n');
    expect(await store.snapshot()).toEqual({ sticky: [1, 2], staged: [] });
  });

  it('toggles staging of the focused window with stage --active', async () => {
    await dispatcher.execute('add 3');
    compositor.focusWindow(3);

    expect(await dispatcher.execute('stage --active')).toBe('Staged active window\n');
    expect(await dispatcher.execute('stage --active')).toBe('Unstaged active window\n');
    expect(await dispatcher.execute('stage --active')).toBe('Staged active window\n');
    expect(await dispatcher.execute('unstage --active')).toBe('Unstaged active window\n');
  });

  it('renders engine failures as error lines', async () => {
    expect(await dispatcher.execute('add 999')).toBe('Error: Window not found in compositor\n');
    expect(await dispatcher.execute('stage 1')).toBe('Error: Window is not sticky, cannot stage\n');
    expect(await dispatcher.execute('unstage --active')).toBe('Error: Failed to get active window\n');
    expect(logger.warn).toHaveBeenCalledWith(
      "Request 'add 999' failed (NotFound): Window not found in compositor"
    );
  });

  it('renders malformed requests as error lines', async () => {
    expect(await dispatcher.execute('bogus')).toBe('Error: Unknown command\n');
    expect(await dispatcher.execute('add')).toBe('Error: Missing window id\n');
    expect(await dispatcher.execute('stage x')).toBe('Error: Invalid window id\n');
  });

  it('stages the focused window while no workspace is active', async () => {
    const freshCompositor = new VirtualCompositor();
    freshCompositor.registerWindow(5);
    freshCompositor.focusWindow(5);
    const engine = new TransitionEngine(new StateStore(), freshCompositor, freshCompositor, {
      logger,
      callTimeoutMs: 0
    });
    const fresh = new CommandDispatcher(engine, logger);
    await fresh.execute('add 5');

    expect(await fresh.execute('stage --active')).toBe('Staged active window\n');
    expect(await fresh.execute('stage --active')).toBe('Error: Failed to get active workspace\n');
    expect(await fresh.execute('stage --list')).toBe('[5]\n');
  });

  it('reports a missing active workspace for unstage requests', async () => {
    const freshCompositor = new VirtualCompositor();
    freshCompositor.registerWindow(1);
    const engine = new TransitionEngine(new StateStore(), freshCompositor, freshCompositor, {
      logger,
      callTimeoutMs: 0
    });
    const fresh = new CommandDispatcher(engine, logger);

    expect(await fresh.execute('unstage --all')).toBe('Error: Failed to get active workspace\n');
  });
});

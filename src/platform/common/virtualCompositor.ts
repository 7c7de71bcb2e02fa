import { CompositorEvent, WindowId, WorkspaceId, WorkspaceRef } from '../../core/types';
import { BaseCompositor, EventSubscription } from './ICompositor';

export interface MoveRecord {
  windowId: WindowId;
  destination: WorkspaceRef;
}

export interface VirtualCompositorState {
  windows: { id: WindowId; workspace?: WorkspaceRef }[];
  focusedWindowId?: WindowId;
  activeWorkspaceId?: WorkspaceId;
  moves: MoveRecord[];
}

/**
 * In-memory compositor. Windows, focus and workspaces are set up by hand and
 * failures can be injected per window or for every registry query.
 */
export class VirtualCompositor extends BaseCompositor {
  readonly name: string = 'virtual';

  private readonly windows = new Map<WindowId, WorkspaceRef | undefined>();
  private focusedWindowId?: WindowId;
  private activeWorkspaceId?: WorkspaceId;
  private readonly failingWindows = new Set<WindowId>();
  private registryFailure?: Error;
  private readonly moves: MoveRecord[] = [];
  private readonly subscriptions = new Set<VirtualEventSubscription>();

  registerWindow(windowId: WindowId, workspace?: WorkspaceRef): void {
    this.windows.set(windowId, workspace);
  }

  unregisterWindow(windowId: WindowId): void {
    this.windows.delete(windowId);
    if (this.focusedWindowId === windowId) {
      this.focusedWindowId = undefined;
    }
  }

  focusWindow(windowId: WindowId | undefined): void {
    this.focusedWindowId = windowId;
  }

  /** Makes `workspaceId` active and notifies every open subscription. */
  activateWorkspace(workspaceId: WorkspaceId): void {
    this.activeWorkspaceId = workspaceId;
    this.emitEvent({ type: 'workspace-activated', workspaceId });
  }

  failMovesFor(windowId: WindowId, failing = true): void {
    if (failing) {
      this.failingWindows.add(windowId);
    } else {
      this.failingWindows.delete(windowId);
    }
  }

  failRegistryQueries(error: Error | undefined): void {
    this.registryFailure = error;
  }

  emitEvent(event: CompositorEvent): void {
    this.subscriptions.forEach((subscription) => subscription.push(event));
  }

  /** Fails every open subscription as if the compositor connection dropped. */
  disconnect(error: Error = new Error('Virtual compositor disconnected.')): void {
    this.subscriptions.forEach((subscription) => subscription.fail(error));
    this.subscriptions.clear();
  }

  getMoves(): MoveRecord[] {
    return this.moves.map((move) => ({ ...move }));
  }

  clearMoves(): void {
    this.moves.length = 0;
  }

  getState(): VirtualCompositorState {
    return {
      windows: [...this.windows.entries()].map(([id, workspace]) => ({ id, workspace })),
      focusedWindowId: this.focusedWindowId,
      activeWorkspaceId: this.activeWorkspaceId,
      moves: this.getMoves()
    };
  }

  async queryAllWindowIds(): Promise<Set<WindowId>> {
    this.assertRegistryAvailable();
    return new Set(this.windows.keys());
  }

  async queryFocusedWindowId(): Promise<WindowId> {
    this.assertRegistryAvailable();
    if (this.focusedWindowId === undefined) {
      throw new Error('No window is focused.');
    }
    return this.focusedWindowId;
  }

  async queryActiveWorkspaceId(): Promise<WorkspaceId> {
    this.assertRegistryAvailable();
    if (this.activeWorkspaceId === undefined) {
      throw new Error('No workspace is active.');
    }
    return this.activeWorkspaceId;
  }

  async moveWindow(windowId: WindowId, destination: WorkspaceRef): Promise<void> {
    this.moves.push({ windowId, destination });
    if (!this.windows.has(windowId)) {
      throw new Error(`Unknown window '${windowId}'.`);
    }
    if (this.failingWindows.has(windowId)) {
      throw new Error(`Move rejected for window '${windowId}'.`);
    }
    this.windows.set(windowId, destination);
  }

  subscribe(): EventSubscription {
    const subscription = new VirtualEventSubscription(() => this.subscriptions.delete(subscription));
    this.subscriptions.add(subscription);
    return subscription;
  }

  private assertRegistryAvailable(): void {
    if (this.registryFailure) {
      throw this.registryFailure;
    }
  }
}

class VirtualEventSubscription implements EventSubscription {
  private readonly pending: CompositorEvent[] = [];
  private waiter?: {
    resolve: (result: IteratorResult<CompositorEvent>) => void;
    reject: (error: Error) => void;
  };
  private closed = false;
  private failure?: Error;

  constructor(private readonly onClose: () => void) {}

  push(event: CompositorEvent): void {
    if (this.closed || this.failure) {
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.resolve({ value: event, done: false });
      return;
    }
    this.pending.push(event);
  }

  fail(error: Error): void {
    if (this.closed || this.failure) {
      return;
    }
    this.failure = error;
    const waiter = this.waiter;
    if (waiter && this.pending.length === 0) {
      this.waiter = undefined;
      waiter.reject(error);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pending.length = 0;
    this.onClose();
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<CompositorEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      }
    };
  }

  private next(): Promise<IteratorResult<CompositorEvent>> {
    const event = this.pending.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }
}

export default VirtualCompositor;

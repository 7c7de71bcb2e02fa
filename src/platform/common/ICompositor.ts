import { CompositorEvent, WindowId, WorkspaceId, WorkspaceRef } from '../../core/types';

export interface WindowRegistry {
  queryAllWindowIds(): Promise<Set<WindowId>>;

  queryFocusedWindowId(): Promise<WindowId>;

  queryActiveWorkspaceId(): Promise<WorkspaceId>;
}

export interface ActionExecutor {
  moveWindow(windowId: WindowId, destination: WorkspaceRef): Promise<void>;
}

/**
 * Live compositor event feed. Not restartable: once iteration ends or fails a
 * new subscription has to be opened. `close()` ends iteration without error.
 */
export interface EventSubscription extends AsyncIterable<CompositorEvent> {
  close(): void;
}

export interface ICompositor extends WindowRegistry, ActionExecutor {
  readonly name: string;

  initialize(): Promise<void>;

  subscribe(): EventSubscription;
}

export abstract class BaseCompositor implements ICompositor {
  abstract readonly name: string;

  async initialize(): Promise<void> {
    // Nothing to prepare unless the compositor needs a connection check.
  }

  abstract queryAllWindowIds(): Promise<Set<WindowId>>;

  abstract queryFocusedWindowId(): Promise<WindowId>;

  abstract queryActiveWorkspaceId(): Promise<WorkspaceId>;

  abstract moveWindow(windowId: WindowId, destination: WorkspaceRef): Promise<void>;

  abstract subscribe(): EventSubscription;
}

import {
  ActiveWindowUnavailableError,
  InvalidStateError,
  NotFoundError,
  RegistryError,
  RemoteActionError,
  StickyError,
  describeError
} from './errors';
import { StateStore, StateTransaction } from './stateStore';
import { withTimeout } from './timeout';
import {
  DEFAULT_STAGE_WORKSPACE,
  Logger,
  Membership,
  WindowId,
  WorkspaceId,
  WorkspaceRef,
  describeWorkspace,
  workspaceById,
  workspaceByName
} from './types';
import type { ActionExecutor, WindowRegistry } from '../platform/common/ICompositor';

export const DEFAULT_CALL_TIMEOUT_MS = 5000;

export interface TransitionEngineOptions {
  /** Name of the workspace staged windows are parked on. */
  stageWorkspace?: string;
  /** Upper bound for every registry query and move command; 0 disables it. */
  callTimeoutMs?: number;
  logger?: Logger;
}

export interface SyncReport {
  workspaceId: WorkspaceId;
  pruned: WindowId[];
  moved: WindowId[];
  failed: WindowId[];
}

export type StageToggleResult = 'staged' | 'unstaged';

export class TransitionEngine {
  private readonly stageWorkspace: WorkspaceRef;
  private readonly callTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: StateStore,
    private readonly registry: WindowRegistry,
    private readonly executor: ActionExecutor,
    options: TransitionEngineOptions = {}
  ) {
    this.stageWorkspace = workspaceByName(options.stageWorkspace ?? DEFAULT_STAGE_WORKSPACE);
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.logger = options.logger ?? console;
  }

  /** Returns true when the window was not sticky before. */
  async add(windowId: WindowId): Promise<boolean> {
    await this.ensureWindowExists(windowId, 'Window');
    return this.store.transaction((tx) => {
      if (tx.membershipOf(windowId) === 'staged') {
        throw new InvalidStateError('Window is staged, unstage it first');
      }
      return tx.attach(windowId, 'sticky');
    });
  }

  /** Returns true when the window was sticky before. */
  async remove(windowId: WindowId): Promise<boolean> {
    await this.ensureWindowExists(windowId, 'Window');
    return this.store.transaction((tx) => tx.detach(windowId, 'sticky'));
  }

  /** Flips sticky membership of the focused window; true means it was added. */
  async toggleActive(): Promise<boolean> {
    const windowId = await this.resolveFocusedWindow();
    await this.ensureWindowExists(windowId, 'Active window');
    return this.store.transaction((tx) => {
      const membership = tx.membershipOf(windowId);
      if (membership === 'sticky') {
        tx.detach(windowId, 'sticky');
        return false;
      }
      if (membership === 'staged') {
        throw new InvalidStateError('Active window is staged, unstage it first');
      }
      return tx.attach(windowId, 'sticky');
    });
  }

  async stage(windowId: WindowId): Promise<void> {
    await this.ensureWindowExists(windowId, 'Window');
    await this.store.transaction((tx) => this.stageWithin(tx, windowId, 'Window'));
  }

  async unstage(windowId: WindowId, workspaceId: WorkspaceId): Promise<void> {
    await this.ensureWindowExists(windowId, 'Window');
    await this.store.transaction((tx) => this.unstageWithin(tx, windowId, workspaceId, 'Window'));
  }

  async stageActive(): Promise<void> {
    const windowId = await this.resolveFocusedWindow();
    await this.ensureWindowExists(windowId, 'Active window');
    await this.store.transaction((tx) => this.stageWithin(tx, windowId, 'Active window'));
  }

  async unstageActive(workspaceId: WorkspaceId): Promise<void> {
    const windowId = await this.resolveFocusedWindow();
    await this.ensureWindowExists(windowId, 'Active window');
    await this.store.transaction((tx) =>
      this.unstageWithin(tx, windowId, workspaceId, 'Active window')
    );
  }

  /**
   * Unstages the focused window if it is staged, stages it otherwise.
   * Membership is read once, in the transaction that acts on it, and the
   * destination workspace is only looked up when unstaging.
   */
  async toggleStageActive(
    resolveWorkspace: () => Promise<WorkspaceId> = () => this.resolveActiveWorkspace()
  ): Promise<StageToggleResult> {
    const windowId = await this.resolveFocusedWindow();
    await this.ensureWindowExists(windowId, 'Active window');
    return this.store.transaction(async (tx) => {
      if (tx.membershipOf(windowId) === 'staged') {
        const workspaceId = await resolveWorkspace();
        await this.unstageWithin(tx, windowId, workspaceId, 'Active window');
        return 'unstaged';
      }
      await this.stageWithin(tx, windowId, 'Active window');
      return 'staged';
    });
  }

  /** Best-effort: windows whose move fails stay sticky. Returns the staged count. */
  async stageAll(): Promise<number> {
    return this.store.transaction(async (tx) => {
      const candidates = tx.ids('sticky');
      if (candidates.length === 0) {
        return 0;
      }
      const live = await this.queryWindows();
      const moved = await this.moveEach(
        candidates.filter((windowId) => live.has(windowId)),
        this.stageWorkspace
      );
      return tx.transfer(moved, 'sticky', 'staged').length;
    });
  }

  /** Best-effort: windows whose move fails stay staged. Returns the unstaged count. */
  async unstageAll(workspaceId: WorkspaceId): Promise<number> {
    return this.store.transaction(async (tx) => {
      const candidates = tx.ids('staged');
      if (candidates.length === 0) {
        return 0;
      }
      const live = await this.queryWindows();
      const moved = await this.moveEach(
        candidates.filter((windowId) => live.has(windowId)),
        workspaceById(workspaceId)
      );
      return tx.transfer(moved, 'staged', 'sticky').length;
    });
  }

  /** Sticky windows that still exist; the stored set is left as is. */
  async listSticky(): Promise<WindowId[]> {
    const sticky = await this.store.transaction((tx) => tx.ids('sticky'));
    const live = await this.queryWindows();
    return sticky.filter((windowId) => live.has(windowId));
  }

  async listStaged(): Promise<WindowId[]> {
    return this.store.transaction((tx) => tx.ids('staged'));
  }

  async isStaged(windowId: WindowId): Promise<boolean> {
    return this.store.transaction((tx) => tx.membershipOf(windowId) === 'staged');
  }

  /**
   * Drops sticky windows the compositor no longer reports, then moves the rest
   * to `workspaceId`. A failed move is logged and the window stays sticky.
   */
  async syncToWorkspace(workspaceId: WorkspaceId): Promise<SyncReport> {
    return this.store.transaction(async (tx) => {
      const live = await this.queryWindows();
      const pruned = tx.pruneSticky(live);
      const sticky = tx.ids('sticky');
      const moved = await this.moveEach(sticky, workspaceById(workspaceId));
      const failed = sticky.filter((windowId) => !moved.includes(windowId));
      return { workspaceId, pruned, moved, failed };
    });
  }

  async resolveActiveWorkspace(): Promise<WorkspaceId> {
    try {
      return await this.callRegistry(() => this.registry.queryActiveWorkspaceId());
    } catch (error) {
      throw new ActiveWindowUnavailableError('Failed to get active workspace', error);
    }
  }

  private async stageWithin(tx: StateTransaction, windowId: WindowId, subject: string): Promise<void> {
    if (tx.membershipOf(windowId) !== 'sticky') {
      throw new InvalidStateError(`${subject} is not sticky, cannot stage`);
    }
    await this.relocate(tx, windowId, 'staged', this.stageWorkspace);
  }

  private async unstageWithin(
    tx: StateTransaction,
    windowId: WindowId,
    workspaceId: WorkspaceId,
    subject: string
  ): Promise<void> {
    if (tx.membershipOf(windowId) !== 'staged') {
      throw new InvalidStateError(`${subject} is not staged`);
    }
    await this.relocate(tx, windowId, 'sticky', workspaceById(workspaceId));
  }

  /**
   * Compensating move: take the window out of its current set, run the remote
   * move, then either commit it to `next` or put the captured membership back.
   */
  private async relocate(
    tx: StateTransaction,
    windowId: WindowId,
    next: Membership,
    destination: WorkspaceRef
  ): Promise<void> {
    const prior = tx.membershipOf(windowId);
    if (prior !== undefined) {
      tx.detach(windowId, prior);
    }
    try {
      await this.move(windowId, destination);
    } catch (error) {
      tx.restore(windowId, prior);
      throw error;
    }
    tx.attach(windowId, next);
  }

  private async moveEach(windowIds: readonly WindowId[], destination: WorkspaceRef): Promise<WindowId[]> {
    const moved: WindowId[] = [];
    for (const windowId of windowIds) {
      try {
        await this.move(windowId, destination);
        moved.push(windowId);
      } catch (error) {
        this.logger.error(describeError(error));
      }
    }
    return moved;
  }

  private async move(windowId: WindowId, destination: WorkspaceRef): Promise<void> {
    const target = describeWorkspace(destination);
    try {
      await withTimeout(
        this.executor.moveWindow(windowId, destination),
        this.callTimeoutMs,
        () => new Error(`timed out after ${this.callTimeoutMs}ms`)
      );
    } catch (error) {
      throw new RemoteActionError(
        `Failed to move window ${windowId} to ${target}: ${describeError(error)}`,
        error
      );
    }
  }

  private async ensureWindowExists(windowId: WindowId, subject: string): Promise<void> {
    const live = await this.queryWindows();
    if (!live.has(windowId)) {
      throw new NotFoundError(`${subject} not found in compositor`);
    }
  }

  private async resolveFocusedWindow(): Promise<WindowId> {
    try {
      return await this.callRegistry(() => this.registry.queryFocusedWindowId());
    } catch (error) {
      throw new ActiveWindowUnavailableError('Failed to get active window', error);
    }
  }

  private async queryWindows(): Promise<Set<WindowId>> {
    try {
      return await this.callRegistry(() => this.registry.queryAllWindowIds());
    } catch (error) {
      if (error instanceof StickyError) {
        throw error;
      }
      throw new RegistryError(`Failed to query compositor windows: ${describeError(error)}`, error);
    }
  }

  private callRegistry<T>(query: () => Promise<T>): Promise<T> {
    return withTimeout(
      query(),
      this.callTimeoutMs,
      () => new RegistryError(`Compositor query timed out after ${this.callTimeoutMs}ms`)
    );
  }
}

import EventEmitter from 'eventemitter3';
import { describeError } from './errors';
import { SyncReport, TransitionEngine } from './transitionEngine';
import { Logger, WorkspaceId } from './types';
import type { EventSubscription } from '../platform/common/ICompositor';

export type SyncState = 'idle' | 'syncing';

interface EventSynchronizerEvents {
  'state-changed': (state: SyncState) => void;
  synced: (report: SyncReport) => void;
  stopped: (error?: Error) => void;
}

/**
 * Follows workspace activations and moves sticky windows along. Events are
 * handled one at a time, in the order the compositor sent them.
 */
export class EventSynchronizer extends EventEmitter<EventSynchronizerEvents> {
  private state: SyncState = 'idle';
  private subscription?: EventSubscription;
  private stopRequested = false;

  constructor(
    private readonly engine: TransitionEngine,
    private readonly logger: Logger = console
  ) {
    super();
  }

  getState(): SyncState {
    return this.state;
  }

  isRunning(): boolean {
    return this.subscription !== undefined;
  }

  /**
   * Consumes `subscription` until it is closed through `stop()`. Resolves on
   * a requested stop; rejects when the feed ends or fails on its own, leaving
   * any restart to whoever supervises the process.
   */
  async run(subscription: EventSubscription): Promise<void> {
    if (this.subscription) {
      throw new Error('Event synchronizer is already running.');
    }
    this.subscription = subscription;
    this.stopRequested = false;

    try {
      for await (const event of subscription) {
        if (event.type !== 'workspace-activated') {
          continue;
        }
        await this.handleActivation(event.workspaceId);
      }
      if (!this.stopRequested) {
        throw new Error('Compositor event stream ended.');
      }
      this.emit('stopped');
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(describeError(error));
      this.emit('stopped', failure);
      throw failure;
    } finally {
      this.subscription = undefined;
    }
  }

  stop(): void {
    if (!this.subscription) {
      return;
    }
    this.stopRequested = true;
    this.subscription.close();
  }

  private async handleActivation(workspaceId: WorkspaceId): Promise<void> {
    this.setState('syncing');
    this.logger.log(`Workspace switched to: ${workspaceId}`);
    try {
      const report = await this.engine.syncToWorkspace(workspaceId);
      if (report.pruned.length > 0) {
        this.logger.log(`Dropped closed sticky windows: [${report.pruned.join(', ')}]`);
      }
      this.emit('synced', report);
    } catch (error) {
      this.logger.error(
        `Failed to handle workspace activation for workspace ${workspaceId}: ${describeError(error)}`
      );
    } finally {
      this.setState('idle');
    }
  }

  private setState(state: SyncState): void {
    if (this.state === state) {
      return;
    }
    this.state = state;
    this.emit('state-changed', state);
  }
}

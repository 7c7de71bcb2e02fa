import { describeError } from '../core/errors';
import { EventSynchronizer } from '../core/eventSynchronizer';
import { StateStore } from '../core/stateStore';
import { TransitionEngine } from '../core/transitionEngine';
import { Logger } from '../core/types';
import { BaseCompositor } from '../platform/common/ICompositor';
import NiriCompositor from '../platform/niri/niriCompositor';
import { DaemonConfig, loadConfig } from './config';
import { CommandDispatcher } from './dispatcher';
import { formatWindowIds } from './protocol';
import { RequestServer } from './requestServer';

export interface ApplicationOptions {
  compositor?: BaseCompositor;
  config?: DaemonConfig;
  logger?: Logger;
}

export class Application {
  readonly store: StateStore;
  readonly engine: TransitionEngine;
  readonly synchronizer: EventSynchronizer;
  readonly server: RequestServer;

  private readonly compositor: BaseCompositor;
  private readonly config: DaemonConfig;
  private readonly logger: Logger;
  private watcher?: Promise<Error | undefined>;
  private stopping = false;

  constructor(options: ApplicationOptions = {}) {
    this.logger = options.logger ?? console;
    this.config = options.config ?? loadConfig(process.env, this.logger);
    this.compositor =
      options.compositor ??
      new NiriCompositor({
        binary: this.config.niriBinary,
        socketPath: this.config.compositorSocketPath
      });

    this.store = new StateStore(this.logger);
    this.engine = new TransitionEngine(this.store, this.compositor, this.compositor, {
      stageWorkspace: this.config.stageWorkspace,
      callTimeoutMs: this.config.callTimeoutMs,
      logger: this.logger
    });
    this.synchronizer = new EventSynchronizer(this.engine, this.logger);
    this.server = new RequestServer(new CommandDispatcher(this.engine, this.logger), {
      socketPath: this.config.controlSocketPath,
      logger: this.logger
    });

    this.store.on('changed', (snapshot) => {
      this.logger.log(
        `Sticky windows: ${formatWindowIds(snapshot.sticky)}, staged: ${formatWindowIds(snapshot.staged)}`
      );
    });
  }

  async start(): Promise<void> {
    if (this.watcher) {
      return;
    }
    await this.compositor.initialize();
    await this.server.start();
    this.watcher = this.synchronizer.run(this.compositor.subscribe()).then(
      () => undefined,
      (error: unknown) => (error instanceof Error ? error : new Error(describeError(error)))
    );
    this.logger.log(`niri-sticky daemon started (compositor: ${this.compositor.name}).`);
  }

  /**
   * Resolves after `stop()`; rejects when the compositor event feed is lost,
   * after shutting the rest of the daemon down.
   */
  async waitUntilStopped(): Promise<void> {
    if (!this.watcher) {
      throw new Error('Application has not been started yet.');
    }
    const failure = await this.watcher;
    if (failure) {
      this.reportError('watching workspace activations', failure);
      await this.stop();
      throw failure;
    }
  }

  async stop(): Promise<void> {
    if (this.stopping) {
      return;
    }
    this.stopping = true;
    this.synchronizer.stop();
    await this.server.stop();
    this.logger.log('niri-sticky daemon stopped.');
  }

  private reportError(context: string, error: unknown): void {
    this.logger.error(`Daemon error while ${context}: ${describeError(error)}`);
  }
}

export async function runDaemon(options: ApplicationOptions = {}): Promise<void> {
  const app = new Application(options);
  const shutdown = () => {
    app.stop().catch((error) => {
      console.error('Failed to stop niri-sticky daemon', error);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await app.start();
    await app.waitUntilStopped();
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

if (require.main === module) {
  runDaemon().catch((error) => {
    console.error('niri-sticky daemon exited', error);
    process.exitCode = 1;
  });
}

export { loadConfig } from './config';
export type { DaemonConfig } from './config';
export { CommandDispatcher } from './dispatcher';
export { RequestServer } from './requestServer';
export * from './protocol';

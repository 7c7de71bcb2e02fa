import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { WindowId, WorkspaceId, WorkspaceRef } from '../../core/types';
import { BaseCompositor, EventSubscription } from '../common/ICompositor';
import {
  NiriFocusedWindowSchema,
  NiriReplySchema,
  NiriWindowsSchema,
  NiriWorkspacesSchema,
  pickActiveWorkspace
} from './schema';
import { openEventStream, sendRequest } from './socket';

const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string }>;

export interface NiriCompositorOptions {
  /** niri executable used for `niri msg` queries. */
  binary?: string;
  /** IPC socket; defaults to `$NIRI_SOCKET`. */
  socketPath?: string;
  runCommand?: CommandRunner;
}

export class NiriCompositor extends BaseCompositor {
  readonly name = 'niri';

  private readonly binary: string;
  private readonly socketPath?: string;
  private readonly runCommand: CommandRunner;

  constructor(options: NiriCompositorOptions = {}) {
    super();
    this.binary = options.binary ?? 'niri';
    this.socketPath = options.socketPath ?? process.env.NIRI_SOCKET;
    this.runCommand = options.runCommand ?? ((file, args) => execFileAsync(file, args));
  }

  async initialize(): Promise<void> {
    await super.initialize();
    this.requireSocket();
  }

  async queryAllWindowIds(): Promise<Set<WindowId>> {
    const windows = await this.query(['windows'], NiriWindowsSchema);
    return new Set(windows.map((window) => window.id));
  }

  async queryFocusedWindowId(): Promise<WindowId> {
    const window = await this.query(['focused-window'], NiriFocusedWindowSchema);
    if (!window) {
      throw new Error('Focused window id not found');
    }
    return window.id;
  }

  async queryActiveWorkspaceId(): Promise<WorkspaceId> {
    const workspaces = await this.query(['workspaces'], NiriWorkspacesSchema);
    const active = pickActiveWorkspace(workspaces);
    if (!active) {
      throw new Error('Active workspace not found');
    }
    return active.id;
  }

  async moveWindow(windowId: WindowId, destination: WorkspaceRef): Promise<void> {
    const reference = destination.kind === 'id' ? { Id: destination.id } : { Name: destination.name };
    const raw = await sendRequest(this.requireSocket(), {
      Action: {
        MoveWindowToWorkspace: {
          window_id: windowId,
          focus: false,
          reference
        }
      }
    });

    const reply = NiriReplySchema.parse(raw);
    if ('Err' in reply) {
      throw new Error(`niri refused the move: ${reply.Err}`);
    }
  }

  subscribe(): EventSubscription {
    return openEventStream(this.requireSocket());
  }

  private async query<S extends z.ZodTypeAny>(args: string[], schema: S): Promise<z.infer<S>> {
    const { stdout } = await this.runCommand(this.binary, ['msg', '--json', ...args]);
    return schema.parse(JSON.parse(stdout));
  }

  private requireSocket(): string {
    if (!this.socketPath) {
      throw new Error('NIRI_SOCKET is not set; is niri running?');
    }
    return this.socketPath;
  }
}

export default NiriCompositor;

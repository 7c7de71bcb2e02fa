import { StickyError, describeError } from '../core/errors';
import { TransitionEngine } from '../core/transitionEngine';
import { Logger } from '../core/types';
import { Request, Response, StageTarget, UnstageTarget, formatResponse, parseRequest } from './protocol';

/**
 * Turns one request line into one response line. Never rejects: every
 * failure is rendered as an `Error:` line.
 */
export class CommandDispatcher {
  constructor(
    private readonly engine: TransitionEngine,
    private readonly logger: Logger = console
  ) {}

  async execute(line: string): Promise<string> {
    let request: Request;
    try {
      request = parseRequest(line);
    } catch (error) {
      this.reportError(line.trim(), error);
      return formatResponse({ kind: 'error', message: describeError(error) });
    }

    try {
      return formatResponse(await this.dispatch(request));
    } catch (error) {
      this.reportError(line.trim(), error);
      return formatResponse({ kind: 'error', message: describeError(error) });
    }
  }

  async dispatch(request: Request): Promise<Response> {
    switch (request.kind) {
      case 'add':
        return success((await this.engine.add(request.windowId)) ? 'Added' : 'Already in sticky list');
      case 'remove':
        return success((await this.engine.remove(request.windowId)) ? 'Removed' : 'Not in sticky list');
      case 'list':
        return { kind: 'data', windowIds: await this.engine.listSticky() };
      case 'toggle-active':
        return success(
          (await this.engine.toggleActive())
            ? 'Added active window to sticky'
            : 'Removed active window from sticky'
        );
      case 'stage':
        return this.dispatchStage(request.target);
      case 'unstage':
        return this.dispatchUnstage(request.target);
    }
  }

  private async dispatchStage(target: StageTarget): Promise<Response> {
    switch (target.type) {
      case 'all':
        return success(`Staged ${await this.engine.stageAll()} windows`);
      case 'list':
        return { kind: 'data', windowIds: await this.engine.listStaged() };
      case 'active': {
        const result = await this.engine.toggleStageActive();
        return success(result === 'staged' ? 'Staged active window' : 'Unstaged active window');
      }
      case 'window':
        await this.engine.stage(target.windowId);
        return success('Staged window');
    }
  }

  private async dispatchUnstage(target: UnstageTarget): Promise<Response> {
    const workspaceId = await this.engine.resolveActiveWorkspace();
    switch (target.type) {
      case 'all':
        return success(`Unstaged ${await this.engine.unstageAll(workspaceId)} windows`);
      case 'active':
        await this.engine.unstageActive(workspaceId);
        return success('Unstaged active window');
      case 'window':
        await this.engine.unstage(target.windowId, workspaceId);
        return success('Unstaged window');
    }
  }

  private reportError(command: string, error: unknown): void {
    const code = error instanceof StickyError ? error.code : 'Unexpected';
    this.logger.warn(`Request '${command}' failed (${code}): ${describeError(error)}`);
  }
}

function success(message: string): Response {
  return { kind: 'success', message };
}

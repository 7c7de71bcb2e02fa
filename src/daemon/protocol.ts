import { ProtocolError } from '../core/errors';
import { WindowId } from '../core/types';

export type StageTarget =
  | { type: 'window'; windowId: WindowId }
  | { type: 'all' }
  | { type: 'list' }
  | { type: 'active' };

export type UnstageTarget =
  | { type: 'window'; windowId: WindowId }
  | { type: 'all' }
  | { type: 'active' };

export type Request =
  | { kind: 'add'; windowId: WindowId }
  | { kind: 'remove'; windowId: WindowId }
  | { kind: 'list' }
  | { kind: 'toggle-active' }
  | { kind: 'stage'; target: StageTarget }
  | { kind: 'unstage'; target: UnstageTarget };

export type Response =
  | { kind: 'success'; message: string }
  | { kind: 'data'; windowIds: WindowId[] }
  | { kind: 'error'; message: string };

/** Parses one request line. Tokens after the ones a command needs are ignored. */
export function parseRequest(line: string): Request {
  const [command, argument] = line.trim().split(/\s+/);

  switch (command) {
    case 'add':
      return { kind: 'add', windowId: parseWindowId(argument) };
    case 'remove':
      return { kind: 'remove', windowId: parseWindowId(argument) };
    case 'list':
      return { kind: 'list' };
    case 'toggle_active':
      return { kind: 'toggle-active' };
    case 'stage':
      return { kind: 'stage', target: parseStageTarget(argument) };
    case 'unstage':
      return { kind: 'unstage', target: parseUnstageTarget(argument) };
    default:
      throw new ProtocolError('Unknown command');
  }
}

export function formatRequest(request: Request): string {
  switch (request.kind) {
    case 'add':
    case 'remove':
      return `${request.kind} ${request.windowId}`;
    case 'list':
      return 'list';
    case 'toggle-active':
      return 'toggle_active';
    case 'stage':
    case 'unstage':
      return `${request.kind} ${request.target.type === 'window' ? request.target.windowId : `--${request.target.type}`}`;
  }
}

export function formatResponse(response: Response): string {
  switch (response.kind) {
    case 'success':
      return `${response.message}\n`;
    case 'data':
      return `${formatWindowIds(response.windowIds)}\n`;
    case 'error':
      return `Error: ${response.message}\n`;
  }
}

export function formatWindowIds(windowIds: readonly WindowId[]): string {
  return `[${windowIds.join(', ')}]`;
}

export function isErrorResponse(line: string): boolean {
  return line.startsWith('Error: ');
}

function parseStageTarget(argument: string | undefined): StageTarget {
  switch (argument) {
    case undefined:
      throw new ProtocolError('Missing argument for stage');
    case '--all':
      return { type: 'all' };
    case '--list':
      return { type: 'list' };
    case '--active':
      return { type: 'active' };
    default:
      return { type: 'window', windowId: parseWindowId(argument) };
  }
}

function parseUnstageTarget(argument: string | undefined): UnstageTarget {
  switch (argument) {
    case undefined:
      throw new ProtocolError('Missing argument for unstage');
    case '--all':
      return { type: 'all' };
    case '--active':
      return { type: 'active' };
    default:
      return { type: 'window', windowId: parseWindowId(argument) };
  }
}

function parseWindowId(argument: string | undefined): WindowId {
  if (argument === undefined) {
    throw new ProtocolError('Missing window id');
  }
  if (!/^\d+$/.test(argument)) {
    throw new ProtocolError('Invalid window id');
  }
  const windowId = Number(argument);
  if (!Number.isSafeInteger(windowId)) {
    throw new ProtocolError('Invalid window id');
  }
  return windowId;
}

import os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_STAGE_WORKSPACE, Logger } from '../core/types';
import { DEFAULT_CALL_TIMEOUT_MS } from '../core/transitionEngine';

export interface DaemonConfig {
  /** Unix socket the daemon accepts CLI requests on. */
  controlSocketPath: string;
  /** niri IPC socket; unset outside a niri session. */
  compositorSocketPath?: string;
  niriBinary: string;
  stageWorkspace: string;
  callTimeoutMs: number;
}

export const DEFAULT_CONTROL_SOCKET_NAME = 'niri-sticky.sock';

export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger: Logger = console): DaemonConfig {
  return {
    controlSocketPath:
      nonEmpty(env.NIRI_STICKY_SOCKET) ?? path.join(os.tmpdir(), DEFAULT_CONTROL_SOCKET_NAME),
    compositorSocketPath: nonEmpty(env.NIRI_SOCKET),
    niriBinary: nonEmpty(env.NIRI_STICKY_NIRI_BIN) ?? 'niri',
    stageWorkspace: nonEmpty(env.NIRI_STICKY_STAGE_WORKSPACE) ?? DEFAULT_STAGE_WORKSPACE,
    callTimeoutMs:
      resolveTimeout(env.NIRI_STICKY_TIMEOUT_MS, logger) ?? DEFAULT_CALL_TIMEOUT_MS
  };
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function resolveTimeout(raw: string | undefined, logger: Logger): number | undefined {
  const value = nonEmpty(raw);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    logger.warn(`Ignoring invalid NIRI_STICKY_TIMEOUT_MS value: '${raw}'`);
    return undefined;
  }
  return parsed;
}

import net from 'node:net';
import readline from 'node:readline';
import { CompositorEvent } from '../../core/types';
import { EventSubscription } from '../common/ICompositor';
import { decodeEvent } from './schema';

/**
 * Sends one JSON request over the niri IPC socket and resolves with the
 * decoded first reply line. The connection is dropped after that line.
 */
export function sendRequest(socketPath: string, payload: unknown): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection(socketPath);
    let buffer = '';
    let settled = false;

    const settle = (outcome: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      outcome();
    };

    socket.setEncoding('utf8');
    socket.once('connect', () => {
      socket.write(`${JSON.stringify(payload)}\n`);
    });
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      const newline = buffer.indexOf('\n');
      if (newline === -1) {
        return;
      }
      const line = buffer.slice(0, newline);
      settle(() => {
        try {
          resolve(JSON.parse(line));
        } catch (error) {
          reject(new Error(`niri sent an unreadable reply: ${line}`, { cause: error }));
        }
      });
    });
    socket.once('error', (error) => settle(() => reject(error)));
    socket.once('end', () =>
      settle(() => reject(new Error('niri closed the socket before replying.')))
    );
  });
}

/**
 * Opens the niri event stream. The first reply line and every event other
 * than a workspace activation decode to `unknown`.
 */
export function openEventStream(socketPath: string): EventSubscription {
  const socket = net.createConnection(socketPath);
  const lines = readline.createInterface({ input: socket, crlfDelay: Infinity });
  let closedByCaller = false;
  let failure: Error | undefined;

  socket.once('connect', () => {
    socket.write('"EventStream"\n');
  });
  socket.on('error', (error) => {
    failure = error;
    lines.close();
  });
  // readline re-emits input errors on the interface itself.
  lines.on('error', (error) => {
    failure = error;
  });

  async function* events(): AsyncGenerator<CompositorEvent> {
    for await (const line of lines) {
      if (line.trim()) {
        yield decodeEvent(line);
      }
    }
    if (!closedByCaller) {
      throw failure ?? new Error('niri event stream closed.');
    }
  }

  const iterator = events();
  return {
    [Symbol.asyncIterator]: () => iterator,
    close: () => {
      closedByCaller = true;
      lines.close();
      socket.destroy();
    }
  };
}

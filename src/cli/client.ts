import net from 'node:net';
import { withTimeout } from '../core/timeout';

export interface SendCommandOptions {
  socketPath: string;
  timeoutMs?: number;
}

/** Sends one request line to the daemon and resolves with its reply line. */
export async function sendCommand(line: string, options: SendCommandOptions): Promise<string> {
  const socket = net.createConnection(options.socketPath);
  const reply = new Promise<string>((resolve, reject) => {
    let buffer = '';
    socket.setEncoding('utf8');
    socket.once('connect', () => {
      socket.write(`${line.trim()}\n`);
    });
    socket.on('data', (chunk: string) => {
      buffer += chunk;
    });
    socket.once('end', () => {
      const newline = buffer.indexOf('\n');
      resolve(newline === -1 ? buffer : buffer.slice(0, newline));
    });
    socket.once('error', (error) => {
      reject(new Error(`Could not reach the daemon at ${options.socketPath}: ${error.message}`, { cause: error }));
    });
  });

  try {
    return await withTimeout(
      reply,
      options.timeoutMs ?? 0,
      () => new Error(`The daemon did not answer within ${options.timeoutMs}ms`)
    );
  } finally {
    socket.destroy();
  }
}

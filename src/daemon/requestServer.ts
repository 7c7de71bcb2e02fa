import * as fs from 'node:fs/promises';
import net from 'node:net';
import { describeError } from '../core/errors';
import { Logger } from '../core/types';
import { CommandDispatcher } from './dispatcher';

export interface RequestServerOptions {
  socketPath: string;
  logger?: Logger;
}

/**
 * Unix-socket front end: one request line per connection, one response line
 * back, then the connection is ended.
 */
export class RequestServer {
  private server?: net.Server;
  private readonly connections = new Set<net.Socket>();
  private readonly socketPath: string;
  private readonly logger: Logger;

  constructor(
    private readonly dispatcher: CommandDispatcher,
    options: RequestServerOptions
  ) {
    this.socketPath = options.socketPath;
    this.logger = options.logger ?? console;
  }

  get path(): string {
    return this.socketPath;
  }

  isListening(): boolean {
    return this.server?.listening ?? false;
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    await fs.rm(this.socketPath, { force: true });

    const server = net.createServer({ allowHalfOpen: true }, (socket) => this.handleConnection(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off('listening', onListening);
        this.server = undefined;
        reject(error);
      };
      const onListening = () => {
        server.off('error', onError);
        server.on('error', (error) => this.reportError('accepting connections', error));
        this.logger.log(`Listening for commands on ${this.socketPath}`);
        resolve();
      };

      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.socketPath);
    });
  }

  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }

    const server = this.server;
    this.server = undefined;
    this.connections.forEach((socket) => socket.destroy());
    this.connections.clear();

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
    await fs.rm(this.socketPath, { force: true });
  }

  private handleConnection(socket: net.Socket): void {
    this.connections.add(socket);
    socket.setEncoding('utf8');

    let buffer = '';
    let answered = false;
    const answer = (line: string) => {
      if (answered) {
        return;
      }
      answered = true;
      void this.respond(socket, line);
    };

    socket.on('data', (chunk: string) => {
      if (answered) {
        return;
      }
      buffer += chunk;
      const newline = buffer.indexOf('\n');
      if (newline !== -1) {
        answer(buffer.slice(0, newline));
      }
    });
    socket.on('end', () => {
      if (buffer.length > 0) {
        answer(buffer);
      } else if (!answered) {
        socket.end();
      }
    });
    socket.on('error', (error) => this.reportError('reading a command', error));
    socket.on('close', () => this.connections.delete(socket));
  }

  private async respond(socket: net.Socket, line: string): Promise<void> {
    try {
      const response = await this.dispatcher.execute(line);
      if (!socket.destroyed) {
        socket.end(response);
      }
    } catch (error) {
      this.reportError('answering a command', error);
      socket.destroy();
    }
  }

  private reportError(context: string, error: unknown): void {
    this.logger.error(`Command server error while ${context}: ${describeError(error)}`);
  }
}

import * as fs from 'node:fs/promises';
import net from 'node:net';
import os from 'node:os';
import * as path from 'node:path';
import { sendCommand } from '../src/cli/client';
import { StateStore, TransitionEngine } from '../src/core';
import { CommandDispatcher } from '../src/daemon/dispatcher';
import { RequestServer } from '../src/daemon/requestServer';
import VirtualCompositor from '../src/platform/common/virtualCompositor';

let socketCounter = 0;

function nextSocketPath(): string {
  socketCounter += 1;
  return path.join(os.tmpdir(), `niri-sticky-server-${process.pid}-${socketCounter}.sock`);
}

function rawExchange(socketPath: string, payload: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection(socketPath, () => {
      socket.end(payload);
    });
    let received = '';
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      received += chunk;
    });
    socket.on('end', () => resolve(received));
    socket.on('error', reject);
  });
}

describe('RequestServer', () => {
  let compositor: VirtualCompositor;
  let server: RequestServer;
  let socketPath: string;

  beforeEach(async () => {
    compositor = new VirtualCompositor();
    compositor.registerWindow(1);
    compositor.registerWindow(2);
    compositor.activateWorkspace(1);
    const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
    const engine = new TransitionEngine(new StateStore(), compositor, compositor, {
      logger,
      callTimeoutMs: 0
    });
    socketPath = nextSocketPath();
    server = new RequestServer(new CommandDispatcher(engine, logger), { socketPath, logger });
    await server.start();
  });

  afterEach(async () => {
    await server.stop();
  });

  it('answers one request per connection', async () => {
    await expect(sendCommand('add 1', { socketPath })).resolves.toBe('Added');
    await expect(sendCommand('add 2', { socketPath })).resolves.toBe('Added');
    await expect(sendCommand('list', { socketPath })).resolves.toBe('[1, 2]');
    await expect(sendCommand('stage 9', { socketPath })).resolves.toBe(
      'Error: Window not found in compositor'
    );
  });

  it('accepts a final line without a newline', async () => {
    await expect(rawExchange(socketPath, 'add 2')).resolves.toBe('Added\n');
  });

  it('answers only the first line of a connection', async () => {
    await expect(rawExchange(socketPath, 'add 1\nadd 2\n')).resolves.toBe('Added\n');
    await expect(sendCommand('list', { socketPath })).resolves.toBe('[1]');
  });

  it('closes connections that send nothing', async () => {
    await expect(rawExchange(socketPath, '')).resolves.toBe('');
  });

  it('serves concurrent clients', async () => {
    const replies = await Promise.all([
      sendCommand('add 1', { socketPath }),
      sendCommand('add 2', { socketPath }),
      sendCommand('bogus', { socketPath })
    ]);

    expect(replies).toEqual(['Added', 'Added', 'Error: Unknown command']);
  });

  it('replaces a stale socket file and removes it on stop', async () => {
    await server.stop();
    await fs.writeFile(socketPath, 'stale');

    await server.start();
    expect(server.isListening()).toBe(true);
    await expect(sendCommand('list', { socketPath })).resolves.toBe('[]');

    await server.stop();
    await expect(fs.stat(socketPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('sendCommand', () => {
  it('fails when no daemon is listening', async () => {
    const socketPath = nextSocketPath();

    await expect(sendCommand('list', { socketPath })).rejects.toThrow(
      `Could not reach the daemon at ${socketPath}`
    );
  });

  it('gives up on a daemon that never answers', async () => {
    const socketPath = nextSocketPath();
    const accepted: net.Socket[] = [];
    const silent = net.createServer((socket) => {
      accepted.push(socket);
    });
    await new Promise<void>((resolve) => silent.listen(socketPath, resolve));

    try {
      await expect(sendCommand('list', { socketPath, timeoutMs: 30 })).rejects.toThrow(
        'The daemon did not answer within 30ms'
      );
    } finally {
      accepted.forEach((socket) => socket.destroy());
      await new Promise<void>((resolve) => silent.close(() => resolve()));
    }
  });
});

import { createServer, type Server, type Socket } from 'net';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { ManagementChannel } from './channel.js';
import { AlreadyConnectedError, ConnectionError, NotConnectedError } from '../utils/errors.js';
import type { ChannelCloseInfo } from './types.js';

interface TestServer {
  server: Server;
  port: number;
  sockets: Socket[];
  received: string[];
  stop: () => Promise<void>;
}

async function startServer(): Promise<TestServer> {
  const sockets: Socket[] = [];
  const received: string[] = [];
  const server = createServer((socket) => {
    sockets.push(socket);
    socket.on('data', (chunk: Buffer) => {
      received.push(chunk.toString('utf8'));
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected tcp server address');
  }

  return {
    server,
    port: address.port,
    sockets,
    received,
    stop: async () => {
      for (const socket of sockets) {
        socket.destroy();
      }
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

async function reserveClosedPort(): Promise<number> {
  const { port, stop } = await startServer();
  await stop();
  return port;
}

describe('ManagementChannel', () => {
  let server: TestServer | null = null;
  const channel = new ManagementChannel();

  afterEach(async () => {
    channel.disconnect();
    channel.removeAllListeners();
    await server?.stop();
    server = null;
  });

  it('connects and writes newline-terminated commands', async () => {
    server = await startServer();
    await channel.connect('127.0.0.1', server.port, 1000);

    channel.send('state on');
    channel.send('log on');

    const current = server;
    await vi.waitFor(() => expect(current.received.join('')).toBe('state on\nlog on\n'));
    expect(channel.isConnected()).toBe(true);
  });

  it('emits complete lines in arrival order across reads', async () => {
    server = await startServer();
    const lines: string[] = [];
    channel.on('line', (line) => lines.push(line));
    await channel.connect('127.0.0.1', server.port, 1000);
    const current = server;
    await vi.waitFor(() => expect(current.sockets).toHaveLength(1));

    const socket = current.sockets[0];
    socket.write('>STATE:0,CONNECTING,,,\r\n>LOG:1,I,fir');
    await vi.waitFor(() => expect(lines).toHaveLength(1));
    socket.write('st\n>PASSWORD:Need \'Auth\' username/password\n');

    await vi.waitFor(() =>
      expect(lines).toEqual([
        '>STATE:0,CONNECTING,,,',
        '>LOG:1,I,first',
        ">PASSWORD:Need 'Auth' username/password",
      ])
    );
  });

  it('fails with ConnectionError when nothing listens before the timeout', async () => {
    const port = await reserveClosedPort();

    await expect(channel.connect('127.0.0.1', port, 300)).rejects.toThrow(ConnectionError);
    expect(channel.isConnected()).toBe(false);
  });

  it('keeps trying until the endpoint starts listening', async () => {
    const port = await reserveClosedPort();
    const connecting = channel.connect('127.0.0.1', port, 2000);

    await new Promise((resolve) => setTimeout(resolve, 150));
    const late = createServer();
    await new Promise<void>((resolve) => late.listen(port, '127.0.0.1', () => resolve()));

    try {
      await connecting;
      expect(channel.isConnected()).toBe(true);
    } finally {
      channel.disconnect();
      await new Promise<void>((resolve) => late.close(() => resolve()));
    }
  });

  it('stops waiting when aborted', async () => {
    const port = await reserveClosedPort();
    const abort = new AbortController();
    const connecting = channel.connect('127.0.0.1', port, 2000, abort.signal);

    abort.abort(new Error('process exited'));

    await expect(connecting).rejects.toThrow('process exited');
  });

  it('refuses to send while disconnected', () => {
    expect(() => channel.send('hold release')).toThrow(NotConnectedError);
  });

  it('refuses a second connect while connected', async () => {
    server = await startServer();
    await channel.connect('127.0.0.1', server.port, 1000);

    await expect(channel.connect('127.0.0.1', server.port, 1000)).rejects.toThrow(AlreadyConnectedError);
  });

  it('reports a requested disconnect once', async () => {
    server = await startServer();
    const closes: ChannelCloseInfo[] = [];
    channel.on('close', (info) => closes.push(info));
    await channel.connect('127.0.0.1', server.port, 1000);

    channel.disconnect();
    channel.disconnect();

    expect(closes).toEqual([{ requested: true }]);
    expect(channel.isConnected()).toBe(false);
  });

  it('reports a connection closed by the peer', async () => {
    server = await startServer();
    const closes: ChannelCloseInfo[] = [];
    channel.on('close', (info) => closes.push(info));
    await channel.connect('127.0.0.1', server.port, 1000);
    const current = server;
    await vi.waitFor(() => expect(current.sockets).toHaveLength(1));

    current.sockets[0].end();

    await vi.waitFor(() => expect(closes).toEqual([{ requested: false }]));
    expect(channel.isConnected()).toBe(false);
  });
});

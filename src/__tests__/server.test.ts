import net from 'node:net';
import type { Server } from 'node:http';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { DatasetNotFoundError, DatasetParseError } from '../errors';
import { startService } from '../server';

const settings = { dataPath: 'cards.json', host: '127.0.0.1', port: 0 };

const readerOf = (content: string) => async () => content;

const portOf = (server: Server): number => {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  return address.port;
};

const closeServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

describe('startService', () => {
  const started: Server[] = [];
  afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all(started.splice(0).map(closeServer));
  });

  it('serves the loaded dataset', async () => {
    const server = await startService(settings, readerOf('[{"id": "/A1/001", "name": "Pikachu"}]'));
    started.push(server);

    const response = await fetch(`http://127.0.0.1:${portOf(server)}/cards/A1/001`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ id: '/A1/001', name: 'Pikachu' });
  });

  it('rejects malformed JSON without binding a port', async () => {
    const listenSpy = vi.spyOn(net.Server.prototype, 'listen');
    const result = startService(settings, readerOf('[{"id": "/A1/001",'));

    await expect(result).rejects.toBeInstanceOf(DatasetParseError);
    expect(listenSpy).not.toHaveBeenCalled();
  });

  it('rejects a missing dataset without binding a port', async () => {
    const listenSpy = vi.spyOn(net.Server.prototype, 'listen');
    const missing = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    const reader = async (): Promise<string> => {
      throw missing;
    };

    await expect(startService(settings, reader)).rejects.toBeInstanceOf(DatasetNotFoundError);
    expect(listenSpy).not.toHaveBeenCalled();
  });

  it('rejects when the port is already taken', async () => {
    const first = await startService(settings, readerOf('[]'));
    started.push(first);

    const second = startService({ ...settings, port: portOf(first) }, readerOf('[]'));

    await expect(second).rejects.toMatchObject({ code: 'EADDRINUSE' });
  });
});

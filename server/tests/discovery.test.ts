import { describe, expect, it, vi } from 'vitest';
import { DeviceClient } from '../src/services/deviceClient.js';
import { DiscoveryService } from '../src/services/discovery.js';
import { DeviceUnreachableError } from '../src/services/errors.js';
import { FakeSocket, FakeTransport, helloBody, ssdpReply } from './helpers.js';

const SERVICE = 'urn:schemas-getdoxie-com:device:Scanner:1';

function unusedConnect(): Promise<DeviceClient> {
  throw new Error('connect should not be called');
}

describe('DiscoveryService.discover', () => {
  it('returns an empty list when nothing answers', async () => {
    const socket = new FakeSocket();
    const discovery = new DiscoveryService({ createSocket: () => socket, connect: unusedConnect });

    await expect(discovery.discover(SERVICE, { timeout: 20 })).resolves.toEqual([]);
    expect(socket.closed).toBe(true);
  });

  it('multicasts an M-SEARCH for the service type', async () => {
    const socket = new FakeSocket();
    const discovery = new DiscoveryService({ createSocket: () => socket, connect: unusedConnect });

    await discovery.discover(SERVICE, { timeout: 20 });

    expect(socket.sent).toHaveLength(1);
    expect(socket.sent[0].address).toBe('239.255.255.250');
    expect(socket.sent[0].port).toBe(1900);
    expect(socket.sent[0].msg).toContain(`ST: ${SERVICE}\r\n`);
  });

  it('collects one base URL per responding scanner', async () => {
    const socket = new FakeSocket([
      { message: ssdpReply('http://192.168.1.20:8080/scanner.xml'), address: '192.168.1.20' },
      { message: ssdpReply('http://192.168.1.21:8080/scanner.xml'), address: '192.168.1.21' },
      // Repeated answer from the first scanner
      { message: ssdpReply('http://192.168.1.20:8080/other.xml'), address: '192.168.1.20' },
      { message: ssdpReply('http://192.168.1.40:49152/desc.xml', 'urn:schemas-upnp-org:device:MediaRenderer:1'), address: '192.168.1.40' },
      { message: 'HTTP/1.1 200 OK\r\nST: ' + SERVICE + '\r\n\r\n', address: '192.168.1.41' },
      { message: 'garbage', address: '192.168.1.42' },
    ]);
    const discovery = new DiscoveryService({ createSocket: () => socket, connect: unusedConnect });

    const urls = await discovery.discover(SERVICE, { timeout: 30 });

    expect(urls).toEqual(['http://192.168.1.20:8080/', 'http://192.168.1.21:8080/']);
  });
});

describe('DiscoveryService.discoverClients', () => {
  it('connects to each scanner and reports the ones that fail', async () => {
    const socket = new FakeSocket([
      { message: ssdpReply('http://192.168.1.20:8080/scanner.xml'), address: '192.168.1.20' },
      { message: ssdpReply('http://192.168.1.21:8080/scanner.xml'), address: '192.168.1.21' },
    ]);
    const connect = vi.fn(async (baseUrl: string) => {
      if (baseUrl === 'http://192.168.1.21:8080/') {
        throw new DeviceUnreachableError('GET /hello.json: Network error');
      }
      const transport = new FakeTransport(baseUrl).reply('GET', '/hello.json', helloBody());
      return DeviceClient.connect(baseUrl, { transport });
    });
    const discovery = new DiscoveryService({
      createSocket: () => socket,
      connect,
      defaults: { timeout: 30 },
    });

    const { clients, failures } = await discovery.discoverClients();

    expect(clients.map((client) => client.baseUrl)).toEqual(['http://192.168.1.20:8080/']);
    expect(failures).toEqual([
      {
        url: 'http://192.168.1.21:8080/',
        kind: 'DeviceUnreachable',
        message: 'GET /hello.json: Network error',
      },
    ]);
    expect(discovery.getClient('00:11:e5:0a:1b:2c')).toBe(clients[0]);
    expect(discovery.getClients()).toEqual(clients);
  });

  it('forgets scanners that no longer answer', async () => {
    const sockets = [
      new FakeSocket([{ message: ssdpReply('http://192.168.1.20:8080/scanner.xml'), address: '192.168.1.20' }]),
      new FakeSocket(),
    ];
    const discovery = new DiscoveryService({
      createSocket: () => sockets.shift() ?? new FakeSocket(),
      connect: (baseUrl) =>
        DeviceClient.connect(baseUrl, {
          transport: new FakeTransport(baseUrl).reply('GET', '/hello.json', helloBody()),
        }),
      defaults: { timeout: 20 },
    });

    await discovery.discoverClients();
    expect(discovery.getClients()).toHaveLength(1);

    await discovery.discoverClients();
    expect(discovery.getClients()).toEqual([]);
  });
});

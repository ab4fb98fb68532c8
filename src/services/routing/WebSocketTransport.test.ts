import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RouteRequestMessage, TransportConfig } from '../../types/routing.types';
import { NotConnectedError } from '../errors';
import { WebSocketTransport } from './WebSocketTransport';

const sockets = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void;

  class FakeSocket {
    static readonly CLOSED = 3;
    readyState = 0;
    failSends = false;
    readonly sent: string[] = [];
    private listeners = new Map<string, Listener[]>();

    constructor(readonly url: string) {
      created.push(this);
    }

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
      return this;
    }

    once(event: string, listener: Listener): this {
      const wrapped: Listener = (...args) => {
        this.listeners.set(event, (this.listeners.get(event) ?? []).filter(l => l !== wrapped));
        listener(...args);
      };
      return this.on(event, wrapped);
    }

    emit(event: string, ...args: unknown[]): void {
      for (const listener of this.listeners.get(event) ?? []) {
        listener(...args);
      }
    }

    open(): void {
      this.readyState = 1;
      this.emit('open');
    }

    send(data: string, callback: (error?: Error) => void): void {
      if (this.failSends) {
        callback(new Error('broken pipe'));
        return;
      }
      this.sent.push(data);
      callback();
    }

    close(): void {
      this.readyState = FakeSocket.CLOSED;
      this.emit('close');
    }
  }

  const created: FakeSocket[] = [];
  return { FakeSocket, created };
});

vi.mock('ws', () => ({ default: sockets.FakeSocket }));

const config: TransportConfig = { type: 'websocket', url: 'ws://localhost:8765', reconnectIntervalMs: 3000 };

const request: RouteRequestMessage = {
  type: 'request_route',
  drone_id: 'FP-001',
  model: 'Light Quadcopter',
  start_position: { x: 0, y: 0, z: 0 },
  end_position: { x: 10, y: 0, z: 5 },
  battery_percentage: 100,
  max_speed: 15,
  max_range: 20000,
};

describe('WebSocketTransport', () => {
  beforeEach(() => {
    sockets.created.length = 0;
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('stays connecting until the socket opens', () => {
    const transport = new WebSocketTransport(config);
    transport.connect();

    expect(sockets.created).toHaveLength(1);
    expect(sockets.created[0].url).toBe('ws://localhost:8765');
    expect(transport.getState()).toBe('connecting');

    sockets.created[0].open();
    expect(transport.getState()).toBe('connected');
  });

  it('rejects sends before the socket opens', async () => {
    const transport = new WebSocketTransport(config);
    transport.connect();
    await expect(transport.send(request)).rejects.toBeInstanceOf(NotConnectedError);
  });

  it('writes one JSON text frame per request', async () => {
    const transport = new WebSocketTransport(config);
    transport.connect();
    sockets.created[0].open();

    await transport.send(request);

    expect(sockets.created[0].sent).toHaveLength(1);
    expect(JSON.parse(sockets.created[0].sent[0])).toEqual(request);
  });

  it('surfaces socket write errors', async () => {
    const transport = new WebSocketTransport(config);
    transport.connect();
    sockets.created[0].open();
    sockets.created[0].failSends = true;

    await expect(transport.send(request)).rejects.toThrow('broken pipe');
  });

  it('parses binary frames and skips the plain-text echo', () => {
    const transport = new WebSocketTransport(config);
    const received: unknown[] = [];
    transport.onMessage((message) => received.push(message));
    transport.connect();
    sockets.created[0].open();

    sockets.created[0].emit('message', Buffer.from('Echo: hi'));
    sockets.created[0].emit('message', Buffer.from('{"drone_id":"FP-001","route":[]}'));

    expect(received).toEqual([{ drone_id: 'FP-001', route: [] }]);
  });

  it('opens a new socket after the reconnect interval when the server goes away', () => {
    const transport = new WebSocketTransport(config);
    transport.connect();
    sockets.created[0].open();

    sockets.created[0].emit('error', new Error('ECONNRESET'));
    sockets.created[0].close();
    expect(transport.getState()).toBe('disconnected');

    vi.advanceTimersByTime(3000);
    expect(sockets.created).toHaveLength(2);
    expect(transport.getState()).toBe('connecting');
  });

  it('closes the socket without scheduling a reconnect', async () => {
    const transport = new WebSocketTransport(config);
    transport.connect();
    sockets.created[0].open();

    await transport.close();

    expect(sockets.created[0].readyState).toBe(3);
    expect(transport.getState()).toBe('disconnected');
    vi.advanceTimersByTime(10000);
    expect(sockets.created).toHaveLength(1);
  });
});

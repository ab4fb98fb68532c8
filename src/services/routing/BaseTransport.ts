/**
 * BaseTransport.ts
 *
 * Abstract base class for routing-service transports with a connection state
 * machine and fixed-interval reconnection.
 *
 * CONNECTION STATES:
 * disconnected → connecting → connected → disconnected (on any close or error)
 * From disconnected a reconnect is scheduled every reconnectIntervalMs until
 * close() is called. connect() never blocks: the caller keeps ticking while the
 * transport comes up.
 *
 * SEND:
 * send() serializes to a JSON text frame and requires the connected state,
 * otherwise it rejects with NotConnectedError. There is no queue; a request that
 * cannot be sent is the caller's to time out.
 *
 * RECEIVE FLOW:
 * 1. Subclass receives a frame → handleReceive(text)
 * 2. Non-JSON frames are dropped, the rest go to dispatch(message)
 * 3. Every registered handler is invoked; a throwing handler is logged and
 *    does not stop the others
 *
 * SUBCLASS RESPONSIBILITIES:
 * - openConnection(): start connecting; call handleOpen() / handleDisconnect()
 * - closeConnection(): release the underlying socket/client
 * - sendRaw(data, message): write one frame
 */

import type {
  InboundHandler,
  RouteRequestMessage,
  RouteTransport,
  StateHandler,
  TransportConfig,
  TransportState,
} from '../../types/routing.types';
import { NotConnectedError } from '../errors';
import { RouteProtocolService } from '../RouteProtocol';

export abstract class BaseTransport implements RouteTransport {
  protected readonly config: TransportConfig;
  protected state: TransportState = 'disconnected';
  protected messageHandlers: InboundHandler[] = [];
  protected stateHandlers: StateHandler[] = [];
  protected reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  protected closed: boolean = false;

  protected abstract readonly name: string;

  constructor(config: TransportConfig) {
    this.config = config;
  }

  protected abstract openConnection(): void;
  protected abstract closeConnection(): Promise<void>;
  protected abstract sendRaw(data: string, message: RouteRequestMessage): Promise<void>;

  connect(): void {
    if (this.state !== 'disconnected') {
      return;
    }
    this.closed = false;
    this.clearReconnect();
    this.setState('connecting');
    console.log(`[${this.name}] Connecting to ${this.config.url}`);

    try {
      this.openConnection();
    } catch (error) {
      console.error(`[${this.name}] Connect failed:`, error);
      this.handleDisconnect();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.clearReconnect();
    await this.closeConnection();
    this.setState('disconnected');
    console.log(`[${this.name}] Closed`);
  }

  async send(message: RouteRequestMessage): Promise<void> {
    if (this.state !== 'connected') {
      throw new NotConnectedError(this.name);
    }
    await this.sendRaw(JSON.stringify(message), message);
  }

  onMessage(handler: InboundHandler): () => void {
    this.messageHandlers.push(handler);
    return () => {
      this.messageHandlers = this.messageHandlers.filter(h => h !== handler);
    };
  }

  onStateChange(handler: StateHandler): () => void {
    this.stateHandlers.push(handler);
    return () => {
      this.stateHandlers = this.stateHandlers.filter(h => h !== handler);
    };
  }

  getState(): TransportState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  protected handleOpen(): void {
    console.log(`[${this.name}] Connected`);
    this.setState('connected');
  }

  /**
   * Called by subclasses on close or error. Safe to call more than once.
   */
  protected handleDisconnect(): void {
    if (this.state !== 'disconnected') {
      console.warn(`[${this.name}] Disconnected`);
      this.setState('disconnected');
    }
    this.scheduleReconnect();
  }

  protected handleReceive(data: string): void {
    const message = RouteProtocolService.parseFrame(data);
    if (message === null) {
      console.warn(`[${this.name}] Ignoring non-JSON frame: ${data.slice(0, 80)}`);
      return;
    }
    this.dispatch(message);
  }

  protected dispatch(message: unknown): void {
    for (const handler of this.messageHandlers) {
      try {
        handler(message);
      } catch (error) {
        console.error(`[${this.name}] Error in message handler:`, error);
      }
    }
  }

  private setState(state: TransportState): void {
    if (this.state === state) {
      return;
    }
    this.state = state;
    for (const handler of this.stateHandlers) {
      try {
        handler(state);
      } catch (error) {
        console.error(`[${this.name}] Error in state handler:`, error);
      }
    }
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer) {
      return;
    }
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, this.config.reconnectIntervalMs);
  }

  private clearReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}

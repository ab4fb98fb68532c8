/**
 * WebSocketTransport: persistent connection to the routing service
 * (default ws://localhost:8765), one JSON text frame per message.
 */

import WebSocket from 'ws';
import { BaseTransport } from './BaseTransport';
import { NotConnectedError } from '../errors';

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export class WebSocketTransport extends BaseTransport {
  protected readonly name = 'WebSocketTransport';
  private socket: WebSocket | null = null;

  protected openConnection(): void {
    const socket = new WebSocket(this.config.url);
    this.socket = socket;

    socket.on('open', () => {
      this.handleOpen();
    });

    socket.on('message', (data: WebSocket.RawData) => {
      this.handleReceive(rawDataToString(data));
    });

    socket.on('error', (error: Error) => {
      console.error(`[${this.name}] Socket error:`, error.message);
    });

    // 'close' follows 'error', so disconnect handling lives here only
    socket.on('close', () => {
      if (this.socket !== socket) {
        return;
      }
      this.socket = null;
      this.handleDisconnect();
    });
  }

  protected async closeConnection(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.close();
    });
  }

  protected sendRaw(data: string): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new NotConnectedError(this.name));
    }

    return new Promise((resolve, reject) => {
      socket.send(data, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

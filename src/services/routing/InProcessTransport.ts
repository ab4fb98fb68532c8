/**
 * InProcessTransport: routes requests to a local responder function instead of
 * a network service. Used for offline runs and as the service stand-in in tests.
 *
 * Behavior:
 * - openConnection(): connects immediately
 * - sendRaw(): hands the request to the responder; a returned response goes
 *   back through the normal receive path as a JSON frame
 * - a responder returning null/undefined never answers (the drone times out)
 * - drop(): simulates the service closing the connection
 */

import { BaseTransport } from './BaseTransport';
import type { RouteRequestMessage, RouteResponseMessage, TransportConfig } from '../../types/routing.types';

export type RouteResponder = (
  request: RouteRequestMessage
) => RouteResponseMessage | null | undefined | Promise<RouteResponseMessage | null | undefined>;

export const silentResponder: RouteResponder = () => null;

export class InProcessTransport extends BaseTransport {
  protected readonly name = 'InProcessTransport';
  private readonly responder: RouteResponder;
  readonly sent: RouteRequestMessage[] = [];

  constructor(config: TransportConfig, responder: RouteResponder = silentResponder) {
    super(config);
    this.responder = responder;
  }

  /**
   * Deliver an unsolicited frame, as if the service pushed it
   */
  inject(frame: string): void {
    this.handleReceive(frame);
  }

  drop(): void {
    this.handleDisconnect();
  }

  protected openConnection(): void {
    this.handleOpen();
  }

  protected async closeConnection(): Promise<void> {
    // nothing to release
  }

  protected async sendRaw(_data: string, message: RouteRequestMessage): Promise<void> {
    this.sent.push(message);
    const response = await this.responder(message);
    if (response) {
      this.handleReceive(JSON.stringify(response));
    }
  }
}

/**
 * RouteNegotiationClient.ts
 *
 * Correlates route requests with responses over one shared transport.
 *
 * CORRELATION:
 * Each outstanding request owns one promise, keyed by drone_id. An inbound
 * message is routed to exactly one pending entry and that entry is removed, so
 * no other requester ever sees it. Messages for ids with nothing pending (late
 * responses after a timeout, or strays) are logged and dropped.
 *
 * LIFECYCLE OF A REQUEST:
 * 1. requestRoute() registers the pending entry and sends the request
 * 2. send failure (e.g. NotConnectedError) → promise rejects
 * 3. response with matching drone_id → promise resolves with the raw message;
 *    validation is the requester's job (RouteProtocolService.parseRouteResponse)
 * 4. cancel() (the requester's timeout) → promise rejects, entry removed
 * 5. a second request for the same drone_id supersedes the first
 *
 * Timeouts are counted in simulated seconds by the requester, not here.
 */

import type { RouteResponseMessage, RouteTransport, TransportState } from '../../types/routing.types';
import { RouteRequestCancelledError } from '../errors';
import { RouteProtocolService, type RouteRequestParams } from '../RouteProtocol';

interface PendingRequest {
  token: symbol;
  resolve: (message: RouteResponseMessage) => void;
  reject: (error: Error) => void;
}

export interface RouteRequestHandle {
  droneId: string;
  response: Promise<RouteResponseMessage>;
  /** Reject and forget the request; no-op once settled */
  cancel(reason: string): void;
}

export class RouteNegotiationClient {
  private transport: RouteTransport;
  private pending: Map<string, PendingRequest> = new Map();
  private unsubscribe: () => void;

  constructor(transport: RouteTransport) {
    this.transport = transport;
    this.unsubscribe = transport.onMessage((message) => this.handleMessage(message));
  }

  /**
   * Start connecting; returns immediately
   */
  connect(): void {
    this.transport.connect();
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  getState(): TransportState {
    return this.transport.getState();
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  hasPending(droneId: string): boolean {
    return this.pending.has(droneId);
  }

  requestRoute(params: RouteRequestParams): RouteRequestHandle {
    const { droneId } = params;
    const previous = this.pending.get(droneId);
    if (previous) {
      this.pending.delete(droneId);
      previous.reject(new RouteRequestCancelledError(droneId, 'superseded by a newer request'));
    }

    const token = Symbol(droneId);
    const response = new Promise<RouteResponseMessage>((resolve, reject) => {
      this.pending.set(droneId, { token, resolve, reject });
    });

    const message = RouteProtocolService.createRouteRequest(params);
    console.log(`[RouteClient] Requesting route for ${droneId} (${params.model})`);

    this.transport.send(message).catch((error: unknown) => {
      const failure = error instanceof Error ? error : new Error(String(error));
      console.warn(`[RouteClient] Request for ${droneId} not sent: ${failure.message}`);
      this.settle(droneId, token, (entry) => entry.reject(failure));
    });

    return {
      droneId,
      response,
      cancel: (reason: string) => {
        this.settle(droneId, token, (entry) =>
          entry.reject(new RouteRequestCancelledError(droneId, reason))
        );
      },
    };
  }

  async close(): Promise<void> {
    this.unsubscribe();
    for (const [droneId, entry] of this.pending) {
      entry.reject(new RouteRequestCancelledError(droneId, 'client closed'));
    }
    this.pending.clear();
    await this.transport.close();
  }

  private handleMessage(message: unknown): void {
    if (!RouteProtocolService.isRouteResponse(message)) {
      console.warn('[RouteClient] Ignoring message without drone_id');
      return;
    }

    const entry = this.pending.get(message.drone_id);
    if (!entry) {
      console.warn(`[RouteClient] No pending request for ${message.drone_id}, dropping response`);
      return;
    }

    this.pending.delete(message.drone_id);
    entry.resolve(message);
  }

  private settle(droneId: string, token: symbol, action: (entry: PendingRequest) => void): void {
    const entry = this.pending.get(droneId);
    if (!entry || entry.token !== token) {
      return;
    }
    this.pending.delete(droneId);
    action(entry);
  }
}

/**
 * Error types raised by the routing layer.
 * Callers treat all of them as "no server route": the drone falls back.
 */

export class NotConnectedError extends Error {
  constructor(transport: string) {
    super(`${transport} is not connected`);
    this.name = 'NotConnectedError';
  }
}

export class RouteRequestCancelledError extends Error {
  constructor(droneId: string, reason: string) {
    super(`Route request for ${droneId} cancelled: ${reason}`);
    this.name = 'RouteRequestCancelledError';
  }
}

export class UnsupportedTransportError extends Error {
  constructor(type: string) {
    super(`Unsupported transport type: ${type}`);
    this.name = 'UnsupportedTransportError';
  }
}

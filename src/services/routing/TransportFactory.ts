/**
 * Factory for creating route negotiation transports
 */

import type { RouteTransport, TransportConfig } from '../../types/routing.types';
import { UnsupportedTransportError } from '../errors';
import { InProcessTransport, type RouteResponder } from './InProcessTransport';
import { MqttTransport } from './MqttTransport';
import { WebSocketTransport } from './WebSocketTransport';

export class TransportFactory {
  static create(config: TransportConfig, responder?: RouteResponder): RouteTransport {
    switch (config.type) {
      case 'websocket':
        return new WebSocketTransport(config);

      case 'mqtt':
        return new MqttTransport(config);

      case 'in_process':
        return new InProcessTransport(config, responder);

      default:
        throw new UnsupportedTransportError(String(config.type));
    }
  }
}

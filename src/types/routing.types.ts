/**
 * Route negotiation wire types.
 * The service uses a z-up convention: wire y = simulation z, wire z = simulation y.
 */

export interface WireVec3 {
  x: number;
  y: number;
  z: number;
}

export interface RouteRequestMessage {
  type: 'request_route';
  drone_id: string;
  model: string;
  start_position: WireVec3;
  end_position: WireVec3;
  battery_percentage: number;
  max_speed: number;
  max_range: number;
}

export interface WireWaypoint {
  x: number;
  y: number;
  z: number;
  altitude?: number;
  speed?: number;
  description?: string;
}

export type RouteResponseStatus = 'success' | 'error' | 'no_path';

export interface RouteResponseMessage {
  type?: 'route_response';
  drone_id: string;
  status?: RouteResponseStatus;
  message?: string;
  route?: WireWaypoint[];
}

// ============================================================================
// Transport
// ============================================================================

export type TransportState = 'disconnected' | 'connecting' | 'connected';

export type TransportType = 'websocket' | 'mqtt' | 'in_process';

export interface TransportConfig {
  type: TransportType;

  /** ws://host:port for websocket, mqtt://host:port for mqtt */
  url: string;

  /** Fixed interval between reconnect attempts */
  reconnectIntervalMs: number;

  /** MQTT credentials, ignored by the other transports */
  username?: string;
  password?: string;
  clientId?: string;
}

export type InboundHandler = (message: unknown) => void;
export type StateHandler = (state: TransportState) => void;

export interface RouteTransport {
  connect(): void;
  close(): Promise<void>;
  send(message: RouteRequestMessage): Promise<void>;
  onMessage(handler: InboundHandler): () => void;
  onStateChange(handler: StateHandler): () => void;
  getState(): TransportState;
  isConnected(): boolean;
}

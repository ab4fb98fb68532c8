/**
 * RouteProtocol.ts
 *
 * Message protocol for the external routing service.
 *
 * PROTOCOL FORMAT:
 * Request (client → service), one JSON text frame:
 * {
 *   "type": "request_route",
 *   "drone_id": "FP-001",
 *   "model": "Light Quadcopter",
 *   "start_position": {"x": .., "y": .., "z": ..},
 *   "end_position": {"x": .., "y": .., "z": ..},
 *   "battery_percentage": 100,
 *   "max_speed": 15,
 *   "max_range": 20000
 * }
 *
 * Response (service → client):
 * {
 *   "type": "route_response",
 *   "drone_id": "FP-001",
 *   "status": "success" | "error" | "no_path",
 *   "message": "...",                  // only on failure
 *   "route": [{"x", "y", "z", "altitude", "speed", "description"}, ...]
 * }
 *
 * COORDINATE SYSTEMS:
 * - Simulation: y is up
 * - Service request: z is up, so y and z are swapped on the way out
 * - Service response: waypoints already come back in simulation axes and are
 *   adopted as-is
 *
 * Unknown frames are echoed by the service as plain text ("Echo: ..."); those
 * fail JSON parsing and are ignored.
 */

import type { Route, Vec3, Waypoint } from '../types/fleet.types';
import type { RouteRequestMessage, RouteResponseMessage, WireVec3 } from '../types/routing.types';

export const DEFAULT_SERVER_ALTITUDE = 10.0;
export const DEFAULT_SERVER_SPEED_RATIO = 0.8;
export const DEFAULT_SERVER_DESCRIPTION = 'Server waypoint';

export interface RouteRequestParams {
  droneId: string;
  model: string;
  start: Vec3;
  end: Vec3;
  batteryPercentage: number;
  maxSpeed: number;
  maxRange: number;
}

export type ParsedRoute =
  | { ok: true; route: Route }
  | { ok: false; reason: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Static utility class for route protocol messages.
 * All methods are stateless; no instance required.
 */
export class RouteProtocolService {
  /**
   * Simulation (y-up) → service (z-up)
   */
  static toWire(position: Vec3): WireVec3 {
    return { x: position.x, y: position.z, z: position.y };
  }

  static createRouteRequest(params: RouteRequestParams): RouteRequestMessage {
    return {
      type: 'request_route',
      drone_id: params.droneId,
      model: params.model,
      start_position: RouteProtocolService.toWire(params.start),
      end_position: RouteProtocolService.toWire(params.end),
      battery_percentage: params.batteryPercentage,
      max_speed: params.maxSpeed,
      max_range: params.maxRange,
    };
  }

  /**
   * Parse one inbound text frame. Returns null for non-JSON frames.
   */
  static parseFrame(data: string): unknown {
    try {
      return JSON.parse(data);
    } catch {
      return null;
    }
  }

  /**
   * Any object carrying a string drone_id can be correlated; payload
   * validation happens later in parseRouteResponse.
   */
  static isRouteResponse(message: unknown): message is RouteResponseMessage {
    return isRecord(message) && typeof message.drone_id === 'string';
  }

  /**
   * Validate a response and convert it into a route for a drone with the given
   * max speed. Missing altitude/speed/description get defaults; speeds are
   * clamped to maxSpeed.
   */
  static parseRouteResponse(message: RouteResponseMessage, maxSpeed: number): ParsedRoute {
    if (message.status === 'error' || message.status === 'no_path') {
      return { ok: false, reason: `${message.status}: ${message.message ?? 'no message'}` };
    }

    const raw: unknown = message.route;
    if (!Array.isArray(raw)) {
      return { ok: false, reason: 'response has no route array' };
    }
    if (raw.length === 0) {
      return { ok: false, reason: 'response route is empty' };
    }

    const route: Route = [];
    for (let i = 0; i < raw.length; i++) {
      const waypoint = RouteProtocolService.parseWaypoint(raw[i], maxSpeed);
      if (!waypoint) {
        return { ok: false, reason: `waypoint ${i} is malformed` };
      }
      route.push(waypoint);
    }
    return { ok: true, route };
  }

  private static parseWaypoint(value: unknown, maxSpeed: number): Waypoint | null {
    if (!isRecord(value)) {
      return null;
    }
    const { x, y, z, altitude, speed, description } = value;
    if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) {
      return null;
    }

    const targetSpeed = isFiniteNumber(speed) && speed > 0
      ? speed
      : maxSpeed * DEFAULT_SERVER_SPEED_RATIO;

    return {
      position: { x, y, z },
      altitude: isFiniteNumber(altitude) ? altitude : DEFAULT_SERVER_ALTITUDE,
      speed: Math.min(targetSpeed, maxSpeed),
      description: typeof description === 'string' ? description : DEFAULT_SERVER_DESCRIPTION,
    };
  }
}

/**
 * RouteBuilder.ts
 *
 * Pure route construction used when no server route is available, and for the
 * mirrored return leg.
 *
 * DEFAULT ROUTE (origin → destination):
 * 1. Takeoff: straight up above origin to cruise altitude, 60% max speed
 * 2. Cruise: only when the ground distance exceeds 5 km. One waypoint per full
 *    10 km (at least one), evenly spaced at full max speed
 * 3. Approach: above destination at cruise altitude, 70% max speed
 * 4. Landing: destination at its own altitude, 40% max speed
 *
 * RETURN ROUTE:
 * Outbound waypoints walked in reverse. Each waypoint's progress p is its ground
 * distance from origin over the origin→destination ground distance; the return
 * waypoint sits at 1 - p along destination→origin. Height, altitude and speed
 * are copied unchanged.
 */

import type { PerformanceProfile, Route, Vec3, Waypoint } from '../types/fleet.types';
import { horizontalDistance, lerp3 } from './CoordinateService';

export const CRUISE_THRESHOLD_M = 5000;
export const CRUISE_SPACING_M = 10000;

export function buildDefaultRoute(
  origin: Vec3,
  destination: Vec3,
  profile: Pick<PerformanceProfile, 'maxSpeed' | 'cruiseAltitude'>
): Route {
  const { maxSpeed, cruiseAltitude } = profile;
  const route: Route = [];

  route.push({
    position: { x: origin.x, y: cruiseAltitude, z: origin.z },
    altitude: cruiseAltitude,
    speed: maxSpeed * 0.6,
    description: 'Takeoff',
  });

  const distance = horizontalDistance(origin, destination);
  if (distance > CRUISE_THRESHOLD_M) {
    const count = Math.max(1, Math.floor(distance / CRUISE_SPACING_M));
    for (let i = 1; i <= count; i++) {
      const ground = lerp3(origin, destination, i / (count + 1));
      route.push({
        position: { x: ground.x, y: cruiseAltitude, z: ground.z },
        altitude: cruiseAltitude,
        speed: maxSpeed,
        description: `Cruise ${i}`,
      });
    }
  }

  route.push({
    position: { x: destination.x, y: cruiseAltitude, z: destination.z },
    altitude: cruiseAltitude,
    speed: maxSpeed * 0.7,
    description: 'Approach',
  });

  route.push({
    position: { ...destination },
    altitude: destination.y,
    speed: maxSpeed * 0.4,
    description: 'Landing',
  });

  return route;
}

/**
 * Fractional progress of a position along origin → destination, on the ground plane
 */
export function outboundProgress(position: Vec3, origin: Vec3, destination: Vec3): number {
  const total = horizontalDistance(origin, destination);
  if (total === 0) {
    return 0;
  }
  return horizontalDistance(origin, position) / total;
}

export function buildReturnRoute(outbound: readonly Waypoint[], origin: Vec3, destination: Vec3): Route {
  const route: Route = [];
  for (let i = outbound.length - 1; i >= 0; i--) {
    const waypoint = outbound[i];
    const p = outboundProgress(waypoint.position, origin, destination);
    const ground = lerp3(destination, origin, 1 - p);
    route.push({
      position: { x: ground.x, y: waypoint.position.y, z: ground.z },
      altitude: waypoint.altitude,
      speed: waypoint.speed,
      description: `Return: ${waypoint.description}`,
    });
  }
  return route;
}

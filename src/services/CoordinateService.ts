/**
 * Coordinate Conversion Service
 *
 * Converts flight-plan geographic coordinates (WGS84 decimal degrees) into
 * simulation world metres and back.
 *
 * Coordinate Systems:
 * - Geo: latitude/longitude in decimal degrees
 * - World: metres from the reference point, x = north (latitude),
 *   z = east (longitude), y = altitude
 *
 * Conversion Math:
 * Equirectangular, 1 degree = 111,320 metres on both axes. Longitude is not
 * scaled by cos(latitude) so that world positions land on the same plane the
 * routing service builds its airspace graph on.
 */

import type { GeoPoint, Vec3 } from '../types/fleet.types';

/**
 * Reference point defining the world origin
 */
export interface ReferencePoint {
  latitude: number;
  longitude: number;
}

export const DEFAULT_REFERENCE: ReferencePoint = {
  latitude: 40.55417343,
  longitude: -73.99583928,
};

export class CoordinateService {
  private readonly reference: ReferencePoint;

  static readonly METERS_PER_DEGREE = 111320;

  constructor(reference: ReferencePoint = DEFAULT_REFERENCE) {
    this.reference = { ...reference };
  }

  /**
   * Project a geographic point to world metres
   *
   * @param altitude - height above ground, becomes world y
   */
  geoToWorld(point: GeoPoint, altitude: number = 0): Vec3 {
    return {
      x: (point.latitude - this.reference.latitude) * CoordinateService.METERS_PER_DEGREE,
      y: altitude,
      z: (point.longitude - this.reference.longitude) * CoordinateService.METERS_PER_DEGREE,
    };
  }

  /**
   * Inverse of geoToWorld (altitude is dropped)
   */
  worldToGeo(position: Vec3): GeoPoint {
    return {
      latitude: this.reference.latitude + position.x / CoordinateService.METERS_PER_DEGREE,
      longitude: this.reference.longitude + position.z / CoordinateService.METERS_PER_DEGREE,
    };
  }

  static isValidGeo(point: GeoPoint): boolean {
    return (
      Number.isFinite(point.latitude) &&
      Number.isFinite(point.longitude) &&
      point.latitude >= -90 &&
      point.latitude <= 90 &&
      point.longitude >= -180 &&
      point.longitude <= 180
    );
  }
}

// ============================================================================
// Vector helpers
// ============================================================================

export function distance3(a: Vec3, b: Vec3): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const dz = b.z - a.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

/**
 * Distance on the ground plane (ignores y)
 */
export function horizontalDistance(a: Vec3, b: Vec3): number {
  const dx = b.x - a.x;
  const dz = b.z - a.z;
  return Math.sqrt(dx * dx + dz * dz);
}

export function lerp3(from: Vec3, to: Vec3, t: number): Vec3 {
  return {
    x: from.x + (to.x - from.x) * t,
    y: from.y + (to.y - from.y) * t,
    z: from.z + (to.z - from.z) * t,
  };
}

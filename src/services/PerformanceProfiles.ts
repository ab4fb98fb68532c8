/**
 * PerformanceProfiles.ts
 *
 * Fixed table of drone models and their physical constants. Unknown model tags
 * resolve to DEFAULT_MODEL through one lookup, never recursively.
 */

import type { PerformanceProfile } from '../types/fleet.types';

export const DRONE_MODELS = ['Light Quadcopter', 'Heavy Hexacopter', 'Fixed Wing VTOL'] as const;

export type DroneModel = (typeof DRONE_MODELS)[number];

export const DEFAULT_MODEL: DroneModel = 'Light Quadcopter';

const PROFILES: Readonly<Record<DroneModel, Readonly<PerformanceProfile>>> = Object.freeze({
  'Light Quadcopter': Object.freeze({
    maxSpeed: 15,
    maxRange: 20000,
    batteryCapacity: 250,
    powerConsumption: 200,
    payloadCapacity: 2,
    cruiseAltitude: 60,
  }),
  'Heavy Hexacopter': Object.freeze({
    maxSpeed: 12,
    maxRange: 15000,
    batteryCapacity: 800,
    powerConsumption: 900,
    payloadCapacity: 10,
    cruiseAltitude: 80,
  }),
  'Fixed Wing VTOL': Object.freeze({
    maxSpeed: 30,
    maxRange: 60000,
    batteryCapacity: 1200,
    powerConsumption: 600,
    payloadCapacity: 5,
    cruiseAltitude: 120,
  }),
});

export function isKnownModel(model: string): model is DroneModel {
  return DRONE_MODELS.some(m => m === model);
}

/**
 * Resolve a model tag to its profile, warning once per call on unknown tags.
 */
export function getPerformanceProfile(model: string): Readonly<PerformanceProfile> {
  if (isKnownModel(model)) {
    return PROFILES[model];
  }
  console.warn(`[PerformanceProfiles] Unknown model "${model}", using "${DEFAULT_MODEL}"`);
  return PROFILES[DEFAULT_MODEL];
}

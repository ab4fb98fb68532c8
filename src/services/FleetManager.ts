/**
 * FleetManager.ts
 *
 * Registry owning every live drone.
 *
 * DRONE LIFECYCLE:
 * 1. create(): the scheduler spawns a drone for a due flight plan
 * 2. updateAll(): every live drone advances once, in registration order, then
 *    the collision detector (if wired) runs over a snapshot of all of them
 * 3. evictCompleted(): completed drones are removed after the full pass, never
 *    while iterating
 *
 * Consumers only ever get snapshots; Drone instances do not leave the registry
 * except through get() for inspection.
 */

import type { CollisionEvent, DroneSnapshot, FlightPlan, PerformanceProfile, Vec3 } from '../types/fleet.types';
import type { CollisionDetector } from './CollisionDetector';
import { Drone } from './Drone';
import type { RouteNegotiationClient } from './routing/RouteNegotiationClient';

export interface FleetManagerOptions {
  routeClient?: RouteNegotiationClient | null;
  collisionDetector?: CollisionDetector | null;
  collisionRadius?: number;
  negotiationTimeout?: number;
}

export interface DroneOverrides {
  profile?: PerformanceProfile;
  collisionRadius?: number;
}

export class FleetManager {
  private drones: Map<string, Drone> = new Map();
  private options: FleetManagerOptions;

  constructor(options: FleetManagerOptions = {}) {
    this.options = options;
  }

  /**
   * Instantiate a drone for a plan. The plan id becomes the drone id, with a
   * numeric suffix if that id is already live.
   */
  create(plan: FlightPlan, origin: Vec3, destination: Vec3, overrides: DroneOverrides = {}): string {
    const id = this.uniqueId(plan.id);
    const drone = new Drone({
      id,
      model: plan.model,
      origin,
      destination,
      routeClient: this.options.routeClient ?? null,
      profile: overrides.profile,
      collisionRadius: overrides.collisionRadius ?? this.options.collisionRadius,
      negotiationTimeout: this.options.negotiationTimeout,
    });

    this.drones.set(id, drone);
    console.log(`[FleetManager] Spawned ${id} (${plan.model}) from ${plan.departurePort}`);
    return id;
  }

  /**
   * Advance every live drone, then run the collision pass.
   * Returns the collision transitions of this pass.
   */
  updateAll(delta: number, simTime: number = 0): CollisionEvent[] {
    for (const drone of this.drones.values()) {
      drone.update(delta);
    }

    const detector = this.options.collisionDetector;
    if (!detector) {
      return [];
    }

    const pass = detector.detect(this.snapshot(), simTime);
    for (const drone of this.drones.values()) {
      if (drone.isCompleted()) {
        continue;
      }
      drone.applyCollisionState(pass.partners.get(drone.id) ?? new Set());
    }
    return pass.events;
  }

  /**
   * Remove every completed drone. Returns their final snapshots.
   */
  evictCompleted(): DroneSnapshot[] {
    const evicted: DroneSnapshot[] = [];
    for (const drone of this.drones.values()) {
      if (drone.isCompleted()) {
        evicted.push(drone.getSnapshot());
      }
    }

    for (const snapshot of evicted) {
      this.drones.delete(snapshot.id);
      this.options.collisionDetector?.forget(snapshot.id);
      console.log(`[FleetManager] Evicted ${snapshot.id} (${snapshot.completionReason})`);
    }
    return evicted;
  }

  snapshot(): readonly DroneSnapshot[] {
    return Object.freeze([...this.drones.values()].map(d => d.getSnapshot()));
  }

  get(id: string): Drone | undefined {
    return this.drones.get(id);
  }

  ids(): string[] {
    return [...this.drones.keys()];
  }

  get size(): number {
    return this.drones.size;
  }

  private uniqueId(base: string): string {
    if (!this.drones.has(base)) {
      return base;
    }
    let n = 2;
    while (this.drones.has(`${base}-${n}`)) {
      n++;
    }
    return `${base}-${n}`;
  }
}

/**
 * SimulationScheduler.ts
 *
 * Logical clock driving the whole fleet.
 *
 * ONE TICK (while running):
 * 1. simTime += fixedStep * speedMultiplier, realTime += wallDelta
 * 2. Spawn every plan that is due and not yet spawned
 * 3. FleetManager.updateAll(): drone updates, then the collision pass
 * 4. Snapshot the fleet, then evict completed drones
 * 5. Notify: visualization feed (unless headless), logger sink on its
 *    interval, completion listeners for each evicted drone
 *
 * Completed drones appear in the snapshot of the tick they finished in and
 * are gone from the next one.
 *
 * Configuration is read from the simulation store at every tick, so pause,
 * speed and headless changes take effect on the next tick.
 */

import type { CollisionEvent, DroneSnapshot } from '../types/fleet.types';
import type { FleetStore } from '../stores/fleetStore';
import type { SimulationStore } from '../stores/simulationStore';
import { CoordinateService } from './CoordinateService';
import type { FleetLogger } from './FleetLogger';
import type { FleetManager } from './FleetManager';
import type { FlightPlanTable } from './FlightPlanTable';

const LOG_EPSILON = 1e-9;

export interface SchedulerDeps {
  fleet: FleetManager;
  plans: FlightPlanTable;
  config: SimulationStore;
  projector?: CoordinateService;
  logger?: FleetLogger | null;
  feed?: FleetStore | null;
}

export interface TickResult {
  simTime: number;
  delta: number;
  spawned: string[];
  events: CollisionEvent[];
  snapshot: readonly DroneSnapshot[];
  evicted: DroneSnapshot[];
}

export type CompletionListener = (snapshot: DroneSnapshot, simTime: number) => void;

export class SimulationScheduler {
  private fleet: FleetManager;
  private plans: FlightPlanTable;
  private config: SimulationStore;
  private projector: CoordinateService;
  private logger: FleetLogger | null;
  private feed: FleetStore | null;
  private completionListeners: CompletionListener[] = [];

  private simTime: number = 0;
  private realTime: number = 0;
  private lastLogTime: number = 0;
  private tickCount: number = 0;

  constructor(deps: SchedulerDeps) {
    this.fleet = deps.fleet;
    this.plans = deps.plans;
    this.config = deps.config;
    this.projector = deps.projector ?? new CoordinateService();
    this.logger = deps.logger ?? null;
    this.feed = deps.feed ?? null;
  }

  /**
   * Advance one logical tick. Returns null while paused.
   */
  tick(wallDelta: number): TickResult | null {
    const config = this.config.getState();
    if (!config.running) {
      return null;
    }

    const delta = config.fixedStep * config.speedMultiplier;
    this.simTime += delta;
    this.realTime += wallDelta;
    this.tickCount++;

    const spawned = this.spawnDuePlans();
    const events = this.fleet.updateAll(delta, this.simTime);
    const snapshot = this.fleet.snapshot();
    const evicted = this.fleet.evictCompleted();

    if (!config.headless && this.feed) {
      this.feed.getState().publish(this.simTime, snapshot, events);
    }
    this.maybeLog(config.logIntervalSeconds, snapshot);
    for (const final of evicted) {
      this.notifyCompletion(final);
    }

    return { simTime: this.simTime, delta, spawned, events, snapshot, evicted };
  }

  onDroneCompleted(listener: CompletionListener): () => void {
    this.completionListeners.push(listener);
    return () => {
      this.completionListeners = this.completionListeners.filter(l => l !== listener);
    };
  }

  getSimTime(): number {
    return this.simTime;
  }

  getRealTime(): number {
    return this.realTime;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  getPendingPlanCount(): number {
    return this.plans.getPendingCount();
  }

  /**
   * True once every plan has spawned and every drone has been evicted
   */
  isFinished(): boolean {
    return this.plans.getPendingCount() === 0 && this.fleet.size === 0;
  }

  private spawnDuePlans(): string[] {
    const spawned: string[] = [];
    for (const plan of this.plans.dueForSpawn(this.simTime)) {
      this.plans.markSpawned(plan);
      const origin = this.projector.geoToWorld(plan.origin);
      const destination = this.projector.geoToWorld(plan.destination);
      spawned.push(this.fleet.create(plan, origin, destination));
    }
    return spawned;
  }

  private maybeLog(interval: number, snapshot: readonly DroneSnapshot[]): void {
    if (!this.logger || this.simTime - this.lastLogTime + LOG_EPSILON < interval) {
      return;
    }
    this.lastLogTime = this.simTime;
    try {
      this.logger.log(this.simTime, snapshot);
    } catch (error) {
      console.error('[Scheduler] Error in logger sink:', error);
    }
  }

  private notifyCompletion(snapshot: DroneSnapshot): void {
    if (!this.config.getState().headless && this.feed) {
      this.feed.getState().recordCompletion(snapshot);
    }
    for (const listener of this.completionListeners) {
      try {
        listener(snapshot, this.simTime);
      } catch (error) {
        console.error('[Scheduler] Error in completion listener:', error);
      }
    }
  }
}

/**
 * Drone.ts
 *
 * One vehicle's flight and route negotiation state machine.
 *
 * NEGOTIATION:
 * awaiting_route → route_finalized, either when a correlated response arrives
 * or when the negotiation times out (10 simulated seconds after the request,
 * by default). The drone holds still while awaiting. Responses and failures
 * arrive asynchronously and are buffered; they take effect at the start of the next
 * update() so a tick in progress is never interrupted.
 *
 * JOURNEY:
 * outbound → returning → completed. Exhausting the outbound route builds the
 * mirrored return route; exhausting that completes the mission. Battery
 * depletion and range overrun complete the drone wherever it is.
 *
 * PER-TICK UPDATE:
 * 1. Move straight toward the current waypoint at its speed, never past it
 * 2. Accumulate distance, drain battery
 * 3. Check battery/range completion
 * 4. Within 5 m of the waypoint → next waypoint (or route exhaustion)
 */

import type {
  CompletionReason,
  DroneSnapshot,
  JourneyPhase,
  NegotiationPhase,
  PerformanceProfile,
  Route,
  RouteSource,
  Vec3,
  Waypoint,
  WaypointSummary,
} from '../types/fleet.types';
import type { RouteResponseMessage } from '../types/routing.types';
import { distance3, lerp3 } from './CoordinateService';
import { getPerformanceProfile } from './PerformanceProfiles';
import { RouteProtocolService } from './RouteProtocol';
import { buildDefaultRoute, buildReturnRoute } from './RouteBuilder';
import type { RouteNegotiationClient, RouteRequestHandle } from './routing/RouteNegotiationClient';

export const ARRIVAL_THRESHOLD_M = 5;
export const DEFAULT_COLLISION_RADIUS_M = 15;
export const DEFAULT_NEGOTIATION_TIMEOUT_S = 10;

export interface DroneOptions {
  id: string;
  model: string;
  origin: Vec3;
  destination: Vec3;
  /** Without a client the drone falls back to the default route on its first update */
  routeClient?: RouteNegotiationClient | null;
  /** Overrides the model's table entry */
  profile?: PerformanceProfile;
  collisionRadius?: number;
  negotiationTimeout?: number;
}

type NegotiationOutcome =
  | { kind: 'response'; message: RouteResponseMessage }
  | { kind: 'failure'; reason: string };

export class Drone {
  readonly id: string;
  readonly model: string;
  readonly profile: Readonly<PerformanceProfile>;
  readonly origin: Vec3;
  readonly destination: Vec3;
  readonly collisionRadius: number;

  private position: Vec3;
  private currentSpeed: number = 0;
  private route: Route = [];
  private currentWaypointIndex: number = 0;
  private journeyPhase: JourneyPhase = 'outbound';
  private negotiationPhase: NegotiationPhase = 'awaiting_route';
  private remainingBattery: number;
  private distanceTraveled: number = 0;
  private flightTime: number = 0;
  private collisionPartners: Set<string> = new Set();
  private completionReason: CompletionReason | null = null;
  private routeSource: RouteSource | null = null;

  private negotiationTimeout: number;
  private negotiationElapsed: number = 0;
  private negotiationStarted: boolean = false;
  private routeRequest: RouteRequestHandle | null = null;
  private outcome: NegotiationOutcome | null = null;

  constructor(options: DroneOptions) {
    this.id = options.id;
    this.model = options.model;
    this.profile = options.profile ?? getPerformanceProfile(options.model);
    this.origin = { ...options.origin };
    this.destination = { ...options.destination };
    this.position = { ...options.origin };
    this.collisionRadius = options.collisionRadius ?? DEFAULT_COLLISION_RADIUS_M;
    this.negotiationTimeout = options.negotiationTimeout ?? DEFAULT_NEGOTIATION_TIMEOUT_S;
    this.remainingBattery = this.profile.batteryCapacity;

    this.requestRoute(options.routeClient ?? null);
  }

  // ==========================================================================
  // Negotiation
  // ==========================================================================

  private requestRoute(client: RouteNegotiationClient | null): void {
    if (!client) {
      this.outcome = { kind: 'failure', reason: 'no route client' };
      return;
    }

    const handle = client.requestRoute({
      droneId: this.id,
      model: this.model,
      start: this.origin,
      end: this.destination,
      batteryPercentage: this.getBatteryPercentage(),
      maxSpeed: this.profile.maxSpeed,
      maxRange: this.profile.maxRange,
    });
    this.routeRequest = handle;

    void handle.response.then(
      (message) => {
        if (this.negotiationPhase === 'awaiting_route') {
          this.outcome = { kind: 'response', message };
        }
      },
      (error: unknown) => {
        if (this.negotiationPhase === 'awaiting_route') {
          const reason = error instanceof Error ? error.message : String(error);
          this.outcome = { kind: 'failure', reason };
        }
      }
    );
  }

  /**
   * Apply whatever the negotiation produced since the last update.
   * Returns true once the route is finalized.
   *
   * The request goes out in the tick that spawns the drone, after the clock
   * has already advanced, so the first update counts no elapsed time.
   */
  private resolveNegotiation(delta: number): boolean {
    if (this.negotiationStarted) {
      this.negotiationElapsed += delta;
    } else {
      this.negotiationStarted = true;
    }

    const outcome = this.outcome;
    this.outcome = null;

    if (outcome?.kind === 'response') {
      const parsed = RouteProtocolService.parseRouteResponse(outcome.message, this.profile.maxSpeed);
      if (parsed.ok) {
        this.finalizeRoute(parsed.route, 'server');
      } else {
        this.fallback(parsed.reason);
      }
      return true;
    }

    if (outcome?.kind === 'failure') {
      this.fallback(outcome.reason);
      return true;
    }

    if (this.negotiationElapsed >= this.negotiationTimeout) {
      this.routeRequest?.cancel('negotiation timed out');
      this.fallback(`no response after ${this.negotiationTimeout}s`);
      return true;
    }

    return false;
  }

  private fallback(reason: string): void {
    console.warn(`[Drone ${this.id}] Using default route: ${reason}`);
    this.finalizeRoute(buildDefaultRoute(this.origin, this.destination, this.profile), 'fallback');
  }

  private finalizeRoute(route: Route, source: RouteSource): void {
    this.route = route;
    this.routeSource = source;
    this.currentWaypointIndex = 0;
    this.negotiationPhase = 'route_finalized';
    this.routeRequest = null;

    if (route.length === 0) {
      this.complete('empty_route');
      return;
    }
    console.log(`[Drone ${this.id}] Route finalized (${source}, ${route.length} waypoints)`);
  }

  // ==========================================================================
  // Flight
  // ==========================================================================

  update(delta: number): void {
    if (this.journeyPhase === 'completed') {
      return;
    }
    if (this.negotiationPhase === 'awaiting_route') {
      if (!this.resolveNegotiation(delta) || this.isCompleted()) {
        return;
      }
    }

    this.flightTime += delta;

    const target = this.route[this.currentWaypointIndex];
    this.moveToward(target, delta);
    this.drainBattery(delta);

    if (this.remainingBattery <= 0) {
      this.complete('battery_depleted');
      return;
    }
    if (this.distanceTraveled > this.profile.maxRange) {
      this.complete('range_exceeded');
      return;
    }

    if (distance3(this.position, target.position) < ARRIVAL_THRESHOLD_M) {
      this.advanceWaypoint();
    }
  }

  private moveToward(target: Waypoint, delta: number): void {
    const speed = Math.min(target.speed, this.profile.maxSpeed);
    const maxStep = Math.max(0, speed * delta);
    const remaining = distance3(this.position, target.position);

    if (remaining <= maxStep) {
      this.position = { ...target.position };
      this.currentSpeed = 0;
      this.distanceTraveled += remaining;
      return;
    }

    this.position = lerp3(this.position, target.position, maxStep / remaining);
    this.currentSpeed = speed;
    this.distanceTraveled += maxStep;
  }

  private drainBattery(delta: number): void {
    const maxSpeed = this.profile.maxSpeed;
    const speedRatio = maxSpeed > 0 ? this.currentSpeed / maxSpeed : 0;
    const drain = this.profile.powerConsumption * (1 + 0.5 * speedRatio) * (delta / 3600);
    this.remainingBattery = Math.max(0, this.remainingBattery - drain);
  }

  private advanceWaypoint(): void {
    this.currentWaypointIndex++;
    if (this.currentWaypointIndex < this.route.length) {
      return;
    }

    if (this.journeyPhase === 'outbound') {
      this.route = buildReturnRoute(this.route, this.origin, this.destination);
      this.currentWaypointIndex = 0;
      this.journeyPhase = 'returning';
      console.log(`[Drone ${this.id}] Reached destination, returning (${this.route.length} waypoints)`);
      return;
    }

    this.complete('route_complete');
  }

  private complete(reason: CompletionReason): void {
    this.journeyPhase = 'completed';
    this.completionReason = reason;
    this.currentSpeed = 0;
    // completed drones leave the collision pass, so they hold no partners
    this.collisionPartners = new Set();
    console.log(
      `[Drone ${this.id}] Completed: ${reason} after ${this.flightTime.toFixed(1)}s, ` +
      `${this.distanceTraveled.toFixed(0)}m, battery ${this.getBatteryPercentage().toFixed(1)}%`
    );
  }

  // ==========================================================================
  // Collision state (written by the fleet manager after each detection pass)
  // ==========================================================================

  applyCollisionState(partners: ReadonlySet<string>): void {
    this.collisionPartners = new Set(partners);
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  isCompleted(): boolean {
    return this.journeyPhase === 'completed';
  }

  isColliding(): boolean {
    return this.collisionPartners.size > 0;
  }

  getPosition(): Vec3 {
    return { ...this.position };
  }

  getJourneyPhase(): JourneyPhase {
    return this.journeyPhase;
  }

  getNegotiationPhase(): NegotiationPhase {
    return this.negotiationPhase;
  }

  getCompletionReason(): CompletionReason | null {
    return this.completionReason;
  }

  getRouteSource(): RouteSource | null {
    return this.routeSource;
  }

  getRemainingBattery(): number {
    return this.remainingBattery;
  }

  getBatteryPercentage(): number {
    return (this.remainingBattery / this.profile.batteryCapacity) * 100;
  }

  getDistanceTraveled(): number {
    return this.distanceTraveled;
  }

  getFlightTime(): number {
    return this.flightTime;
  }

  getCurrentWaypointIndex(): number {
    return this.currentWaypointIndex;
  }

  getCollisionPartners(): string[] {
    return [...this.collisionPartners].sort();
  }

  getCurrentWaypointSummary(): WaypointSummary | null {
    const waypoint = this.route[this.currentWaypointIndex];
    if (!waypoint || this.isCompleted()) {
      return null;
    }
    return {
      index: this.currentWaypointIndex,
      total: this.route.length,
      description: waypoint.description,
      position: { ...waypoint.position },
      distance: distance3(this.position, waypoint.position),
    };
  }

  /**
   * Copy of the active route (the return route once returning)
   */
  getRouteSummary(): Waypoint[] {
    return this.route.map(w => ({ ...w, position: { ...w.position } }));
  }

  getSnapshot(): DroneSnapshot {
    return Object.freeze({
      id: this.id,
      model: this.model,
      position: this.getPosition(),
      currentSpeed: this.currentSpeed,
      journeyPhase: this.journeyPhase,
      negotiationPhase: this.negotiationPhase,
      currentWaypointIndex: this.currentWaypointIndex,
      routeLength: this.route.length,
      remainingBattery: this.remainingBattery,
      batteryPercentage: this.getBatteryPercentage(),
      distanceTraveled: this.distanceTraveled,
      flightTime: this.flightTime,
      collisionRadius: this.collisionRadius,
      isColliding: this.isColliding(),
      collisionPartners: this.getCollisionPartners(),
      completionReason: this.completionReason,
      routeSource: this.routeSource,
    });
  }
}

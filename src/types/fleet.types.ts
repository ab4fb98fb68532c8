/**
 * Core data models for the drone fleet simulation.
 * Positions use the simulation convention: y is up, x/z form the ground plane.
 */

// ============================================================================
// Coordinate System
// ============================================================================

/**
 * Position in metres (simulation world space, y = vertical)
 */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Geographic point in WGS84 decimal degrees
 */
export interface GeoPoint {
  latitude: number;
  longitude: number;
}

// ============================================================================
// Flight Plans
// ============================================================================

/**
 * Scheduled mission loaded once at startup.
 * Only `spawned` ever changes during a run.
 */
export interface FlightPlan {
  /** Unique plan identifier, reused as the drone id when free */
  id: string;

  /** Departure port tag (informational) */
  departurePort: string;

  /** Scheduled departure, simulation seconds (ETD) */
  departureTime: number;

  origin: GeoPoint;
  destination: GeoPoint;

  /** Model tag resolved against the performance profile table */
  model: string;

  /** Set once when the drone is spawned */
  spawned: boolean;
}

// ============================================================================
// Performance
// ============================================================================

export interface PerformanceProfile {
  /** Maximum horizontal/vertical speed in m/s */
  maxSpeed: number;

  /** Maximum distance in metres before the mission is aborted */
  maxRange: number;

  /** Battery capacity in watt-hours */
  batteryCapacity: number;

  /** Power draw at hover in watts */
  powerConsumption: number;

  /** Payload capacity in kilograms */
  payloadCapacity: number;

  /** Altitude used for synthesized cruise waypoints, metres */
  cruiseAltitude: number;
}

// ============================================================================
// Routes
// ============================================================================

export interface Waypoint {
  position: Vec3;
  altitude: number;
  /** Target speed in m/s, never above the flying drone's maxSpeed */
  speed: number;
  description: string;
}

export type Route = Waypoint[];

// ============================================================================
// Drone State
// ============================================================================

export type JourneyPhase =
  | 'outbound'    // Flying origin → destination
  | 'returning'   // Flying the mirrored route back
  | 'completed';  // Terminal, no further mutation

export type NegotiationPhase =
  | 'awaiting_route'    // Request issued, not moving
  | 'route_finalized';  // Server route adopted or fallback synthesized

export type CompletionReason =
  | 'route_complete'
  | 'battery_depleted'
  | 'range_exceeded'
  | 'empty_route';

export type RouteSource = 'server' | 'fallback';

export interface WaypointSummary {
  index: number;
  total: number;
  description: string;
  position: Vec3;
  distance: number;
}

/**
 * Read-only view of one drone, handed to the collision detector,
 * logger sink and visualization feed.
 */
export interface DroneSnapshot {
  id: string;
  model: string;
  position: Vec3;
  currentSpeed: number;
  journeyPhase: JourneyPhase;
  negotiationPhase: NegotiationPhase;
  currentWaypointIndex: number;
  routeLength: number;
  remainingBattery: number;
  batteryPercentage: number;
  distanceTraveled: number;
  flightTime: number;
  collisionRadius: number;
  isColliding: boolean;
  collisionPartners: string[];
  completionReason: CompletionReason | null;
  routeSource: RouteSource | null;
}

// ============================================================================
// Collision Events
// ============================================================================

export interface CollisionEvent {
  kind: 'enter' | 'exit';
  droneId: string;
  /** Partners at the time of the event (empty on exit) */
  partners: string[];
  simTime: number;
  position: Vec3;
}

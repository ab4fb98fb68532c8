/**
 * Public exports
 */

export { FleetSimulation } from './services/FleetSimulation';
export type { FleetSimulationOptions } from './services/FleetSimulation';
export { SimulationScheduler } from './services/SimulationScheduler';
export type { TickResult, CompletionListener, SchedulerDeps } from './services/SimulationScheduler';
export { FleetManager } from './services/FleetManager';
export type { FleetManagerOptions, DroneOverrides } from './services/FleetManager';
export { Drone, ARRIVAL_THRESHOLD_M, DEFAULT_COLLISION_RADIUS_M, DEFAULT_NEGOTIATION_TIMEOUT_S } from './services/Drone';
export type { DroneOptions } from './services/Drone';
export { CollisionDetector } from './services/CollisionDetector';
export type { CollisionListener, CollisionPass, CollisionSubject } from './services/CollisionDetector';
export { FlightPlanTable, FLIGHT_PLAN_COLUMNS } from './services/FlightPlanTable';
export type { FlightPlanRow } from './services/FlightPlanTable';
export { CoordinateService, DEFAULT_REFERENCE, distance3, horizontalDistance, lerp3 } from './services/CoordinateService';
export { buildDefaultRoute, buildReturnRoute, outboundProgress } from './services/RouteBuilder';
export { RouteProtocolService } from './services/RouteProtocol';
export type { RouteRequestParams, ParsedRoute } from './services/RouteProtocol';
export { DRONE_MODELS, DEFAULT_MODEL, getPerformanceProfile, isKnownModel } from './services/PerformanceProfiles';
export type { DroneModel } from './services/PerformanceProfiles';
export { ConsoleFleetLogger, MeanDistanceLogger, meanPairwiseDistance } from './services/FleetLogger';
export type { FleetLogger } from './services/FleetLogger';
export { NotConnectedError, RouteRequestCancelledError, UnsupportedTransportError } from './services/errors';

export { RouteNegotiationClient } from './services/routing/RouteNegotiationClient';
export type { RouteRequestHandle } from './services/routing/RouteNegotiationClient';
export { BaseTransport } from './services/routing/BaseTransport';
export { WebSocketTransport } from './services/routing/WebSocketTransport';
export { MqttTransport } from './services/routing/MqttTransport';
export { InProcessTransport, silentResponder } from './services/routing/InProcessTransport';
export type { RouteResponder } from './services/routing/InProcessTransport';
export { TransportFactory } from './services/routing/TransportFactory';
export { RouteTopics } from './services/routing/topics';

export { createSimulationStore, configFromEnv, DEFAULT_CONFIG } from './stores/simulationStore';
export type { SimulationConfig, SimulationState, SimulationStore } from './stores/simulationStore';
export { createFleetStore } from './stores/fleetStore';
export type { FleetStore } from './stores/fleetStore';

export type * from './types/fleet.types';
export type * from './types/routing.types';

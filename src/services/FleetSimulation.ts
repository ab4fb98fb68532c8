/**
 * FleetSimulation.ts
 *
 * Wires one run together: config store, route transport and client, collision
 * detector, fleet manager, scheduler, visualization feed and logger sink.
 *
 * USAGE:
 * const sim = new FleetSimulation({ rows, config: configFromEnv() });
 * sim.start();                 // connects, then ticks every fixedStep of wall time
 * sim.config.getState().setSpeedMultiplier(4);
 * await sim.stop();
 *
 * step() can also be called directly to drive the clock by hand.
 */

import { createFleetStore, type FleetStore } from '../stores/fleetStore';
import { createSimulationStore, type SimulationConfig, type SimulationStore } from '../stores/simulationStore';
import { CollisionDetector } from './CollisionDetector';
import { CoordinateService } from './CoordinateService';
import { ConsoleFleetLogger, type FleetLogger } from './FleetLogger';
import { FleetManager } from './FleetManager';
import { FlightPlanTable, type FlightPlanRow } from './FlightPlanTable';
import type { RouteResponder } from './routing/InProcessTransport';
import { RouteNegotiationClient } from './routing/RouteNegotiationClient';
import { TransportFactory } from './routing/TransportFactory';
import { SimulationScheduler, type TickResult } from './SimulationScheduler';

export interface FleetSimulationOptions {
  rows?: readonly FlightPlanRow[];
  plans?: FlightPlanTable;
  config?: Partial<SimulationConfig>;
  /** Answers requests when the transport type is in_process */
  responder?: RouteResponder;
  /** Defaults to ConsoleFleetLogger; null disables periodic logging */
  logger?: FleetLogger | null;
  projector?: CoordinateService;
  /** Stop the wall-clock loop once every plan has flown */
  stopWhenFinished?: boolean;
}

export class FleetSimulation {
  readonly config: SimulationStore;
  readonly feed: FleetStore;
  readonly detector: CollisionDetector;
  readonly fleet: FleetManager;
  readonly client: RouteNegotiationClient;
  readonly scheduler: SimulationScheduler;
  readonly plans: FlightPlanTable;

  private loop: ReturnType<typeof setInterval> | null = null;
  private lastWall: number = 0;
  private stopWhenFinished: boolean;

  constructor(options: FleetSimulationOptions = {}) {
    this.config = createSimulationStore(options.config);
    this.feed = createFleetStore();
    this.detector = new CollisionDetector();
    this.plans = options.plans ?? FlightPlanTable.fromRows(options.rows ?? []);
    this.stopWhenFinished = options.stopWhenFinished ?? false;

    const settings = this.config.getState();
    const transport = TransportFactory.create(settings.transport, options.responder);
    this.client = new RouteNegotiationClient(transport);

    this.fleet = new FleetManager({
      routeClient: this.client,
      collisionDetector: this.detector,
      collisionRadius: settings.collisionRadius,
      negotiationTimeout: settings.negotiationTimeoutSeconds,
    });

    this.scheduler = new SimulationScheduler({
      fleet: this.fleet,
      plans: this.plans,
      config: this.config,
      projector: options.projector ?? new CoordinateService(),
      logger: options.logger === undefined ? new ConsoleFleetLogger() : options.logger,
      feed: this.feed,
    });
  }

  /**
   * Connect to the routing service and start the wall-clock loop
   */
  start(): void {
    if (this.loop) {
      return;
    }
    this.client.connect();
    this.config.getState().start();
    this.lastWall = performance.now();

    const intervalMs = Math.max(1, this.config.getState().fixedStep * 1000);
    this.loop = setInterval(() => {
      this.step();
    }, intervalMs);
    console.log(`[FleetSimulation] Started with ${this.plans.size} flight plans`);
  }

  /**
   * Advance one tick using the wall time elapsed since the previous step
   */
  step(): TickResult | null {
    const now = performance.now();
    const wallDelta = (now - this.lastWall) / 1000;
    this.lastWall = now;

    const result = this.scheduler.tick(wallDelta);
    if (this.stopWhenFinished && this.loop && this.scheduler.isFinished()) {
      console.log(`[FleetSimulation] All flight plans finished at t=${this.scheduler.getSimTime().toFixed(1)}s`);
      this.stop().catch((error: unknown) => {
        console.error('[FleetSimulation] Failed to stop:', error);
      });
    }
    return result;
  }

  async stop(): Promise<void> {
    if (this.loop) {
      clearInterval(this.loop);
      this.loop = null;
    }
    this.config.getState().pause();
    await this.client.close();
    console.log('[FleetSimulation] Stopped');
  }
}

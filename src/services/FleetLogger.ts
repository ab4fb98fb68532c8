/**
 * FleetLogger.ts
 *
 * Logger sinks called by the scheduler every logIntervalSeconds of simulated
 * time. Writing log files is left to whoever implements FleetLogger; the
 * console variants here cover interactive runs.
 */

import type { DroneSnapshot } from '../types/fleet.types';
import { distance3 } from './CoordinateService';

export interface FleetLogger {
  log(simTime: number, drones: readonly DroneSnapshot[]): void;
}

/**
 * One line per drone: phase, position, battery, distance, conflicts
 */
export class ConsoleFleetLogger implements FleetLogger {
  log(simTime: number, drones: readonly DroneSnapshot[]): void {
    console.log(`[FleetLog] t=${simTime.toFixed(1)}s, ${drones.length} drones`);
    for (const drone of drones) {
      console.log(ConsoleFleetLogger.formatDrone(drone));
    }
  }

  static formatDrone(drone: DroneSnapshot): string {
    const { x, y, z } = drone.position;
    const conflicts = drone.isColliding ? ` conflict=[${drone.collisionPartners.join(',')}]` : '';
    return (
      `[FleetLog]   ${drone.id} ${drone.model} ${drone.journeyPhase}` +
      ` wp=${drone.currentWaypointIndex}/${drone.routeLength}` +
      ` pos=(${x.toFixed(1)}, ${y.toFixed(1)}, ${z.toFixed(1)})` +
      ` battery=${drone.batteryPercentage.toFixed(1)}%` +
      ` dist=${drone.distanceTraveled.toFixed(0)}m${conflicts}`
    );
  }
}

/**
 * Mean centre distance over all pairs of non-completed drones; null with
 * fewer than two
 */
export function meanPairwiseDistance(drones: readonly DroneSnapshot[]): number | null {
  const active = drones.filter(d => d.journeyPhase !== 'completed');
  if (active.length < 2) {
    return null;
  }

  let total = 0;
  let pairs = 0;
  for (let i = 0; i < active.length; i++) {
    for (let j = i + 1; j < active.length; j++) {
      total += distance3(active[i].position, active[j].position);
      pairs++;
    }
  }
  return total / pairs;
}

/**
 * Fleet-wide separation only, one line per interval
 */
export class MeanDistanceLogger implements FleetLogger {
  log(simTime: number, drones: readonly DroneSnapshot[]): void {
    const mean = meanPairwiseDistance(drones);
    const text = mean === null ? 'n/a' : `${mean.toFixed(1)}m`;
    console.log(`[FleetLog] t=${simTime.toFixed(1)}s mean pairwise distance ${text}`);
  }
}

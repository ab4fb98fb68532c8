/**
 * FlightPlanTable.ts
 *
 * Holds the flight plans for one run and answers "which plans are due".
 * Rows arrive already split into cells; reading the file is the caller's job.
 *
 * ROW LAYOUT:
 * plan_id, departure_port, (unused), departure_time_seconds,
 * origin_lat, origin_lon, dest_lat, dest_lon, model
 *
 * SPAWN GUARD:
 * A plan is due when it has not spawned and simTime >= departureTime. The
 * spawned flag is only ever set, so each plan spawns exactly once even if the
 * clock steps over its departure time.
 */

import type { FlightPlan } from '../types/fleet.types';
import { CoordinateService } from './CoordinateService';

export type FlightPlanRow = readonly string[];

export const FLIGHT_PLAN_COLUMNS = 9;

function parseNumber(cell: string): number | null {
  const trimmed = cell.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export class FlightPlanTable {
  private plans: FlightPlan[];

  constructor(plans: FlightPlan[] = []) {
    this.plans = plans;
  }

  /**
   * Build a table from split rows, skipping malformed ones with a warning
   */
  static fromRows(rows: readonly FlightPlanRow[]): FlightPlanTable {
    const plans: FlightPlan[] = [];
    rows.forEach((row, index) => {
      const plan = FlightPlanTable.parseRow(row);
      if (plan) {
        plans.push(plan);
      } else {
        console.warn(`[FlightPlanTable] Skipping row ${index}: ${row.join(',')}`);
      }
    });
    console.log(`[FlightPlanTable] Loaded ${plans.length} of ${rows.length} flight plans`);
    return new FlightPlanTable(plans);
  }

  static parseRow(row: FlightPlanRow): FlightPlan | null {
    if (row.length !== FLIGHT_PLAN_COLUMNS) {
      return null;
    }

    const [id, port, , departure, originLat, originLon, destLat, destLon, model] = row;
    const departureTime = parseNumber(departure);
    const oLat = parseNumber(originLat);
    const oLon = parseNumber(originLon);
    const dLat = parseNumber(destLat);
    const dLon = parseNumber(destLon);

    if (departureTime === null || oLat === null || oLon === null || dLat === null || dLon === null) {
      return null;
    }
    if (id.trim().length === 0) {
      return null;
    }

    const origin = { latitude: oLat, longitude: oLon };
    const destination = { latitude: dLat, longitude: dLon };
    if (!CoordinateService.isValidGeo(origin) || !CoordinateService.isValidGeo(destination)) {
      return null;
    }

    return {
      id: id.trim(),
      departurePort: port.trim(),
      departureTime,
      origin,
      destination,
      model: model.trim(),
      spawned: false,
    };
  }

  getPlans(): readonly FlightPlan[] {
    return this.plans;
  }

  dueForSpawn(simTime: number): FlightPlan[] {
    return this.plans.filter(p => !p.spawned && simTime >= p.departureTime);
  }

  markSpawned(plan: FlightPlan): void {
    plan.spawned = true;
  }

  getPendingCount(): number {
    return this.plans.filter(p => !p.spawned).length;
  }

  get size(): number {
    return this.plans.length;
  }
}

import { afterEach, describe, expect, it, vi } from 'vitest';
import type { DroneSnapshot, Vec3 } from '../types/fleet.types';
import { ConsoleFleetLogger, MeanDistanceLogger, meanPairwiseDistance } from './FleetLogger';

function snapshot(id: string, position: Vec3, overrides: Partial<DroneSnapshot> = {}): DroneSnapshot {
  return {
    id,
    model: 'Light Quadcopter',
    position,
    currentSpeed: 15,
    journeyPhase: 'outbound',
    negotiationPhase: 'route_finalized',
    currentWaypointIndex: 1,
    routeLength: 4,
    remainingBattery: 218.75,
    batteryPercentage: 87.5,
    distanceTraveled: 1234.4,
    flightTime: 90,
    collisionRadius: 15,
    isColliding: false,
    collisionPartners: [],
    completionReason: null,
    routeSource: 'fallback',
    ...overrides,
  };
}

describe('meanPairwiseDistance', () => {
  it('averages the distance over every pair', () => {
    expect(meanPairwiseDistance([
      snapshot('A', { x: 0, y: 0, z: 0 }),
      snapshot('B', { x: 6, y: 0, z: 0 }),
      snapshot('C', { x: 0, y: 0, z: 8 }),
    ])).toBe(8);
  });

  it('ignores completed drones and needs two active ones', () => {
    expect(meanPairwiseDistance([
      snapshot('A', { x: 0, y: 0, z: 0 }),
      snapshot('B', { x: 6, y: 0, z: 0 }, { journeyPhase: 'completed' }),
    ])).toBeNull();
    expect(meanPairwiseDistance([])).toBeNull();
  });
});

describe('fleet loggers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats one line per drone', () => {
    const line = ConsoleFleetLogger.formatDrone(
      snapshot('D1', { x: 1, y: 2.2, z: 3 }, { isColliding: true, collisionPartners: ['D2', 'D3'] })
    );
    expect(line).toBe(
      '[FleetLog]   D1 Light Quadcopter outbound wp=1/4 pos=(1.0, 2.2, 3.0) battery=87.5% dist=1234m conflict=[D2,D3]'
    );
  });

  it('writes a header and the drone lines', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new ConsoleFleetLogger().log(10, [snapshot('D1', { x: 0, y: 0, z: 0 })]);

    expect(log).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenNthCalledWith(1, '[FleetLog] t=10.0s, 1 drones');
  });

  it('logs the mean separation', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new MeanDistanceLogger();
    logger.log(20, [snapshot('A', { x: 0, y: 0, z: 0 }), snapshot('B', { x: 0, y: 30, z: 40 })]);
    logger.log(30, []);

    expect(log).toHaveBeenNthCalledWith(1, '[FleetLog] t=20.0s mean pairwise distance 50.0m');
    expect(log).toHaveBeenNthCalledWith(2, '[FleetLog] t=30.0s mean pairwise distance n/a');
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FlightPlan, PerformanceProfile } from '../types/fleet.types';
import { CollisionDetector } from './CollisionDetector';
import { FleetManager } from './FleetManager';

function plan(id: string, model = 'Light Quadcopter'): FlightPlan {
  return {
    id,
    departurePort: 'Pier 6',
    departureTime: 0,
    origin: { latitude: 40.55, longitude: -74 },
    destination: { latitude: 40.56, longitude: -74 },
    model,
    spawned: true,
  };
}

const origin = { x: 0, y: 0, z: 0 };
const destination = { x: 1000, y: 0, z: 0 };

const drained: PerformanceProfile = {
  maxSpeed: 10,
  maxRange: 1000,
  batteryCapacity: 0.001,
  powerConsumption: 3600,
  payloadCapacity: 1,
  cruiseAltitude: 50,
};

describe('FleetManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers drones under unique ids in spawn order', () => {
    const fleet = new FleetManager();
    expect(fleet.create(plan('FP1'), origin, destination)).toBe('FP1');
    expect(fleet.create(plan('FP2'), origin, destination)).toBe('FP2');
    expect(fleet.create(plan('FP1'), origin, destination)).toBe('FP1-2');

    expect(fleet.ids()).toEqual(['FP1', 'FP2', 'FP1-2']);
    expect(fleet.size).toBe(3);
    expect(fleet.get('FP2')?.model).toBe('Light Quadcopter');
  });

  it('applies collision state after every drone has moved', () => {
    const detector = new CollisionDetector();
    const fleet = new FleetManager({ collisionDetector: detector });
    fleet.create(plan('FP1'), origin, destination);
    fleet.create(plan('FP2'), origin, destination);
    fleet.create(plan('FP3'), { x: 500, y: 0, z: 500 }, destination);

    const events = fleet.updateAll(1, 1);

    expect(events.map(e => `${e.kind}:${e.droneId}`)).toEqual(['enter:FP1', 'enter:FP2']);
    expect(fleet.get('FP1')?.getCollisionPartners()).toEqual(['FP2']);
    expect(fleet.get('FP2')?.isColliding()).toBe(true);
    expect(fleet.get('FP3')?.isColliding()).toBe(false);

    const [first] = fleet.snapshot();
    expect(first.collisionPartners).toEqual(['FP2']);
  });

  it('uses the configured collision radius unless overridden', () => {
    const fleet = new FleetManager({ collisionRadius: 40 });
    fleet.create(plan('FP1'), origin, destination);
    fleet.create(plan('FP2'), origin, destination, { collisionRadius: 5 });

    expect(fleet.get('FP1')?.collisionRadius).toBe(40);
    expect(fleet.get('FP2')?.collisionRadius).toBe(5);
  });

  it('evicts completed drones after the pass and returns their final snapshots', () => {
    const detector = new CollisionDetector();
    const fleet = new FleetManager({ collisionDetector: detector });
    fleet.create(plan('FP1'), origin, destination, { profile: drained });
    fleet.create(plan('FP2'), origin, destination);

    fleet.updateAll(1);
    const before = fleet.snapshot();
    const evicted = fleet.evictCompleted();

    expect(before.map(s => s.id)).toEqual(['FP1', 'FP2']);
    expect(evicted).toHaveLength(1);
    expect(evicted[0].id).toBe('FP1');
    expect(evicted[0].journeyPhase).toBe('completed');
    expect(evicted[0].completionReason).toBe('battery_depleted');
    expect(fleet.ids()).toEqual(['FP2']);
    expect(fleet.evictCompleted()).toEqual([]);
  });

  it('clears the conflict on both sides when one partner completes', () => {
    const detector = new CollisionDetector();
    const fleet = new FleetManager({ collisionDetector: detector });
    const weak: PerformanceProfile = { ...drained, batteryCapacity: 2 };
    fleet.create(plan('A'), origin, destination, { profile: weak });
    fleet.create(plan('B'), origin, destination);

    fleet.updateAll(1, 1);
    expect(fleet.get('A')?.getCollisionPartners()).toEqual(['B']);
    expect(fleet.get('B')?.getCollisionPartners()).toEqual(['A']);

    const events = fleet.updateAll(1, 2);

    const state = Object.fromEntries(
      fleet.snapshot().map(s => [s.id, [s.journeyPhase, s.isColliding, s.collisionPartners]])
    );
    expect(state).toEqual({
      A: ['completed', false, []],
      B: ['outbound', false, []],
    });
    expect(events.map(e => `${e.kind}:${e.droneId}`)).toEqual(['exit:A', 'exit:B']);
  });

  it('hands out frozen snapshots', () => {
    const fleet = new FleetManager();
    fleet.create(plan('FP1'), origin, destination);
    const snapshot = fleet.snapshot();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });
});

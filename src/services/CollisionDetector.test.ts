import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CollisionEvent, JourneyPhase, Vec3 } from '../types/fleet.types';
import { CollisionDetector, type CollisionSubject } from './CollisionDetector';

function subject(id: string, position: Vec3, collisionRadius = 15, journeyPhase: JourneyPhase = 'outbound'): CollisionSubject {
  return { id, position, collisionRadius, journeyPhase };
}

describe('CollisionDetector', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('emits exactly one enter and one exit per drone for a close pass', () => {
    const detector = new CollisionDetector();
    const events: CollisionEvent[] = [];
    const collidingAt: Record<string, number[]> = { A: [], B: [] };

    for (let t = 0; t <= 40; t++) {
      const pass = detector.detect([
        subject('A', { x: -100 + 5 * t, y: 50, z: 0 }),
        subject('B', { x: 100 - 5 * t, y: 50, z: 25 }),
      ], t);
      events.push(...pass.events);
      for (const id of ['A', 'B']) {
        if (detector.isColliding(id)) {
          collidingAt[id].push(t);
        }
      }
    }

    expect(collidingAt.A).toEqual([19, 20, 21]);
    expect(collidingAt.B).toEqual([19, 20, 21]);
    expect(events.map(e => `${e.kind}:${e.droneId}@${e.simTime}`)).toEqual([
      'enter:A@19',
      'enter:B@19',
      'exit:A@22',
      'exit:B@22',
    ]);
    expect(events[0].partners).toEqual(['B']);
    expect(events[2].partners).toEqual([]);
  });

  it('keeps partner sets symmetric', () => {
    const detector = new CollisionDetector();
    const { partners } = detector.detect([
      subject('A', { x: 0, y: 0, z: 0 }),
      subject('B', { x: 20, y: 0, z: 0 }),
      subject('C', { x: 45, y: 0, z: 0 }),
    ]);

    expect([...(partners.get('A') ?? [])]).toEqual(['B']);
    expect([...(partners.get('B') ?? [])].sort()).toEqual(['A', 'C']);
    expect([...(partners.get('C') ?? [])]).toEqual(['B']);
    for (const [id, set] of partners) {
      for (const other of set) {
        expect(partners.get(other)?.has(id)).toBe(true);
      }
    }
  });

  it('uses the strict sum of both radii', () => {
    const detector = new CollisionDetector();
    expect(detector.detect([
      subject('A', { x: 0, y: 0, z: 0 }, 5),
      subject('B', { x: 14, y: 0, z: 0 }, 10),
    ]).events).toHaveLength(2);

    const apart = new CollisionDetector();
    expect(apart.detect([
      subject('A', { x: 0, y: 0, z: 0 }, 5),
      subject('B', { x: 15, y: 0, z: 0 }, 10),
    ]).events).toEqual([]);
  });

  it('leaves completed drones out of the pass and closes their conflict once', () => {
    const detector = new CollisionDetector();
    detector.detect([subject('A', { x: 0, y: 0, z: 0 }), subject('B', { x: 1, y: 0, z: 0 })]);
    expect(detector.isColliding('B')).toBe(true);

    const { partners, events } = detector.detect([
      subject('A', { x: 0, y: 0, z: 0 }),
      subject('B', { x: 1, y: 0, z: 0 }, 15, 'completed'),
    ]);

    expect(partners.has('B')).toBe(false);
    expect(detector.isColliding('B')).toBe(false);
    expect(events.map(e => `${e.kind}:${e.droneId}`)).toEqual(['exit:B', 'exit:A']);

    const later = detector.detect([
      subject('A', { x: 0, y: 0, z: 0 }),
      subject('B', { x: 1, y: 0, z: 0 }, 15, 'completed'),
    ]);
    expect(later.events).toEqual([]);
  });

  it('notifies listeners until unsubscribed and survives a throwing one', () => {
    const detector = new CollisionDetector();
    const seen: string[] = [];
    detector.onCollision(() => {
      throw new Error('listener failure');
    });
    const unsubscribe = detector.onCollision((event) => seen.push(`${event.kind}:${event.droneId}`));

    detector.detect([subject('A', { x: 0, y: 0, z: 0 }), subject('B', { x: 1, y: 0, z: 0 })]);
    unsubscribe();
    detector.detect([subject('A', { x: 0, y: 0, z: 0 }), subject('B', { x: 100, y: 0, z: 0 })]);

    expect(seen).toEqual(['enter:A', 'enter:B']);
    expect(console.error).toHaveBeenCalledTimes(4);
  });

  it('forgets evicted drones', () => {
    const detector = new CollisionDetector();
    detector.detect([subject('A', { x: 0, y: 0, z: 0 }), subject('B', { x: 1, y: 0, z: 0 })]);
    detector.forget('A');
    expect(detector.isColliding('A')).toBe(false);
    expect(detector.isColliding('B')).toBe(true);
  });
});

/**
 * CollisionDetector.ts
 *
 * Pairwise proximity check over one snapshot of the fleet per tick.
 * Two drones conflict when their centres are closer than the sum of their
 * collision radii. Detection and event emission only; nothing steers away.
 *
 * KEY CONCEPTS:
 * - Snapshot in, partners out: the detector never keeps drone references, only
 *   each id's colliding flag from the previous pass
 * - Symmetric: if A lists B, B lists A within the same pass
 * - Edge-triggered: 'enter' on the first pass a drone starts colliding,
 *   'exit' on the first pass it stops
 * - Completed drones take no part and lose their tracking; one that was
 *   colliding gets its 'exit' in the pass that first sees it completed
 */

import type { CollisionEvent, DroneSnapshot } from '../types/fleet.types';
import { distance3 } from './CoordinateService';

export type CollisionSubject = Pick<DroneSnapshot, 'id' | 'position' | 'collisionRadius' | 'journeyPhase'>;

export type CollisionListener = (event: CollisionEvent) => void;

export interface CollisionPass {
  /** Partners per active drone id (empty set when clear) */
  partners: Map<string, Set<string>>;
  events: CollisionEvent[];
}

export class CollisionDetector {
  private colliding: Map<string, boolean> = new Map();
  private listeners: CollisionListener[] = [];

  onCollision(listener: CollisionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  detect(subjects: readonly CollisionSubject[], simTime: number = 0): CollisionPass {
    const events: CollisionEvent[] = [];
    const active: CollisionSubject[] = [];
    for (const subject of subjects) {
      if (subject.journeyPhase === 'completed') {
        if (this.colliding.get(subject.id)) {
          events.push(this.exitEvent(subject, simTime));
        }
        this.colliding.delete(subject.id);
      } else {
        active.push(subject);
      }
    }

    const partners = new Map<string, Set<string>>();
    for (const subject of active) {
      partners.set(subject.id, new Set());
    }

    // O(n²) pass, each unordered pair once
    for (let i = 0; i < active.length; i++) {
      const a = active[i];
      for (let j = i + 1; j < active.length; j++) {
        const b = active[j];
        if (distance3(a.position, b.position) < a.collisionRadius + b.collisionRadius) {
          partners.get(a.id)?.add(b.id);
          partners.get(b.id)?.add(a.id);
        }
      }
    }

    for (const subject of active) {
      const current = partners.get(subject.id) ?? new Set<string>();
      const now = current.size > 0;
      const was = this.colliding.get(subject.id) ?? false;

      if (now && !was) {
        events.push({
          kind: 'enter',
          droneId: subject.id,
          partners: [...current].sort(),
          simTime,
          position: { ...subject.position },
        });
      } else if (!now && was) {
        events.push(this.exitEvent(subject, simTime));
      }
      this.colliding.set(subject.id, now);
    }

    for (const event of events) {
      this.emit(event);
    }

    return { partners, events };
  }

  isColliding(droneId: string): boolean {
    return this.colliding.get(droneId) ?? false;
  }

  /**
   * Drop tracking for an evicted drone
   */
  forget(droneId: string): void {
    this.colliding.delete(droneId);
  }

  private exitEvent(subject: CollisionSubject, simTime: number): CollisionEvent {
    return {
      kind: 'exit',
      droneId: subject.id,
      partners: [],
      simTime,
      position: { ...subject.position },
    };
  }

  private emit(event: CollisionEvent): void {
    if (event.kind === 'enter') {
      console.warn(`[Collision] ${event.droneId} in conflict with ${event.partners.join(', ')} at t=${event.simTime.toFixed(1)}s`);
    } else {
      console.log(`[Collision] ${event.droneId} clear at t=${event.simTime.toFixed(1)}s`);
    }

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('[Collision] Error in collision listener:', error);
      }
    }
  }
}

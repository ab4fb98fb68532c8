/**
 * Fleet Store
 * - Visualization feed: the latest fleet snapshot the scheduler published.
 * - Keeps a capped history of collision transitions and finished missions.
 * - Not written while the simulation runs headless.
 */
import { createStore } from 'zustand/vanilla';
import type { CollisionEvent, DroneSnapshot } from '../types/fleet.types';

interface FleetState {
  simTime: number;
  drones: readonly DroneSnapshot[];
  collisionLog: CollisionEvent[];
  completed: DroneSnapshot[];

  publish: (simTime: number, drones: readonly DroneSnapshot[], events: readonly CollisionEvent[]) => void;
  recordCompletion: (snapshot: DroneSnapshot) => void;
  getActiveConflicts: () => DroneSnapshot[];
  reset: () => void;
}

const MAX_COLLISION_LOG = 1000; // cap to avoid memory growth
const MAX_COMPLETED = 1000;

export const createFleetStore = () =>
  createStore<FleetState>()((set, get) => ({
    simTime: 0,
    drones: [],
    collisionLog: [],
    completed: [],

    publish: (simTime, drones, events) => set((state) => ({
      simTime,
      drones,
      collisionLog: events.length > 0
        ? state.collisionLog.concat(events).slice(-MAX_COLLISION_LOG)
        : state.collisionLog,
    })),

    recordCompletion: (snapshot) => set((state) => ({
      completed: state.completed.concat(snapshot).slice(-MAX_COMPLETED),
    })),

    getActiveConflicts: () => get().drones.filter(d => d.isColliding),

    reset: () => set({
      simTime: 0,
      drones: [],
      collisionLog: [],
      completed: [],
    }),
  }));

export type FleetStore = ReturnType<typeof createFleetStore>;

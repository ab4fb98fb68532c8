/**
 * Simulation Store
 * - Holds the run configuration the scheduler reads every tick.
 * - Start/pause/speed/headless are commands on this store, issued by whatever
 *   drives the simulation (controls, CLI, tests).
 */
import { createStore } from 'zustand/vanilla';
import type { TransportConfig, TransportType } from '../types/routing.types';

export interface SimulationConfig {
  fixedStep: number;            // simulated seconds per tick at 1x
  speedMultiplier: number;      // > 0
  running: boolean;
  headless: boolean;            // only gates the visualization feed
  logIntervalSeconds: number;   // logger sink cadence, simulated seconds
  collisionRadius: number;      // metres, per drone
  negotiationTimeoutSeconds: number;
  transport: TransportConfig;
}

export interface SimulationState extends SimulationConfig {
  start: () => void;
  pause: () => void;
  toggleRunning: () => void;
  setSpeedMultiplier: (v: number) => void;
  setFixedStep: (v: number) => void;
  setHeadless: (v: boolean) => void;
  setLogInterval: (v: number) => void;
}

export const DEFAULT_CONFIG: SimulationConfig = {
  fixedStep: 1 / 60,
  speedMultiplier: 1,
  running: false,
  headless: false,
  logIntervalSeconds: 10,
  collisionRadius: 15,
  negotiationTimeoutSeconds: 10,
  transport: {
    type: 'websocket',
    url: 'ws://localhost:8765',
    reconnectIntervalMs: 3000,
  },
};

const MIN_SPEED_MULTIPLIER = 0.01;
const MIN_FIXED_STEP = 1e-4;

export const createSimulationStore = (overrides: Partial<SimulationConfig> = {}) =>
  createStore<SimulationState>()((set) => ({
    ...DEFAULT_CONFIG,
    ...overrides,
    transport: { ...DEFAULT_CONFIG.transport, ...overrides.transport },

    start: () => set({ running: true }),
    pause: () => set({ running: false }),
    toggleRunning: () => set((state) => ({ running: !state.running })),
    setSpeedMultiplier: (v) => set({ speedMultiplier: Math.max(MIN_SPEED_MULTIPLIER, v) }),
    setFixedStep: (v) => set({ fixedStep: Math.max(MIN_FIXED_STEP, v) }),
    setHeadless: (v) => set({ headless: v }),
    setLogInterval: (v) => set({ logIntervalSeconds: Math.max(0, v) }),
  }));

export type SimulationStore = ReturnType<typeof createSimulationStore>;

const TRANSPORT_TYPES: readonly TransportType[] = ['websocket', 'mqtt', 'in_process'];

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`[SimulationStore] Ignoring ${key}=${raw}: expected a positive number`);
    return undefined;
  }
  return value;
}

/**
 * Read FLEET_SIM_* overrides. Unset or invalid variables are left out.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SimulationConfig> {
  const config: Partial<SimulationConfig> = {};

  const fixedStep = readNumber(env, 'FLEET_SIM_FIXED_STEP');
  if (fixedStep !== undefined) config.fixedStep = fixedStep;

  const speed = readNumber(env, 'FLEET_SIM_SPEED');
  if (speed !== undefined) config.speedMultiplier = speed;

  const logInterval = readNumber(env, 'FLEET_SIM_LOG_INTERVAL');
  if (logInterval !== undefined) config.logIntervalSeconds = logInterval;

  if (env.FLEET_SIM_HEADLESS !== undefined) {
    config.headless = env.FLEET_SIM_HEADLESS === '1' || env.FLEET_SIM_HEADLESS.toLowerCase() === 'true';
  }

  const transport: TransportConfig = { ...DEFAULT_CONFIG.transport };
  let transportChanged = false;

  const type = env.FLEET_SIM_TRANSPORT;
  if (type !== undefined) {
    const match = TRANSPORT_TYPES.find(t => t === type);
    if (match) {
      transport.type = match;
      transportChanged = true;
    } else {
      console.warn(`[SimulationStore] Ignoring FLEET_SIM_TRANSPORT=${type}`);
    }
  }
  if (env.FLEET_SIM_ROUTE_URL) {
    transport.url = env.FLEET_SIM_ROUTE_URL;
    transportChanged = true;
  }
  const reconnect = readNumber(env, 'FLEET_SIM_RECONNECT_MS');
  if (reconnect !== undefined) {
    transport.reconnectIntervalMs = reconnect;
    transportChanged = true;
  }
  if (transportChanged) {
    config.transport = transport;
  }

  return config;
}

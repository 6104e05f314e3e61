/**
 * Contract between the climate sync core and the home automation host it runs in.
 *
 * The host owns the zone/device/entity catalogs, the state store, the event bus
 * and the action dispatcher. A real host adapter implements these interfaces;
 * `scripts/fake-host` implements them in memory.
 */

export const UNAVAILABLE_STATES: ReadonlySet<string> = new Set(['unknown', 'unavailable']);

export interface Zone {
  id: string;
  name: string;
  temperatureEntityId?: string;
}

export interface Device {
  id: string;
  name: string | null;
  zoneId: string | null;
  modelId: string | null;
}

export interface Entity {
  entityId: string;
  deviceId: string | null;
  domain: string;
}

export interface EntityState {
  entityId: string;
  state: string;
  attributes?: Record<string, unknown>;
}

export interface StateChangeEvent {
  entityId: string;
  newState: EntityState | undefined;
}

export type Unsubscribe = () => void;

export interface HostInventory {
  listZones(): Zone[];
  getZone(zoneId: string): Zone | undefined;
  listDevices(): Device[];
  listEntities(deviceId: string): Entity[];
}

export interface HostStateStore {
  get(entityId: string): EntityState | undefined;
}

export interface HostEventBus {
  subscribe(entityIds: string[], callback: (event: StateChangeEvent) => void): Unsubscribe;
  onceStarted(callback: () => void): void;
}

export interface ActionCallOptions {
  blocking?: boolean;
}

export type ActionPayload = { entityId: string } & Record<string, unknown>;

export interface HostActionDispatcher {
  call(domain: string, action: string, payload: ActionPayload, options?: ActionCallOptions): Promise<void>;
}

export interface HostClock {
  now(): Date;
  setInterval(callback: () => void, intervalMs: number): Unsubscribe;
}

export type ServiceHandler = () => Promise<void>;

export interface HostServiceRegistry {
  register(domain: string, service: string, handler: ServiceHandler): void;
  remove(domain: string, service: string): void;
}

export interface Host {
  inventory: HostInventory;
  states: HostStateStore;
  bus: HostEventBus;
  actions: HostActionDispatcher;
  clock: HostClock;
  services: HostServiceRegistry;
}

export const systemClock: HostClock = {
  now: () => new Date(),
  setInterval(callback, intervalMs) {
    const handle = setInterval(callback, intervalMs);
    return () => clearInterval(handle);
  },
};

export function isUnavailable(state: EntityState | undefined): boolean {
  if (!state) return true;
  return UNAVAILABLE_STATES.has(state.state);
}

/**
 * Parses a host state string as a temperature. Returns undefined for
 * missing, unavailable or non-numeric states.
 */
export function parseNumericState(state: EntityState | undefined): number | undefined {
  if (!state || isUnavailable(state)) return undefined;
  const text = state.state.trim();
  if (text === '') return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

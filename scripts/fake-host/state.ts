import type {
  ActionCallOptions,
  ActionPayload,
  Device,
  Entity,
  EntityState,
  Host,
  HostActionDispatcher,
  HostClock,
  HostEventBus,
  HostInventory,
  HostServiceRegistry,
  HostStateStore,
  ServiceHandler,
  StateChangeEvent,
  Unsubscribe,
  Zone,
} from '../../lib/host';

export interface RecordedAction {
  domain: string;
  action: string;
  payload: ActionPayload;
  blocking: boolean;
}

interface IntervalTimer {
  id: number;
  callback: () => void;
  intervalMs: number;
  nextAt: number;
}

/**
 * Clock that only moves when told to. `advance` fires due interval callbacks in time order.
 */
export class ManualClock implements HostClock {
  private current: number;
  private nextId = 1;
  private readonly timers = new Map<number, IntervalTimer>();

  constructor(start: Date = new Date('2024-01-15T06:00:00Z')) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  setInterval(callback: () => void, intervalMs: number): Unsubscribe {
    if (!(intervalMs > 0)) throw new Error(`Interval must be positive, got ${intervalMs}`);
    const id = this.nextId;
    this.nextId += 1;
    this.timers.set(id, {
      id, callback, intervalMs, nextAt: this.current + intervalMs,
    });
    return () => {
      this.timers.delete(id);
    };
  }

  advance(ms: number): number {
    const until = this.current + ms;
    let fired = 0;
    for (;;) {
      const next = [...this.timers.values()]
        .filter((timer) => timer.nextAt <= until)
        .sort((a, b) => a.nextAt - b.nextAt || a.id - b.id)[0];
      if (!next) break;
      this.current = next.nextAt;
      next.nextAt += next.intervalMs;
      next.callback();
      fired += 1;
    }
    this.current = until;
    return fired;
  }

  get activeTimers() {
    return this.timers.size;
  }
}

interface BusSubscription {
  entityIds: Set<string>;
  callback: (event: StateChangeEvent) => void;
}

/**
 * In-memory home automation host: catalogs, state store, event bus, action
 * dispatcher and service registry in one object.
 */
export class FakeHost implements Host {
  readonly inventory: HostInventory;
  readonly states: HostStateStore;
  readonly bus: HostEventBus;
  readonly actions: HostActionDispatcher;
  readonly services: HostServiceRegistry;
  readonly clock: HostClock;

  readonly recordedActions: RecordedAction[] = [];

  private readonly zones = new Map<string, Zone>();
  private readonly devices = new Map<string, Device>();
  private readonly entities = new Map<string, Entity>();
  private readonly stateValues = new Map<string, EntityState>();
  private readonly subscriptions = new Set<BusSubscription>();
  private readonly startListeners: Array<() => void> = [];
  private readonly serviceHandlers = new Map<string, ServiceHandler>();
  private readonly actionFailures = new Map<string, Error>();
  private hold: Promise<void> | null = null;
  private started = false;
  private readonly inFlight = new Map<string, number>();
  private readonly maxInFlight = new Map<string, number>();

  constructor(options: { clock?: HostClock } = {}) {
    this.clock = options.clock ?? new ManualClock();

    this.inventory = {
      listZones: () => [...this.zones.values()].map((zone) => ({ ...zone })),
      getZone: (zoneId) => {
        const zone = this.zones.get(zoneId);
        return zone ? { ...zone } : undefined;
      },
      listDevices: () => [...this.devices.values()].map((device) => ({ ...device })),
      listEntities: (deviceId) => [...this.entities.values()]
        .filter((entity) => entity.deviceId === deviceId)
        .map((entity) => ({ ...entity })),
    };

    this.states = {
      get: (entityId) => {
        const state = this.stateValues.get(entityId);
        return state ? { ...state } : undefined;
      },
    };

    this.bus = {
      subscribe: (entityIds, callback) => {
        const subscription: BusSubscription = { entityIds: new Set(entityIds), callback };
        this.subscriptions.add(subscription);
        return () => {
          this.subscriptions.delete(subscription);
        };
      },
      onceStarted: (callback) => {
        if (this.started) {
          callback();
          return;
        }
        this.startListeners.push(callback);
      },
    };

    this.actions = {
      call: (domain, action, payload, opts) => this.dispatch(domain, action, payload, opts),
    };

    this.services = {
      register: (domain, service, handler) => {
        this.serviceHandlers.set(`${domain}.${service}`, handler);
      },
      remove: (domain, service) => {
        this.serviceHandlers.delete(`${domain}.${service}`);
      },
    };
  }

  addZone(zone: Zone) {
    this.zones.set(zone.id, { ...zone });
  }

  setZoneSensor(zoneId: string, temperatureEntityId: string | undefined) {
    const zone = this.zones.get(zoneId);
    if (!zone) throw new Error(`Unknown zone ${zoneId}`);
    const next: Zone = { id: zone.id, name: zone.name };
    if (temperatureEntityId) next.temperatureEntityId = temperatureEntityId;
    this.zones.set(zoneId, next);
  }

  addDevice(device: Device) {
    this.devices.set(device.id, { ...device });
  }

  addEntity(entity: Entity) {
    this.entities.set(entity.entityId, { ...entity });
  }

  removeEntity(entityId: string) {
    this.entities.delete(entityId);
    this.stateValues.delete(entityId);
  }

  /**
   * Stores a state and notifies subscribers synchronously, like a host firing state_changed.
   */
  setState(entityId: string, state: string, attributes?: Record<string, unknown>) {
    const next: EntityState = { entityId, state };
    if (attributes) next.attributes = { ...attributes };
    this.stateValues.set(entityId, next);
    this.emit(entityId, next);
  }

  clearState(entityId: string) {
    this.stateValues.delete(entityId);
    this.emit(entityId, undefined);
  }

  start() {
    if (this.started) return;
    this.started = true;
    const listeners = this.startListeners.splice(0);
    for (const listener of listeners) listener();
  }

  get isStarted() {
    return this.started;
  }

  failActionsFor(entityId: string, error: Error = new Error(`Action rejected for ${entityId}`)) {
    this.actionFailures.set(entityId, error);
  }

  clearActionFailures() {
    this.actionFailures.clear();
  }

  /**
   * Makes every action wait until the returned release function is called.
   */
  holdActions(): () => void {
    let release: () => void = () => {};
    this.hold = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.hold = null;
      release();
    };
  }

  async callService(domain: string, service: string): Promise<void> {
    const handler = this.serviceHandlers.get(`${domain}.${service}`);
    if (!handler) throw new Error(`Service ${domain}.${service} not found`);
    await handler();
  }

  hasService(domain: string, service: string) {
    return this.serviceHandlers.has(`${domain}.${service}`);
  }

  get subscriptionCount() {
    return this.subscriptions.size;
  }

  actionsFor(domain: string, action: string): RecordedAction[] {
    return this.recordedActions.filter((call) => call.domain === domain && call.action === action);
  }

  maxConcurrentActions(entityId: string): number {
    return this.maxInFlight.get(entityId) ?? 0;
  }

  private emit(entityId: string, newState: EntityState | undefined) {
    for (const subscription of [...this.subscriptions]) {
      if (!subscription.entityIds.has(entityId)) continue;
      subscription.callback({ entityId, newState: newState ? { ...newState } : undefined });
    }
  }

  private async dispatch(
    domain: string,
    action: string,
    payload: ActionPayload,
    opts: ActionCallOptions = {},
  ): Promise<void> {
    const { entityId } = payload;
    this.recordedActions.push({
      domain, action, payload: { ...payload }, blocking: opts.blocking ?? false,
    });

    const running = (this.inFlight.get(entityId) ?? 0) + 1;
    this.inFlight.set(entityId, running);
    this.maxInFlight.set(entityId, Math.max(running, this.maxInFlight.get(entityId) ?? 0));
    try {
      if (this.hold) await this.hold;

      const failure = this.actionFailures.get(entityId);
      if (failure) throw failure;
      if (!this.stateValues.has(entityId) && !this.entities.has(entityId)) {
        throw new Error(`Entity ${entityId} not found`);
      }

      const key = `${domain}.${action}`;
      if (key === 'select.select_option') {
        if (typeof payload.option !== 'string') throw new Error('select_option requires an option');
        this.setState(entityId, payload.option);
      } else if (key === 'number.set_value') {
        if (typeof payload.value !== 'number' || !Number.isFinite(payload.value)) {
          throw new Error('set_value requires a numeric value');
        }
        this.setState(entityId, String(payload.value));
      } else {
        throw new Error(`Action ${key} is not supported`);
      }
    } finally {
      this.inFlight.set(entityId, (this.inFlight.get(entityId) ?? 1) - 1);
    }
  }
}

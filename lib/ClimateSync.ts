import { createTrvzbDriver } from '../drivers/trvzb/driver';
import type { ActuatorDriver } from '../drivers/trvzb/driver';
import { discoverActuators } from './climateDiscovery';
import { createContext, snapshotActuator } from './climateModel';
import type { ClimateSyncContext, CoordinatorState, TrackedActuator } from './climateModel';
import { parseConfig } from './config';
import type { ClimateSyncOptions } from './config';
import type { Host } from './host';
import { ListenerManager } from './listenerManager';
import { silentLogger } from './logger';
import type { SyncLogger, TaggedLogger } from './logger';
import { ModeEnforcer } from './modeEnforcer';
import { PeriodicReconciler } from './periodicReconciler';
import type { SweepResult } from './periodicReconciler';
import { SyncEngine } from './syncEngine';

/**
 * Climate sync coordinator.
 *
 * Owns the actuator registry and drives discovery, mode enforcement, the state
 * change subscriptions and the periodic sweep through
 * `unconfigured -> setting_up -> active -> unloaded`.
 */
export class ClimateSync {
  readonly options: ClimateSyncOptions;
  readonly modeEnforcer: ModeEnforcer;
  readonly syncEngine: SyncEngine;
  readonly listeners: ListenerManager;
  readonly reconciler: PeriodicReconciler;

  private logger: SyncLogger = silentLogger;
  private currentState: CoordinatorState = 'unconfigured';
  // Bumped on every setup and unload so a superseded setup stops at its next await.
  private cycle = 0;
  private pendingSetup: Promise<void> | null = null;
  private readonly ctx: ClimateSyncContext;
  private readonly driver: ActuatorDriver;
  private readonly log: TaggedLogger;

  constructor(host: Host, options: ClimateSyncOptions = parseConfig(), driver?: ActuatorDriver) {
    this.options = options;
    this.driver = driver ?? createTrvzbDriver(options.modelId);
    this.ctx = createContext(host, options, () => this.logger);
    this.log = this.ctx.logger('ClimateSync');
    this.modeEnforcer = new ModeEnforcer(this.ctx);
    this.syncEngine = new SyncEngine(this.ctx);
    this.listeners = new ListenerManager(this.ctx, this.modeEnforcer, this.syncEngine);
    this.reconciler = new PeriodicReconciler(this.ctx, this.syncEngine);
  }

  setLogger(logger: SyncLogger) {
    this.logger = logger;
  }

  get state(): CoordinatorState {
    return this.currentState;
  }

  getActuators(): TrackedActuator[] {
    return this.ctx.registry.list().map(snapshotActuator);
  }

  getActuator(actuatorId: string): TrackedActuator | undefined {
    const actuator = this.ctx.registry.get(actuatorId);
    return actuator && snapshotActuator(actuator);
  }

  /**
   * One-shot: a call while setting up returns the setup already in flight, a
   * call while active does nothing.
   */
  async setup(): Promise<void> {
    if (this.currentState === 'active') {
      this.log.debug('Setup already done, skipping');
      return;
    }
    if (this.currentState === 'setting_up' && this.pendingSetup) {
      this.log.debug('Setup already running');
      await this.pendingSetup;
      return;
    }

    this.currentState = 'setting_up';
    this.cycle += 1;
    const running = this.runSetup(this.cycle);
    this.pendingSetup = running;
    try {
      await running;
    } finally {
      if (this.pendingSetup === running) this.pendingSetup = null;
    }
  }

  /**
   * Rediscovers devices, re-applies external mode, rebuilds subscriptions and
   * syncs every device regardless of when it was last synced.
   */
  async refresh(): Promise<SweepResult | null> {
    if (this.currentState !== 'active') {
      this.log.warn(`Refresh ignored while ${this.currentState}`);
      return null;
    }
    const { cycle } = this;

    this.log.info('Manual refresh triggered');
    this.discover();
    await this.modeEnforcer.ensureAll(this.ctx.registry.list());
    if (cycle !== this.cycle) return null;

    this.listeners.teardownAll();
    this.listeners.subscribeAll(this.ctx.registry.list());
    return this.reconciler.sweep({ force: true });
  }

  async unload(): Promise<void> {
    this.cycle += 1;
    this.reconciler.stop();
    this.listeners.teardownAll();
    if (this.currentState !== 'unloaded') {
      this.log.info('Unloaded');
    }
    this.currentState = 'unloaded';
  }

  /**
   * Resolves once no notification, sweep or write is in flight.
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      const pending = [
        ...this.listeners.pending(),
        ...this.reconciler.pending(),
        ...this.ctx.lanes.pending(),
      ];
      if (pending.length === 0) return;
      await Promise.allSettled(pending);
    }
  }

  private async runSetup(cycle: number) {
    try {
      this.discover();
      await this.modeEnforcer.ensureAll(this.ctx.registry.list());
      if (cycle !== this.cycle) return;

      this.listeners.subscribeAll(this.ctx.registry.list());
      this.reconciler.start();
      this.currentState = 'active';
      this.log.info(`Active with ${this.ctx.registry.size} devices`);
    } catch (error) {
      if (cycle === this.cycle) {
        this.listeners.teardownAll();
        this.reconciler.stop();
        this.currentState = 'unconfigured';
      }
      throw error;
    }
  }

  private discover() {
    this.ctx.registry.replace(discoverActuators(this.ctx.host.inventory, this.driver, this.ctx.logger('Discovery')));
  }
}

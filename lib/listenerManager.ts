import type { ClimateSyncContext, TrackedActuator } from './climateModel';
import type { StateChangeEvent, Unsubscribe } from './host';
import type { TaggedLogger } from './logger';
import type { ModeEnforcer } from './modeEnforcer';
import type { SyncEngine } from './syncEngine';

/**
 * State-change handler for one actuator. Looks the actuator up by id on every
 * notification and processes notifications in arrival order.
 */
export class ActuatorListener {
  private queue: Promise<void> = Promise.resolve();
  private inFlight = 0;

  constructor(
    readonly actuatorId: string,
    private readonly ctx: ClimateSyncContext,
    private readonly modeEnforcer: ModeEnforcer,
    private readonly syncEngine: SyncEngine,
    private readonly log: TaggedLogger,
  ) {}

  handle(event: StateChangeEvent): void {
    this.inFlight += 1;
    this.queue = this.queue
      .then(() => this.process(event))
      .catch((error: unknown) => {
        this.log.error(`State change handling failed for ${this.actuatorId}:`, error);
      })
      .finally(() => {
        this.inFlight -= 1;
      });
  }

  get idle(): boolean {
    return this.inFlight === 0;
  }

  settled(): Promise<void> {
    return this.queue;
  }

  private async process(event: StateChangeEvent) {
    const actuator = this.ctx.registry.get(this.actuatorId);
    if (!actuator) return;

    if (
      event.entityId === actuator.modeSelectorEntityId
      && event.newState?.state !== this.ctx.options.externalOption
    ) {
      this.log.debug(`Selector of ${actuator.name} changed to ${event.newState?.state ?? 'nothing'}`);
      await this.modeEnforcer.ensureExternal(actuator);
    }
    await this.syncEngine.syncActuator(actuator);
  }
}

interface Subscription {
  listener: ActuatorListener;
  entityIds: string[];
  unsubscribe: Unsubscribe;
}

export class ListenerManager {
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly log: TaggedLogger;

  constructor(
    private readonly ctx: ClimateSyncContext,
    private readonly modeEnforcer: ModeEnforcer,
    private readonly syncEngine: SyncEngine,
  ) {
    this.log = ctx.logger('ListenerManager');
  }

  /**
   * Entities whose changes should trigger a re-evaluation of the actuator.
   */
  listenTargets(actuator: TrackedActuator): string[] {
    const targets = [actuator.modeSelectorEntityId, actuator.valueWriterEntityId];
    if (actuator.mirrorEntityId) targets.push(actuator.mirrorEntityId);
    const sensor = this.ctx.host.inventory.getZone(actuator.zoneId)?.temperatureEntityId;
    if (sensor) targets.push(sensor);
    return [...new Set(targets)];
  }

  subscribe(actuator: TrackedActuator) {
    this.unsubscribe(actuator.id);

    const listener = new ActuatorListener(actuator.id, this.ctx, this.modeEnforcer, this.syncEngine, this.log);
    const entityIds = this.listenTargets(actuator);
    const unsubscribe = this.ctx.host.bus.subscribe(entityIds, (event) => listener.handle(event));
    this.subscriptions.set(actuator.id, { listener, entityIds, unsubscribe });
    this.log.info(`Listening to ${entityIds.join(', ')} for ${actuator.name}`);
  }

  subscribeAll(actuators: TrackedActuator[]) {
    for (const actuator of actuators) this.subscribe(actuator);
  }

  unsubscribe(actuatorId: string): boolean {
    const subscription = this.subscriptions.get(actuatorId);
    if (!subscription) return false;
    this.subscriptions.delete(actuatorId);
    subscription.unsubscribe();
    return true;
  }

  teardownAll() {
    for (const actuatorId of [...this.subscriptions.keys()]) {
      this.unsubscribe(actuatorId);
    }
  }

  get activeCount() {
    return this.subscriptions.size;
  }

  subscribedEntities(actuatorId: string): string[] {
    return [...(this.subscriptions.get(actuatorId)?.entityIds ?? [])];
  }

  pending(): Promise<void>[] {
    return [...this.subscriptions.values()]
      .filter(({ listener }) => !listener.idle)
      .map(({ listener }) => listener.settled());
  }
}

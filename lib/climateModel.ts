import type { ClimateSyncOptions } from './config';
import type { Host } from './host';
import type { SyncLogger } from './logger';
import { TaggedLogger } from './logger';
import { ActuatorLanes } from './actuatorLanes';

export interface TrackedActuator {
  id: string;
  name: string;
  zoneId: string;
  modeSelectorEntityId: string;
  valueWriterEntityId: string;
  mirrorEntityId?: string;
  lastSync: Date | null;
}

export type CoordinatorState = 'unconfigured' | 'setting_up' | 'active' | 'unloaded';

/**
 * Records a sync time without ever moving lastSync backwards.
 */
export function recordSync(actuator: TrackedActuator, at: Date) {
  if (actuator.lastSync && actuator.lastSync.getTime() >= at.getTime()) return;
  actuator.lastSync = at;
}

/**
 * Copy safe to hand outside the coordinator; changing it does not touch the registry.
 */
export function snapshotActuator(actuator: TrackedActuator): TrackedActuator {
  return {
    ...actuator,
    lastSync: actuator.lastSync ? new Date(actuator.lastSync.getTime()) : null,
  };
}

/**
 * Holder for the discovered actuators. Discovery builds a complete map and
 * swaps it in with `replace`; readers never see a half-built registry.
 */
export class ActuatorRegistry {
  private actuators: ReadonlyMap<string, TrackedActuator> = new Map();

  replace(next: Map<string, TrackedActuator>) {
    this.actuators = next;
  }

  get(actuatorId: string): TrackedActuator | undefined {
    return this.actuators.get(actuatorId);
  }

  list(): TrackedActuator[] {
    return [...this.actuators.values()];
  }

  get size() {
    return this.actuators.size;
  }
}

/**
 * Everything a component needs, owned by the coordinator for the lifetime of one app instance.
 */
export interface ClimateSyncContext {
  host: Host;
  options: ClimateSyncOptions;
  registry: ActuatorRegistry;
  lanes: ActuatorLanes;
  logger: (tag: string) => TaggedLogger;
}

export function createContext(host: Host, options: ClimateSyncOptions, getLogger: () => SyncLogger): ClimateSyncContext {
  return {
    host,
    options,
    registry: new ActuatorRegistry(),
    lanes: new ActuatorLanes(),
    logger: (tag) => new TaggedLogger(getLogger, tag),
  };
}

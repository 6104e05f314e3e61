import type { ClimateSyncContext, TrackedActuator } from './climateModel';
import { recordSync } from './climateModel';
import { ActionInvocationError } from './errors';
import { isUnavailable, parseNumericState } from './host';
import type { TaggedLogger } from './logger';

export const NUMBER_DOMAIN = 'number';
export const SET_VALUE_ACTION = 'set_value';

// Absorbs float error in the difference so a gap of exactly the tolerance still writes.
const TOLERANCE_EPSILON = 1e-9;

export type SyncOutcome =
  | 'written'
  | 'in_tolerance'
  | 'no_sensor'
  | 'sensor_unavailable'
  | 'writer_missing'
  | 'failed';

export class SyncEngine {
  private readonly log: TaggedLogger;

  constructor(private readonly ctx: ClimateSyncContext) {
    this.log = ctx.logger('SyncEngine');
  }

  /**
   * Pushes the zone sensor's temperature into the actuator's external input when it
   * differs by at least the configured tolerance, or when the input has no value.
   * Never rejects.
   */
  syncActuator(actuator: TrackedActuator): Promise<SyncOutcome> {
    return this.ctx.lanes.run(actuator.id, async () => {
      try {
        return await this.syncNow(actuator);
      } catch (error) {
        this.log.error(`Failed to sync temperature for ${actuator.name}:`, error);
        return 'failed';
      }
    });
  }

  async syncActuators(actuators: TrackedActuator[]): Promise<SyncOutcome[]> {
    return Promise.all(actuators.map((actuator) => this.syncActuator(actuator)));
  }

  private async syncNow(actuator: TrackedActuator): Promise<SyncOutcome> {
    const { host, options } = this.ctx;

    const zone = host.inventory.getZone(actuator.zoneId);
    if (!zone?.temperatureEntityId) {
      this.log.debug(`Zone ${actuator.zoneId} of ${actuator.name} has no temperature sensor`);
      return 'no_sensor';
    }

    const sensorState = host.states.get(zone.temperatureEntityId);
    const target = parseNumericState(sensorState);
    if (target === undefined) {
      if (sensorState && !isUnavailable(sensorState)) {
        this.log.warn(`Invalid temperature value '${sensorState.state}' from ${zone.temperatureEntityId}`);
      } else {
        this.log.debug(`Temperature sensor ${zone.temperatureEntityId} has no value, skipping ${actuator.name}`);
      }
      return 'sensor_unavailable';
    }

    const writerState = host.states.get(actuator.valueWriterEntityId);
    if (!writerState) {
      this.log.warn(`Cannot get state for ${actuator.valueWriterEntityId}`);
      return 'writer_missing';
    }

    const current = parseNumericState(writerState);
    if (current === undefined) {
      this.log.info(`Current temperature for ${actuator.name} is ${writerState.state}, will sync to ${target}°C`);
    } else {
      if (Math.abs(current - target) + TOLERANCE_EPSILON < options.tolerance) {
        this.log.debug(`Temperature for ${actuator.name} within tolerance (${current}°C vs ${target}°C), skipping`);
        recordSync(actuator, host.clock.now());
        return 'in_tolerance';
      }
      this.log.info(`Syncing ${actuator.name}: ${current}°C -> ${target}°C`);
    }

    try {
      await host.actions.call(
        NUMBER_DOMAIN,
        SET_VALUE_ACTION,
        { entityId: actuator.valueWriterEntityId, value: target },
        { blocking: true },
      );
    } catch (error) {
      const failure = new ActionInvocationError(NUMBER_DOMAIN, SET_VALUE_ACTION, actuator.valueWriterEntityId, error);
      this.log.error(`Failed to sync temperature for ${actuator.name}:`, failure);
      return 'failed';
    }

    recordSync(actuator, host.clock.now());
    return 'written';
  }
}

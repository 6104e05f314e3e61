import type { ActuatorDriver } from '../drivers/trvzb/driver';
import type { TrackedActuator } from './climateModel';
import type { HostInventory } from './host';
import type { TaggedLogger } from './logger';

/**
 * Scans the host inventory for supported actuators in zones that have a temperature sensor.
 * Returns a fresh map; the caller swaps it into the registry.
 */
export function discoverActuators(
  inventory: HostInventory,
  driver: ActuatorDriver,
  log: TaggedLogger,
): Map<string, TrackedActuator> {
  const found = new Map<string, TrackedActuator>();
  const devices = inventory.listDevices();

  for (const zone of inventory.listZones()) {
    if (!zone.temperatureEntityId) {
      log.debug(`Zone ${zone.name} has no temperature sensor, skipping`);
      continue;
    }
    log.debug(`Processing zone ${zone.name} with temperature sensor ${zone.temperatureEntityId}`);

    for (const device of devices) {
      if (device.zoneId !== zone.id || device.modelId !== driver.modelId) continue;

      const name = device.name || device.id;
      const match = driver.matchEntities(inventory.listEntities(device.id));
      const { modeSelectorEntityId, valueWriterEntityId, mirrorEntityId } = match;
      if (!modeSelectorEntityId || !valueWriterEntityId) {
        log.warn(
          `${driver.modelId} device ${name} missing required entities`
          + ` (select: ${modeSelectorEntityId ?? 'none'}, number: ${valueWriterEntityId ?? 'none'})`,
        );
        continue;
      }

      const actuator: TrackedActuator = {
        id: device.id,
        name,
        zoneId: zone.id,
        modeSelectorEntityId,
        valueWriterEntityId,
        lastSync: null,
      };
      if (mirrorEntityId) actuator.mirrorEntityId = mirrorEntityId;
      found.set(device.id, actuator);

      log.info(
        `Registered ${name} in zone ${zone.name} (select: ${modeSelectorEntityId}, number: ${valueWriterEntityId})`,
      );
    }
  }

  log.info(`Discovered ${found.size} ${driver.modelId} devices`);
  return found;
}

import type { Entity } from '../../lib/host';
import { DEFAULT_MODEL_ID } from '../../lib/config';

export const MODE_SELECTOR_DOMAIN = 'select';
export const MODE_SELECTOR_MARKER = 'temperature_sensor';
export const VALUE_WRITER_DOMAIN = 'number';
export const VALUE_WRITER_MARKER = 'external_temperature_input';
export const MIRROR_DOMAIN = 'climate';

export interface ActuatorEntityMatch {
  modeSelectorEntityId?: string;
  valueWriterEntityId?: string;
  mirrorEntityId?: string;
}

export interface ActuatorDriver {
  modelId: string;
  matchEntities(entities: Entity[]): ActuatorEntityMatch;
}

function firstMatch(entities: Entity[], domain: string, marker?: string): string | undefined {
  return entities.find((entity) => (
    entity.domain === domain && (marker === undefined || entity.entityId.includes(marker))
  ))?.entityId;
}

/**
 * Zigbee thermostatic radiator valve exposed as
 * select.<name>_temperature_sensor_select, number.<name>_external_temperature_input
 * and climate.<name>.
 */
export function createTrvzbDriver(modelId: string = DEFAULT_MODEL_ID): ActuatorDriver {
  return {
    modelId,
    matchEntities(entities) {
      return {
        modeSelectorEntityId: firstMatch(entities, MODE_SELECTOR_DOMAIN, MODE_SELECTOR_MARKER),
        valueWriterEntityId: firstMatch(entities, VALUE_WRITER_DOMAIN, VALUE_WRITER_MARKER),
        mirrorEntityId: firstMatch(entities, MIRROR_DOMAIN),
      };
    },
  };
}

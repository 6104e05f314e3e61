import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import type { FakeHost } from './state';

export const DEFAULT_MANIFEST_PATH = path.resolve(__dirname, '../../fixtures/demo-home.json');

const entitySchema = z.object({
  entityId: z.string().regex(/^[a-z_]+\.[a-z0-9_]+$/, 'must look like <domain>.<object_id>'),
  state: z.string().optional(),
});

const deviceSchema = z.object({
  id: z.string().min(1),
  name: z.string().nullable().default(null),
  zoneId: z.string().nullable().default(null),
  modelId: z.string().nullable().default(null),
  entities: z.array(entitySchema).default([]),
});

const zoneSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  temperatureEntityId: z.string().optional(),
});

export const manifestSchema = z.object({
  zones: z.array(zoneSchema).default([]),
  devices: z.array(deviceSchema).default([]),
  // Entities without a device, such as standalone temperature sensors.
  entities: z.array(entitySchema).default([]),
});

export type FakeHostManifest = z.output<typeof manifestSchema>;

export function domainOf(entityId: string): string {
  const dot = entityId.indexOf('.');
  if (dot <= 0) throw new Error(`Entity id without domain: ${entityId}`);
  return entityId.slice(0, dot);
}

export function parseManifest(input: unknown): FakeHostManifest {
  const result = manifestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new Error(`Invalid fake host manifest: ${issues.join('; ')}`);
  }
  return result.data;
}

export async function readManifestFile(file: string = DEFAULT_MANIFEST_PATH): Promise<FakeHostManifest> {
  const text = await readFile(file, 'utf8');
  return parseManifest(JSON.parse(text));
}

/**
 * Populates the host catalogs and initial states. States are applied last so
 * subscribers see a complete catalog.
 */
export function applyManifest(host: FakeHost, manifest: FakeHostManifest) {
  const initialStates: Array<[string, string]> = [];

  for (const zone of manifest.zones) host.addZone(zone);

  for (const entity of manifest.entities) {
    host.addEntity({ entityId: entity.entityId, deviceId: null, domain: domainOf(entity.entityId) });
    if (entity.state !== undefined) initialStates.push([entity.entityId, entity.state]);
  }

  for (const device of manifest.devices) {
    host.addDevice({
      id: device.id, name: device.name, zoneId: device.zoneId, modelId: device.modelId,
    });
    for (const entity of device.entities) {
      host.addEntity({ entityId: entity.entityId, deviceId: device.id, domain: domainOf(entity.entityId) });
      if (entity.state !== undefined) initialStates.push([entity.entityId, entity.state]);
    }
  }

  for (const [entityId, state] of initialStates) host.setState(entityId, state);
}

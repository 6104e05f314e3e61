import { expect } from 'chai';

import {
  DEFAULT_MANIFEST_PATH, applyManifest, domainOf, parseManifest, readManifestFile,
} from '../scripts/fake-host/manifest';
import { FakeHost } from '../scripts/fake-host/state';

describe('fake host manifest', () => {
  it('fills in defaults for missing sections and fields', () => {
    const manifest = parseManifest({ devices: [{ id: 'trv1' }] });

    expect(manifest).to.deep.equal({
      zones: [],
      entities: [],
      devices: [{
        id: 'trv1', name: null, zoneId: null, modelId: null, entities: [],
      }],
    });
  });

  it('rejects malformed entity ids with their path', () => {
    expect(() => parseManifest({ entities: [{ entityId: 'Not An Entity' }] })).to.throw(
      'Invalid fake host manifest: entities.0.entityId: must look like <domain>.<object_id>',
    );
  });

  it('splits the domain off an entity id', () => {
    expect(domainOf('number.trv1_external_temperature_input')).to.equal('number');
    expect(() => domainOf('nodomain')).to.throw('Entity id without domain: nodomain');
  });

  it('applies catalogs before initial states', () => {
    const host = new FakeHost();
    const seen: Array<[string, number]> = [];
    host.bus.subscribe(['select.trv1_temperature_sensor_select'], (event) => {
      seen.push([event.entityId, host.inventory.listEntities('trv1').length]);
    });

    applyManifest(host, parseManifest({
      zones: [{ id: 'z1', name: 'Zone 1', temperatureEntityId: 'sensor.z1_temperature' }],
      entities: [{ entityId: 'sensor.z1_temperature', state: '20.0' }],
      devices: [{
        id: 'trv1',
        name: 'TRV 1',
        zoneId: 'z1',
        modelId: 'TRVZB',
        entities: [
          { entityId: 'select.trv1_temperature_sensor_select', state: 'internal' },
          { entityId: 'number.trv1_external_temperature_input' },
        ],
      }],
    }));

    expect(seen).to.deep.equal([['select.trv1_temperature_sensor_select', 2]]);
    expect(host.states.get('sensor.z1_temperature')?.state).to.equal('20.0');
    expect(host.states.get('number.trv1_external_temperature_input')).to.equal(undefined);
    expect(host.inventory.listEntities('trv1').map((entity) => entity.domain)).to.deep.equal(['select', 'number']);
  });

  it('loads the demo home', async () => {
    const manifest = await readManifestFile(DEFAULT_MANIFEST_PATH);

    expect(manifest.zones.map((zone) => zone.id)).to.deep.equal(['living_room', 'bedroom', 'hallway']);
    expect(manifest.devices).to.have.length(5);
  });
});

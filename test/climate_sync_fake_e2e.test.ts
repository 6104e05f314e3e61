import { expect } from 'chai';

import { ClimateSyncApp } from '../app';
import { applyManifest, readManifestFile } from '../scripts/fake-host/manifest';
import { FakeHost, ManualClock } from '../scripts/fake-host/state';
import { NOW, makeLogger, messages } from './test_utils';

const INTERVAL_MS = 10 * 60_000;
const WINDOW_WRITER = 'number.living_window_external_temperature_input';
const DOOR_SELECTOR = 'select.living_door_temperature_sensor_select';
const BEDROOM_WRITER = 'number.bedroom_external_temperature_input';

async function startDemoHome() {
  const clock = new ManualClock(NOW);
  const host = new FakeHost({ clock });
  applyManifest(host, await readManifestFile());
  const logger = makeLogger();
  const app = new ClimateSyncApp(host, {}, logger);

  await app.onInit();
  host.start();
  await app.coordinator.setup();
  await app.coordinator.whenIdle();

  const writes = () => host.actionsFor('number', 'set_value').map((call) => call.payload);
  return {
    host, clock, logger, app, writes,
  };
}

describe('climate sync against the demo home', () => {
  it('switches the internal-mode valve during setup and leaves the sensorless zone alone', async () => {
    const { host, app, writes } = await startDemoHome();

    expect(host.actionsFor('select', 'select_option').map((call) => call.payload)).to.deep.equal([
      { entityId: 'select.living_window_temperature_sensor_select', option: 'external' },
    ]);
    expect(host.states.get('select.hallway_temperature_sensor_select')?.state).to.equal('internal');
    expect(app.coordinator.getActuator('trv_hallway')).to.equal(undefined);
    expect(writes()).to.deep.equal([]);
  });

  it('syncs the living room through the refresh service', async () => {
    const { host, app, writes } = await startDemoHome();

    await host.callService('climate_sync', 'refresh');
    await app.coordinator.whenIdle();

    expect(writes()).to.deep.equal([{ entityId: WINDOW_WRITER, value: 21.4 }]);
    expect(host.states.get(WINDOW_WRITER)?.state).to.equal('21.4');
    expect(app.coordinator.getActuator('trv_living_door')?.lastSync).to.deep.equal(NOW);
    expect(app.coordinator.getActuator('trv_bedroom')?.lastSync).to.equal(null);
  });

  it('writes the bedroom reading once its sensor comes back', async () => {
    const { host, app, writes } = await startDemoHome();

    host.setState('sensor.bedroom_temperature', '19.0');
    await app.coordinator.whenIdle();

    expect(writes()).to.deep.equal([{ entityId: BEDROOM_WRITER, value: 19 }]);
  });

  it('puts a valve switched back to internal mode into external mode again', async () => {
    const {
      host, app, logger, writes,
    } = await startDemoHome();

    host.setState(DOOR_SELECTOR, 'internal');
    await app.coordinator.whenIdle();

    expect(host.states.get(DOOR_SELECTOR)?.state).to.equal('external');
    expect(host.actionsFor('select', 'select_option')).to.have.length(2);
    expect(messages(logger.log)).to.include('[ModeEnforcer] Setting Living Room Door TRV to external mode (was: internal)');
    expect(writes()).to.deep.equal([]);
  });

  it('catches up on the interval tick and retries a failed write on the next one', async () => {
    const {
      host, clock, app, logger, writes,
    } = await startDemoHome();
    host.failActionsFor(WINDOW_WRITER, new Error('radio silence'));

    clock.advance(INTERVAL_MS);
    await app.coordinator.whenIdle();

    expect(messages(logger.error)).to.deep.equal(['[SyncEngine] Failed to sync temperature for Living Room Window TRV:']);
    expect(app.coordinator.getActuator('trv_living_window')?.lastSync).to.equal(null);
    expect(app.coordinator.getActuator('trv_living_door')?.lastSync).to.deep.equal(new Date(NOW.getTime() + INTERVAL_MS));

    host.clearActionFailures();
    clock.advance(INTERVAL_MS);
    await app.coordinator.whenIdle();

    expect(writes()).to.deep.equal([
      { entityId: WINDOW_WRITER, value: 21.4 },
      { entityId: WINDOW_WRITER, value: 21.4 },
    ]);
    expect(host.states.get(WINDOW_WRITER)?.state).to.equal('21.4');
  });

  it('releases everything on uninit', async () => {
    const { host, clock, app } = await startDemoHome();

    await app.onUninit();

    expect(host.hasService('climate_sync', 'refresh')).to.equal(false);
    expect(host.subscriptionCount).to.equal(0);
    expect(clock.activeTimers).to.equal(0);
    expect(app.coordinator.state).to.equal('unloaded');
  });
});

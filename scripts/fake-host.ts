import { ClimateSyncApp } from '../app';
import { loadConfigFile, parseConfig } from '../lib/config';
import type { ClimateSyncOptions } from '../lib/config';
import { systemClock } from '../lib/host';
import { createPinoLogger, silentLogger } from '../lib/logger';
import {
  DEFAULT_MANIFEST_PATH, applyManifest, readManifestFile,
} from './fake-host/manifest';
import { FakeHost } from './fake-host/state';

export interface CliOptions {
  manifestPath: string;
  configPath?: string;
  tickMs: number;
  quiet: boolean;
}

export interface RunningFakeHost {
  host: FakeHost;
  app: ClimateSyncApp;
  shutdown: () => Promise<void>;
}

export function parseNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && Number.isFinite(parsed) ? parsed : fallback;
}

export function parseArgs(argv: string[]): CliOptions {
  const args = new Map<string, string>();
  const valueFlags = new Set<string>(['--manifest', '--config', '--tick-ms']);
  for (let index = 0; index < argv.length; index += 1) {
    const part = argv[index];
    if (!part.startsWith('--')) continue;
    const next = argv[index + 1];
    if (valueFlags.has(part)) {
      if (!next || next.startsWith('--')) {
        throw new Error(`Missing value for ${part}`);
      }
      args.set(part, next);
      index += 1;
      continue;
    }
    args.set(part, 'true');
  }

  return {
    manifestPath: args.get('--manifest') ?? DEFAULT_MANIFEST_PATH,
    configPath: args.get('--config'),
    tickMs: parseNumber(args.get('--tick-ms'), 30_000),
    quiet: args.get('--quiet') === 'true',
  };
}

export function printUsage() {
  console.log('Usage: tsx scripts/fake-host.ts [options]');
  console.log('');
  console.log('Options:');
  console.log('  --manifest <file>   Zones, devices and initial states (default fixtures/demo-home.json)');
  console.log('  --config <file>     Climate sync options as JSON');
  console.log('  --tick-ms <ms>      How often simulated sensors drift (default 30000, 0 disables)');
  console.log('  --quiet             Disable logging');
}

/**
 * Nudges every numeric sensor reading by a random step of at most half a degree.
 */
export function driftSensors(host: FakeHost, random: () => number = Math.random) {
  for (const zone of host.inventory.listZones()) {
    if (!zone.temperatureEntityId) continue;
    const current = Number(host.states.get(zone.temperatureEntityId)?.state);
    if (!Number.isFinite(current)) continue;
    const step = Math.round((random() - 0.5) * 10) / 10;
    host.setState(zone.temperatureEntityId, (Math.round((current + step) * 10) / 10).toFixed(1));
  }
}

export async function startFakeHost(options: CliOptions): Promise<RunningFakeHost> {
  const config: ClimateSyncOptions = options.configPath
    ? await loadConfigFile(options.configPath)
    : parseConfig({});
  const manifest = await readManifestFile(options.manifestPath);
  const logger = options.quiet ? silentLogger : createPinoLogger({ level: config.logLevel });

  const host = new FakeHost({ clock: systemClock });
  applyManifest(host, manifest);

  const app = new ClimateSyncApp(host, {
    tolerance: config.tolerance,
    syncIntervalMinutes: config.syncIntervalMinutes,
    modelId: config.modelId,
    externalOption: config.externalOption,
    logLevel: config.logLevel,
  }, logger);
  await app.onInit();
  host.start();

  const cancelDrift = options.tickMs > 0
    ? systemClock.setInterval(() => driftSensors(host), options.tickMs)
    : () => {};

  let stopped = false;
  const shutdown = async () => {
    if (stopped) return;
    stopped = true;
    cancelDrift();
    await app.onUninit();
  };

  return { host, app, shutdown };
}

export async function main(argv = process.argv.slice(2)): Promise<RunningFakeHost | null> {
  if (argv.includes('--help') || argv.includes('-h')) {
    printUsage();
    return null;
  }

  const running = await startFakeHost(parseArgs(argv));
  const stop = () => {
    running.shutdown().catch((error: unknown) => {
      console.error('[FakeHost] Shutdown failed:', error);
    });
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return running;
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('[FakeHost] Fatal startup error:', error);
    process.exitCode = 1;
  });
}

import sourceMapSupport from 'source-map-support';

import { ClimateSync } from './lib/ClimateSync';
import { parseConfig } from './lib/config';
import type { ClimateSyncConfigInput } from './lib/config';
import type { Host } from './lib/host';
import { silentLogger, withLevel } from './lib/logger';
import type { SyncLogger } from './lib/logger';

sourceMapSupport.install();

export const DOMAIN = 'climate_sync';
export const SERVICE_REFRESH = 'refresh';

/**
 * Host lifecycle glue: registers the refresh service and runs coordinator
 * setup once the host has started, and again right away in case it already has.
 */
export class ClimateSyncApp {
  readonly coordinator: ClimateSync;

  private readonly logger: SyncLogger;

  constructor(
    private readonly host: Host,
    config: ClimateSyncConfigInput = {},
    logger: SyncLogger = silentLogger,
  ) {
    const options = parseConfig(config);
    this.logger = withLevel(logger, options.logLevel);
    this.coordinator = new ClimateSync(host, options);
  }

  async onInit() {
    this.logger.log('Climate sync app init');
    this.coordinator.setLogger(this.logger);

    this.host.services.register(DOMAIN, SERVICE_REFRESH, async () => {
      await this.coordinator.refresh();
    });

    this.host.bus.onceStarted(() => this.runSetup());
    this.runSetup();
  }

  async onUninit() {
    await this.coordinator.unload();
    try {
      this.host.services.remove(DOMAIN, SERVICE_REFRESH);
    } catch (error) {
      this.logger.error('Failed to remove refresh service:', error);
    }
  }

  private runSetup() {
    this.coordinator.setup().catch((error: unknown) => {
      this.logger.error('Climate sync setup failed:', error);
    });
  }
}

import type { ClimateSyncContext, TrackedActuator } from './climateModel';
import { ActionInvocationError } from './errors';
import { isUnavailable } from './host';
import type { TaggedLogger } from './logger';

export const SELECT_DOMAIN = 'select';
export const SELECT_OPTION_ACTION = 'select_option';

export type ModeOutcome = 'switched' | 'already_external' | 'unavailable' | 'failed';

export class ModeEnforcer {
  private readonly log: TaggedLogger;

  constructor(private readonly ctx: ClimateSyncContext) {
    this.log = ctx.logger('ModeEnforcer');
  }

  /**
   * Puts the actuator's temperature source selector on the external option.
   * Runs in the actuator's lane so it never interleaves with a sync.
   */
  ensureExternal(actuator: TrackedActuator): Promise<ModeOutcome> {
    return this.ctx.lanes.run(actuator.id, () => this.ensureExternalNow(actuator));
  }

  async ensureAll(actuators: TrackedActuator[]): Promise<ModeOutcome[]> {
    return Promise.all(actuators.map((actuator) => this.ensureExternal(actuator)));
  }

  private async ensureExternalNow(actuator: TrackedActuator): Promise<ModeOutcome> {
    const { externalOption } = this.ctx.options;
    const current = this.ctx.host.states.get(actuator.modeSelectorEntityId);
    if (!current || isUnavailable(current)) {
      this.log.debug(`${actuator.name} selector ${actuator.modeSelectorEntityId} not available yet`);
      return 'unavailable';
    }
    if (current.state === externalOption) {
      this.log.debug(`${actuator.name} already in ${externalOption} mode`);
      return 'already_external';
    }

    this.log.info(`Setting ${actuator.name} to ${externalOption} mode (was: ${current.state})`);
    try {
      await this.ctx.host.actions.call(
        SELECT_DOMAIN,
        SELECT_OPTION_ACTION,
        { entityId: actuator.modeSelectorEntityId, option: externalOption },
        { blocking: true },
      );
    } catch (error) {
      const failure = new ActionInvocationError(SELECT_DOMAIN, SELECT_OPTION_ACTION, actuator.modeSelectorEntityId, error);
      this.log.error(`Failed to set ${externalOption} mode for ${actuator.name}:`, failure);
      return 'failed';
    }
    return 'switched';
  }
}

import type { ClimateSyncContext, TrackedActuator } from './climateModel';
import type { Unsubscribe } from './host';
import type { TaggedLogger } from './logger';
import type { SyncEngine, SyncOutcome } from './syncEngine';

export interface SweepResult {
  synced: number;
  skipped: number;
  outcomes: Map<string, SyncOutcome>;
}

export class PeriodicReconciler {
  private cancelTimer: Unsubscribe | null = null;
  private readonly sweeps = new Set<Promise<SweepResult>>();
  private readonly log: TaggedLogger;

  constructor(private readonly ctx: ClimateSyncContext, private readonly syncEngine: SyncEngine) {
    this.log = ctx.logger('PeriodicReconciler');
  }

  start() {
    if (this.cancelTimer) return;
    this.cancelTimer = this.ctx.host.clock.setInterval(() => this.onTick(), this.ctx.options.syncIntervalMs);
  }

  stop() {
    if (!this.cancelTimer) return;
    this.cancelTimer();
    this.cancelTimer = null;
  }

  get isRunning() {
    return this.cancelTimer !== null;
  }

  isDue(actuator: TrackedActuator, now: Date): boolean {
    if (!actuator.lastSync) return true;
    return now.getTime() - actuator.lastSync.getTime() >= this.ctx.options.syncIntervalMs;
  }

  /**
   * Syncs every actuator that has not been synced within the interval, or all of them with `force`.
   * Without `force`, an actuator whose lane is still busy is left to the work already queued.
   */
  sweep(opts: { force?: boolean } = {}): Promise<SweepResult> {
    const running = this.runSweep(opts.force ?? false);
    this.sweeps.add(running);
    return running.finally(() => {
      this.sweeps.delete(running);
    });
  }

  pending(): Promise<unknown>[] {
    return [...this.sweeps];
  }

  private onTick() {
    this.sweep().catch((error: unknown) => {
      this.log.error('Periodic sweep failed:', error);
    });
  }

  private async runSweep(force: boolean): Promise<SweepResult> {
    const now = this.ctx.host.clock.now();
    const due: TrackedActuator[] = [];
    let skipped = 0;
    for (const actuator of this.ctx.registry.list()) {
      if (!force && this.ctx.lanes.isBusy(actuator.id)) {
        this.log.debug(`${actuator.name} still has work in flight, skipping this tick`);
        skipped += 1;
      } else if (force || this.isDue(actuator, now)) {
        due.push(actuator);
      } else {
        skipped += 1;
      }
    }

    if (due.length > 0) {
      this.log.debug(`${force ? 'Forced' : 'Periodic'} sweep over ${due.length} devices (${skipped} recently synced)`);
    }

    const results = await this.syncEngine.syncActuators(due);
    const outcomes = new Map<string, SyncOutcome>();
    due.forEach((actuator, index) => outcomes.set(actuator.id, results[index]));
    return { synced: due.length, skipped, outcomes };
  }
}

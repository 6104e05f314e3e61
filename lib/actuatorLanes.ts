/**
 * Per-actuator serial execution. Work queued for one actuator id runs strictly
 * after the previous work for that id has settled; different ids never wait on
 * each other.
 */
export class ActuatorLanes {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(actuatorId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(actuatorId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result
      .then(() => undefined, () => undefined)
      .then(() => {
        if (this.tails.get(actuatorId) === tail) this.tails.delete(actuatorId);
      });
    this.tails.set(actuatorId, tail);
    return result;
  }

  isBusy(actuatorId: string) {
    return this.tails.has(actuatorId);
  }

  pending(): Promise<void>[] {
    return [...this.tails.values()];
  }
}

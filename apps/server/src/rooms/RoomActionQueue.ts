/**
 * Serializes work per room key. Each task starts only after every earlier task
 * for the same key has settled; keys are independent of each other.
 */
export class RoomActionQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => task());
    const settled = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, settled);

    return result.finally(() => {
      if (this.tails.get(key) === settled) {
        this.tails.delete(key);
      }
    });
  }
}

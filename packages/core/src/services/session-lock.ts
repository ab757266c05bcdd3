/**
 * Per-session mutual exclusion
 *
 * Each session id gets a promise chain; work for the same id runs one
 * piece at a time, in call order. Different ids never wait on each other.
 */

export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `fn` once every earlier call for the same id has settled
   *
   * @returns Whatever `fn` returns; its rejection is passed through
   */
  run<T>(id: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(id) ?? Promise.resolve();
    const result = previous.then(fn);

    const tail: Promise<void> = result.then(settle, settle).then(() => {
      if (this.tails.get(id) === tail) {
        this.tails.delete(id);
      }
    });
    this.tails.set(id, tail);

    return result;
  }

  /**
   * Checks whether work for the id is queued or running
   */
  isLocked(id: string): boolean {
    return this.tails.has(id);
  }
}

function settle(): void {}

/**
 * Session Queue
 *
 * Serialises work per session: a turn starts only after the previous turn
 * of the same session has been persisted, so turn N+1 always sees turn N
 * in its history. Different sessions run independently.
 */

export class SessionQueue {
  private tails = new Map<string, Promise<unknown>>();

  run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    // A failed turn must not block the next one
    const next = previous.catch(() => undefined).then(task);
    this.tails.set(sessionId, next);

    const cleanup = () => {
      if (this.tails.get(sessionId) === next) this.tails.delete(sessionId);
    };
    void next.then(cleanup, cleanup);
    return next;
  }

  /** Sessions with queued or running work */
  activeSessions(): number {
    return this.tails.size;
  }
}

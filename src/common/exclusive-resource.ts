import { throwIfCancelled, TurnCancelledError } from './errors';

function waitForTurn(turn: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return turn;
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(new TurnCancelledError());
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void turn.then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
  });
}

/**
 * FIFO lease over a resource that admits one holder at a time (a session's
 * turn pipeline, the camera). The lease is released when the task settles,
 * whether it resolved or threw. A waiter whose signal aborts leaves the queue
 * at once with `TurnCancelledError`.
 */
export class ExclusiveResource {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;
  private waiting = 0;

  constructor(readonly name: string) {}

  get busy(): boolean {
    return this.holders > 0 || this.waiting > 0;
  }

  async use<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => released);

    this.waiting++;
    try {
      await waitForTurn(previous, signal);
    } catch (error) {
      // Hand the slot straight to whoever queued behind us.
      release();
      throw error;
    } finally {
      this.waiting--;
    }

    this.holders++;
    try {
      throwIfCancelled(signal);
      return await task();
    } finally {
      this.holders--;
      release();
    }
  }
}

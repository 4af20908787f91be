// src/services/singleFlight.ts
// Keyed in-process de-duplication: concurrent callers for the same key share one piece of work

interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiting: number;
}

export class KeyedSingleFlight<T> {
  private readonly inFlight = new Map<string, Flight<T>>();

  /**
   * Start `work` for `key`, or join the one already running.
   *
   * Each caller waits under its own `signal` and leaves alone when it aborts.
   * The work's signal aborts only once every caller has left, so one short
   * budget never cuts off a caller that still has time.
   */
  run(key: string, work: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) return Promise.reject(signal.reason);

    const flight = this.inFlight.get(key) ?? this.start(key, work);
    return this.join(flight, signal);
  }

  private start(key: string, work: (signal: AbortSignal) => Promise<T>): Flight<T> {
    const controller = new AbortController();
    const promise = work(controller.signal).finally(() => {
      this.inFlight.delete(key);
    });
    const flight: Flight<T> = { promise, controller, waiting: 0 };
    this.inFlight.set(key, flight);
    return flight;
  }

  private join(flight: Flight<T>, signal?: AbortSignal): Promise<T> {
    flight.waiting++;

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        flight.waiting--;
        if (flight.waiting === 0) flight.controller.abort(signal?.reason);
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      flight.promise.then(
        (value) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        }
      );
    });
  }
}

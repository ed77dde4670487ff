export type ReleaseSlot = () => void;

interface Waiter {
  grant(release: ReleaseSlot): void;
}

/** Counting gate: at most `limit` holders at a time, FIFO for the rest. */
export class AdmissionGate {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  public constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Admission limit must be a positive integer, got ${limit}`);
    }
  }

  public get inFlight(): number {
    return this.active;
  }

  public get waiting(): number {
    return this.waiters.length;
  }

  public acquire(signal?: AbortSignal): Promise<ReleaseSlot> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (this.active < this.limit) {
      this.active += 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<ReleaseSlot>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(abortReason(signal));
      };

      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private createRelease(): ReleaseSlot {
    let released = false;

    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // the slot passes straight to the next waiter, so the count stays the same
        next.grant(this.createRelease());
        return;
      }

      this.active -= 1;
    };
  }
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const error = new Error('Admission cancelled');
  error.name = 'AbortError';
  return error;
}

export interface InFlightEntry<TJob extends { id: string }> {
  key: string;
  job: TJob;
  controller: AbortController;
  /** Resolves with null once the owner has stored the job, or with the error that prevented it. */
  ready: Promise<Error | null>;
  /** Resolves once with the terminal job, shared by every waiter. */
  completion: Promise<TJob>;
}

interface Slot<TJob extends { id: string }> {
  entry: InFlightEntry<TJob>;
  resolve: (job: TJob) => void;
  resolveReady: (failure: Error | null) => void;
}

/**
 * Owned map from dedup key to the job currently in flight for that key.
 * `claim` is synchronous, so check-and-insert cannot interleave with another
 * submission.
 */
export class InFlightRegistry<TJob extends { id: string }> {
  private readonly slots = new Map<string, Slot<TJob>>();
  private readonly keysByJobId = new Map<string, string>();

  claim(
    key: string,
    init: () => { job: TJob; controller: AbortController },
  ): { entry: InFlightEntry<TJob>; isNew: boolean } {
    const existing = this.slots.get(key);
    if (existing) {
      return { entry: existing.entry, isNew: false };
    }

    const { job, controller } = init();
    let resolve: (value: TJob) => void = () => undefined;
    const completion = new Promise<TJob>((res) => {
      resolve = res;
    });
    let resolveReady: (failure: Error | null) => void = () => undefined;
    const ready = new Promise<Error | null>((res) => {
      resolveReady = res;
    });
    const entry: InFlightEntry<TJob> = { key, job, controller, ready, completion };
    this.slots.set(key, { entry, resolve, resolveReady });
    this.keysByJobId.set(job.id, key);
    return { entry, isNew: true };
  }

  /**
   * Mark the job as stored so coalesced submissions may return it.
   */
  confirm(key: string): void {
    this.slots.get(key)?.resolveReady(null);
  }

  /**
   * Publish the terminal job to all waiters and free the key. A `failure`
   * given before `confirm` is handed to every coalesced submission.
   */
  settle(key: string, failure: Error | null = null): void {
    const slot = this.slots.get(key);
    if (!slot) {
      return;
    }
    this.slots.delete(key);
    this.keysByJobId.delete(slot.entry.job.id);
    slot.resolveReady(failure);
    slot.resolve(slot.entry.job);
  }

  get(key: string): InFlightEntry<TJob> | undefined {
    return this.slots.get(key)?.entry;
  }

  findByJobId(jobId: string): InFlightEntry<TJob> | undefined {
    const key = this.keysByJobId.get(jobId);
    return key ? this.get(key) : undefined;
  }

  get size(): number {
    return this.slots.size;
  }

  entries(): InFlightEntry<TJob>[] {
    return [...this.slots.values()].map((slot) => slot.entry);
  }
}

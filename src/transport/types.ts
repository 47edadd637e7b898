export interface Transport {
  readonly connected: boolean;
  run(commandLine: string): Promise<string[]>;
  close(): Promise<void>;
}

/**
 * Runs async jobs one at a time in call order. A transport holds a single
 * session, so two commands must never interleave on it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  push<T>(job: () => Promise<T>): Promise<T> {
    const next = this.tail.then(job, job);
    // The chain outlives a rejected job; its caller sees the rejection through `next`.
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}

// Wall-clock budget of one run

export type Clock = () => number;

export class TimeBudget {
  private readonly startedAt: number;

  constructor(
    /** Total budget in milliseconds; 0 is already spent. */
    readonly budgetMs: number,
    private readonly clock: Clock = Date.now
  ) {
    this.startedAt = clock();
  }

  static fromSeconds(seconds: number, clock?: Clock): TimeBudget {
    return new TimeBudget(seconds * 1000, clock);
  }

  get startTime(): number {
    return this.startedAt;
  }

  elapsedMs(): number {
    return this.clock() - this.startedAt;
  }

  remainingMs(): number {
    return Math.max(0, this.budgetMs - this.elapsedMs());
  }

  expired(): boolean {
    return this.budgetMs <= 0 || this.elapsedMs() >= this.budgetMs;
  }
}

/**
 * Settle with `promise`, or reject with `onTimeout()` once `timeoutMs`
 * has passed. The underlying work is not cancelled.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

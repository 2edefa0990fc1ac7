import type { ClockPort } from "../../core/ports/outboundPorts";

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Resolution exceeded ${timeoutMs}ms.`);
    this.name = "DeadlineExceededError";
  }
}

/**
 * Per-request time budget shared by every I/O step of one resolution.
 */
export class Deadline {
  private readonly expiresAt: number;

  constructor(
    readonly timeoutMs: number,
    private readonly clock: ClockPort,
  ) {
    this.expiresAt = clock.now().getTime() + timeoutMs;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.clock.now().getTime());
  }

  expired(): boolean {
    return this.remainingMs() === 0;
  }

  /**
   * Races the operation against the remaining budget and clears the timer either way.
   */
  async run<T>(operation: () => Promise<T>): Promise<T> {
    const remaining = this.remainingMs();
    if (remaining === 0) {
      throw new DeadlineExceededError(this.timeoutMs);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new DeadlineExceededError(this.timeoutMs)),
        remaining,
      );
    });

    try {
      return await Promise.race([operation(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

import { performance } from 'node:perf_hooks';
import winston, { type Logger } from 'winston';
import { TimeoutExceededError } from '../errors.js';
import type { Outcome } from '../types.js';

/**
 * What an attempt knows about its time budget.
 */
export class Deadline {
  constructor(
    public readonly limitSeconds: number,
    private readonly expiresAt: number,
    public readonly signal: AbortSignal,
  ) {}

  public remainingMs(): number {
    return Math.max(0, this.expiresAt - performance.now());
  }

  public get expired(): boolean {
    return this.signal.aborted || this.remainingMs() <= 0;
  }
}

export type Attempt<T> = (deadline: Deadline) => Promise<T>;

export interface DeadlineSupervisorOptions {
  logger?: Logger;
}

/**
 * Races an attempt against a wall-clock timer. The timer is armed before the attempt
 * starts; when it fires first the attempt is abandoned and its signal aborted.
 */
export class DeadlineSupervisor {
  private readonly logger: Logger;

  constructor(options: DeadlineSupervisorOptions = {}) {
    this.logger = options.logger ?? winston.createLogger({ silent: true });
  }

  public async runWithDeadline<T>(attempt: Attempt<T>, maxSeconds: number): Promise<Outcome<T>> {
    if (!Number.isFinite(maxSeconds) || maxSeconds <= 0) {
      throw new RangeError(`maxSeconds must be a positive number, received ${maxSeconds}`);
    }

    const limitMs = maxSeconds * 1000;
    const controller = new AbortController();
    const deadline = new Deadline(maxSeconds, performance.now() + limitMs, controller.signal);

    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<Outcome<T>>((resolve) => {
      timer = setTimeout(() => {
        this.logger.debug(`Deadline of ${maxSeconds}s reached, abandoning attempt`);
        controller.abort(new TimeoutExceededError(maxSeconds));
        resolve({ kind: 'timedOut' });
      }, limitMs);
    });

    const execution = this.start(attempt, deadline);

    try {
      return await Promise.race([execution, expiry]);
    } finally {
      clearTimeout(timer);
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }
  }

  private async start<T>(attempt: Attempt<T>, deadline: Deadline): Promise<Outcome<T>> {
    try {
      return { kind: 'completed', value: await attempt(deadline) };
    } catch (error) {
      if (error instanceof TimeoutExceededError) {
        return { kind: 'timedOut' };
      }
      return {
        kind: 'raised',
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }
}

import { setTimeout as delay } from "node:timers/promises";
import { Logger } from "../observability";

export type WaitResult = "elapsed" | "budget_exceeded" | "aborted";

export interface Waiter {
  wait(seconds: number, reason: string): Promise<WaitResult>;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface WaitBudgetOptions {
  logger: Logger;
  /** Total seconds this link may spend waiting; unset means no limit. */
  timeoutSeconds?: number;
  signal?: AbortSignal;
  sleepFn?: SleepFn;
}

/**
 * Per-link waiter. Every wait is charged against the link's timeout and is
 * interrupted by the process abort signal.
 */
export class WaitBudget implements Waiter {
  private spentSeconds = 0;
  private readonly options: WaitBudgetOptions;

  constructor(options: WaitBudgetOptions) {
    this.options = options;
  }

  get spent(): number {
    return this.spentSeconds;
  }

  async wait(seconds: number, reason: string): Promise<WaitResult> {
    const { logger, timeoutSeconds, signal } = this.options;
    if (signal?.aborted) {
      return "aborted";
    }

    if (timeoutSeconds !== undefined && this.spentSeconds + seconds > timeoutSeconds) {
      logger.info("wait_timeout_reached", { seconds, reason, spentSeconds: this.spentSeconds, timeoutSeconds });
      return "budget_exceeded";
    }

    logger.info("wait_start", { seconds, reason });
    try {
      await (this.options.sleepFn ?? sleep)(seconds * 1000, signal);
    } catch (error) {
      if (signal?.aborted) {
        logger.warn("wait_aborted", { seconds, reason });
        return "aborted";
      }
      throw error;
    }

    this.spentSeconds += seconds;
    return "elapsed";
  }
}

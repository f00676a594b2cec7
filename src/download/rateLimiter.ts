import { Transform } from "node:stream";
import { sleep, SleepFn } from "../core/wait";

const RATE_UNITS: Record<string, number> = {
  "": 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
};

/** Parses "500", "200k", "1M" or "2g" into bytes per second. */
export function parseRate(value: string): number {
  const match = /^\s*(\d+)\s*([kmg]?)\s*$/i.exec(value);
  if (!match) {
    throw new Error(`Invalid rate: ${value}`);
  }
  const bytes = Number.parseInt(match[1], 10) * RATE_UNITS[match[2].toLowerCase()];
  if (bytes <= 0) {
    throw new Error(`Invalid rate: ${value}`);
  }
  return bytes;
}

/**
 * Byte-rate limiter shared by every transfer of a run, so the configured rate
 * bounds the total throughput rather than each link's.
 */
export class RateLimiter {
  private nextFreeAt = 0;
  private readonly bytesPerSecond: number;
  private readonly now: () => number;
  private readonly sleepFn: SleepFn;

  constructor(bytesPerSecond: number, now: () => number = Date.now, sleepFn: SleepFn = sleep) {
    this.bytesPerSecond = bytesPerSecond;
    this.now = now;
    this.sleepFn = sleepFn;
  }

  async take(bytes: number, signal?: AbortSignal): Promise<void> {
    const current = this.now();
    const startAt = Math.max(current, this.nextFreeAt);
    this.nextFreeAt = startAt + (bytes * 1000) / this.bytesPerSecond;
    const waitMs = startAt - current;
    if (waitMs > 0) {
      await this.sleepFn(waitMs, signal);
    }
  }

  throttle(signal?: AbortSignal): Transform {
    return new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        this.take(chunk.length, signal).then(
          () => callback(null, chunk),
          (error: unknown) => callback(error instanceof Error ? error : new Error(String(error))),
        );
      },
    });
  }
}

import { Mutex } from 'async-mutex';

import { Logger } from './logger';

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Random pause in [minMs, maxMs]. Used between candidates and before retries
 * so workers never fire in lockstep.
 */
export async function jitteredSleep(minMs: number, maxMs: number, sleeper: Sleeper = sleep): Promise<void> {
    const lo = Math.max(0, Math.min(minMs, maxMs));
    const hi = Math.max(lo, maxMs);
    const ms = lo + Math.random() * (hi - lo);
    if (ms > 0) await sleeper(ms);
}

export interface RateLimiter {
    acquire(): Promise<void>;
}

export interface SlidingWindowOptions {
    maxCalls: number;
    periodMs: number;
    /** Adds 0-20% of the computed wait on top. */
    randomizeDelay?: boolean;
    now?: () => number;
    sleeper?: Sleeper;
}

/**
 * Global limiter shared by every worker: at most `maxCalls` acquisitions in
 * any rolling window of `periodMs`.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
    private readonly calls: number[] = [];
    private readonly lock = new Mutex();
    private readonly maxCalls: number;
    private readonly periodMs: number;
    private readonly randomizeDelay: boolean;
    private readonly now: () => number;
    private readonly sleeper: Sleeper;

    constructor(options: SlidingWindowOptions) {
        this.maxCalls = Math.max(1, options.maxCalls);
        this.periodMs = Math.max(1, options.periodMs);
        this.randomizeDelay = options.randomizeDelay ?? true;
        this.now = options.now ?? Date.now;
        this.sleeper = options.sleeper ?? sleep;
    }

    async acquire(): Promise<void> {
        await this.lock.runExclusive(async () => {
            this.evictExpired(this.now());

            if (this.calls.length >= this.maxCalls) {
                const oldest = this.calls[0] ?? this.now();
                let waitMs = oldest + this.periodMs - this.now();
                if (waitMs > 0) {
                    if (this.randomizeDelay) {
                        waitMs += waitMs * Math.random() * 0.2;
                    }
                    Logger.debug(`[RateLimiter] window full, waiting ${Math.round(waitMs)}ms`);
                    await this.sleeper(waitMs);
                }
                this.evictExpired(this.now());
            }

            this.calls.push(this.now());
        });
    }

    /** Acquisitions per second over the current window. */
    currentRate(): number {
        this.evictExpired(this.now());
        return this.calls.length / (this.periodMs / 1000);
    }

    reset(): void {
        this.calls.length = 0;
    }

    private evictExpired(now: number): void {
        while (this.calls.length > 0 && (this.calls[0] ?? now) <= now - this.periodMs) {
            this.calls.shift();
        }
    }
}

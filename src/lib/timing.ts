import { setTimeout as delay } from "node:timers/promises";
import { TimeoutError } from "./errors.js";

/**
 * Races `work` against a timer. The timer is cleared either way so no handle
 * outlives the call.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/** Sleeps for `ms`; resolves early (false) when `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;
    try {
        await delay(ms, undefined, { signal });
        return true;
    } catch (err) {
        if (signal?.aborted) return false;
        throw err;
    }
}

/** Exponential backoff from `baseMs`, doubling per consecutive failure, capped at `maxMs`. */
export function backoffDelay(baseMs: number, consecutiveFailures: number, maxMs: number): number {
    if (consecutiveFailures <= 0) return baseMs;
    return Math.min(maxMs, baseMs * 2 ** consecutiveFailures);
}

export function msUntilNextHour(now: Date): number {
    const next = new Date(now);
    next.setMinutes(60, 0, 0);
    return next.getTime() - now.getTime();
}

/**
 * Delay function. Injected wherever the pipeline waits on purpose
 * (page throttle, retry backoff, profile jitter) so tests run without
 * real timers.
 */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * Sleep for the specified number of milliseconds.
 */
export const sleep: SleepFn = (ms) =>
    new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

/**
 * Random source in [0, 1). Injected alongside `sleep`.
 */
export type RandomFn = () => number;

/**
 * Uniform random delay in [min, max] milliseconds.
 */
export function randomDelay(minMs: number, maxMs: number, random: RandomFn = Math.random): number {
    const lo = Math.min(minMs, maxMs);
    const hi = Math.max(minMs, maxMs);
    return lo + random() * (hi - lo);
}

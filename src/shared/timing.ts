/** Elapsed seconds since `t0` (epoch ms), rounded to nearest integer. */
export const since = (t0: number): number => Math.round((Date.now() - t0) / 1000);

export const DAY_MS = 24 * 60 * 60 * 1000;
export const HOUR_MS = 60 * 60 * 1000;

export const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

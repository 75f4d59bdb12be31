export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const isoNow = (): string => new Date().toISOString();

export const isoAt = (ms: number): string => new Date(ms).toISOString();

export const dayKey = (ts: Date | string | number = new Date()): string => {
  const d = ts instanceof Date ? ts : new Date(ts);
  return d.toISOString().slice(0, 10);
};

/** First millisecond of the UTC day after `ts`. */
export const nextUtcMidnight = (ts: number): number => {
  const d = new Date(ts);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate() + 1);
};

export const elapsedMs = (fromIso: string, nowMs: number): number => nowMs - new Date(fromIso).getTime();

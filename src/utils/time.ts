export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const isoNow = (): string => new Date().toISOString();

export const dayKey = (ts: Date | string | number = new Date()): string => {
  const d = ts instanceof Date ? ts : new Date(ts);
  return d.toISOString().slice(0, 10);
};

export const minutesToMs = (minutes: number): number => minutes * 60_000;

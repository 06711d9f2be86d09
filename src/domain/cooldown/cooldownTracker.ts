import type { CooldownWindow } from '../../types.js';

/**
 * One window per pair; opening a new window replaces the previous one. Expiry is a
 * plain comparison at query time: a pair is cooling down while `now < expiresAt`, so
 * admission becomes possible again exactly at `expiresAt`.
 */
export class CooldownTracker {
  private readonly windows = new Map<string, CooldownWindow>();

  open(pairId: string, durationMs: number, reason: string, now: number): CooldownWindow {
    const window: CooldownWindow = {
      pairId,
      openedAt: now,
      expiresAt: now + Math.max(0, durationMs),
      reason,
    };
    this.windows.set(pairId, window);
    return window;
  }

  isActive(pairId: string, now: number): boolean {
    const window = this.windows.get(pairId);
    return window !== undefined && now < window.expiresAt;
  }

  remainingMs(pairId: string, now: number): number {
    const window = this.windows.get(pairId);
    return window ? Math.max(0, window.expiresAt - now) : 0;
  }

  get(pairId: string): CooldownWindow | undefined {
    return this.windows.get(pairId);
  }

  list(now: number): CooldownWindow[] {
    return [...this.windows.values()]
      .filter((window) => now < window.expiresAt)
      .sort((a, b) => a.expiresAt - b.expiresAt);
  }
}

import { EventEmitter } from 'node:events';
import type { HedgeState, RiskEvent } from '../types.js';

export interface EngineEvents {
  'hedge.state': { hedgeId: string; pairId: string; from: HedgeState | null; to: HedgeState; reason?: string };
  'risk.event': RiskEvent;
  'admission.admitted': { pairId: string; hedgeId: string; accountIds: string[] };
}

export class EventBus {
  private readonly emitter = new EventEmitter();

  on<K extends keyof EngineEvents>(event: K, listener: (payload: EngineEvents[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void {
    this.emitter.emit(event, payload);
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}

export const eventBus = new EventBus();

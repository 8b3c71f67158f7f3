import type { EngineEvent } from '../domain/types';
import { logger } from '../utils/logger';

export type BusEvent = EngineEvent & { timestamp: string };

type Subscriber = (evt: BusEvent) => void;

export interface EventBus {
  subscribe(fn: Subscriber): () => void;
  emit(event: EngineEvent): void;
}

export function createEventBus(): EventBus {
  const subscribers = new Set<Subscriber>();

  return {
    subscribe(fn) {
      subscribers.add(fn);
      return () => {
        subscribers.delete(fn);
      };
    },
    emit(event) {
      const evt: BusEvent = { ...event, timestamp: new Date().toISOString() };
      for (const fn of subscribers) {
        try {
          fn(evt);
        } catch (err) {
          // a failing subscriber must not take the others down
          logger.warn('event subscriber failed', { event: evt.type, reason: String(err) });
        }
      }
    },
  };
}

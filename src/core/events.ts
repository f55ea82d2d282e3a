import type { Logger } from 'pino';
import type { Board } from './types.js';

/** The single channel all board notifications travel on. */
export const BOARDS_TOPIC = 'boards';

export type BoardEventName = 'board_created' | 'board_updated' | 'board_deleted';

export interface BoardEvent {
  source: typeof BOARDS_TOPIC;
  event: BoardEventName;
  board: Board;
  ts: number;
}

/** Message type carried by each topic. */
export interface BoardroomTopics {
  [BOARDS_TOPIC]: BoardEvent;
}

export type Listener<T> = (message: T) => void;

export interface EventBus<Topics> {
  /** Register for future messages on a topic. Returns a function that unsubscribes. */
  subscribe<K extends keyof Topics>(topic: K, listener: Listener<Topics[K]>): () => void;
  publish<K extends keyof Topics>(topic: K, message: Topics[K]): void;
}

/**
 * Synchronous in-process bus. Messages go to the listeners registered when
 * `publish` runs; nothing is queued or replayed. A listener that throws is
 * logged and the remaining listeners still run.
 */
export class InProcessEventBus<Topics> implements EventBus<Topics> {
  private readonly listeners: { [K in keyof Topics]?: Set<Listener<Topics[K]>> } = {};

  constructor(private readonly log: Logger) {}

  subscribe<K extends keyof Topics>(topic: K, listener: Listener<Topics[K]>): () => void {
    const set = (this.listeners[topic] ??= new Set<Listener<Topics[K]>>());
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  publish<K extends keyof Topics>(topic: K, message: Topics[K]): void {
    const set = this.listeners[topic];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(message);
      } catch (err) {
        this.log.error({ err, topic: String(topic) }, 'event listener failed');
      }
    }
  }

  listenerCount<K extends keyof Topics>(topic: K): number {
    return this.listeners[topic]?.size ?? 0;
  }
}

export type BoardEventBus = EventBus<BoardroomTopics>;

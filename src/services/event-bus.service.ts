import type Redis from "ioredis";
import type { EventPayload, EventPublisher } from "../core/ports";

export type EventListener = (payload: EventPayload) => void;

export class InMemoryEventBus implements EventPublisher {
  private readonly listeners = new Map<string, Set<EventListener>>();

  on(topic: string, listener: EventListener): () => void {
    const set = this.listeners.get(topic) ?? new Set<EventListener>();
    set.add(listener);
    this.listeners.set(topic, set);
    return () => {
      set.delete(listener);
    };
  }

  async publish(topic: string, payload: EventPayload): Promise<void> {
    for (const listener of [...(this.listeners.get(topic) ?? [])]) listener(payload);
  }
}

export function eventChannel(topic: string) {
  return `session-events:${topic}`;
}

export class RedisEventBus implements EventPublisher {
  constructor(private readonly redis: Redis) {}

  async publish(topic: string, payload: EventPayload): Promise<void> {
    await this.redis.publish(eventChannel(topic), JSON.stringify(payload));
  }
}

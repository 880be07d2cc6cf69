import { StructuredLogger } from "../logger.js";
import { CHANNEL_TOPICS, type ChannelMessage, type ChannelTopic, type MessageByTopic } from "./messages.js";

export type ChannelHandler<K extends ChannelTopic> = (message: MessageByTopic[K]) => void;

type HandlerRegistry = { [K in ChannelTopic]: ChannelHandler<K>[] };

export interface MessageChannelOptions {
  readonly logger?: StructuredLogger;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Topic-addressed publish/subscribe channel with deferred delivery.
 *
 * {@link publish} only enqueues. {@link flush} delivers a snapshot of the
 * queue in publish order, invoking each topic's handlers in subscription
 * order. Messages published by handlers during a flush wait for the next one.
 * A throwing handler is logged and skipped; delivery carries on.
 */
export class MessageChannel {
  private readonly handlers: HandlerRegistry = {
    "task.assigned": [],
    "task.completed": [],
    "task.failed": [],
    "status.update": [],
    "alert.disease": [],
    "alert.obstacle": [],
  };
  private queue: ChannelMessage[] = [];
  private readonly logger: StructuredLogger;

  constructor(options: MessageChannelOptions = {}) {
    this.logger = options.logger ?? new StructuredLogger({ stdout: false });
  }

  /**
   * Enqueues {@link message}. The channel stores a frozen copy, so later
   * mutations of the argument never reach subscribers.
   */
  publish<K extends ChannelTopic>(topic: K, message: MessageByTopic[K]): void {
    const frozen = deepFreeze(structuredClone(message));
    this.queue.push(frozen);
    if (this.logger.isLevelEnabled("debug")) {
      this.logger.debug("channel_message_published", { topic, senderId: message.senderId, queued: this.queue.length });
    }
  }

  /**
   * Registers {@link handler}. Registering the same function twice on a topic
   * is a no-op. Returns a disposer removing the registration.
   */
  subscribe<K extends ChannelTopic>(topic: K, handler: ChannelHandler<K>): () => void {
    const list: ChannelHandler<K>[] = this.handlers[topic];
    if (!list.includes(handler)) {
      list.push(handler);
    }
    return () => this.unsubscribe(topic, handler);
  }

  unsubscribe<K extends ChannelTopic>(topic: K, handler: ChannelHandler<K>): void {
    const list: ChannelHandler<K>[] = this.handlers[topic];
    const index = list.indexOf(handler);
    if (index >= 0) {
      list.splice(index, 1);
    }
  }

  /** Number of handlers currently registered on {@link topic}. */
  subscriberCount(topic: ChannelTopic): number {
    return this.handlers[topic].length;
  }

  /** Messages waiting for the next flush. */
  pending(): number {
    return this.queue.length;
  }

  /**
   * Delivers every message queued before the call and returns how many were
   * delivered.
   */
  flush(): number {
    const batch = this.queue;
    this.queue = [];
    for (const message of batch) {
      this.deliver(message.topic, message);
    }
    return batch.length;
  }

  /** Drops queued messages and every subscription. */
  clear(): void {
    this.queue = [];
    for (const topic of CHANNEL_TOPICS) {
      this.handlers[topic].length = 0;
    }
  }

  private deliver<K extends ChannelTopic>(topic: K, message: MessageByTopic[K]): void {
    // Snapshot so handlers unsubscribing themselves do not skip a neighbour.
    const list: ChannelHandler<K>[] = this.handlers[topic].slice();
    for (const handler of list) {
      try {
        handler(message);
      } catch (error) {
        this.logger.error("channel_handler_failed", {
          topic,
          senderId: message.senderId,
          timestamp: message.timestamp,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

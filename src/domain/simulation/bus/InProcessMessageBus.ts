/**
 * In-process implementation of the mission message bus.
 *
 * Messages go into one FIFO queue that is drained on a microtask, so a
 * publisher never runs its subscribers inline and per-channel order is the
 * publish order. `flush()` drains synchronously for callers that need the
 * queue settled before they continue.
 *
 * @module domain/simulation/bus
 */

import { injectable } from "inversify";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import type {
  BusStats,
  ChannelData,
  ChannelHandler,
  ChannelName,
  MessageBus,
} from "./MessageBus";

type HandlerRegistry = { [C in ChannelName]?: Set<ChannelHandler<C>> };

export interface MessageBusConfig {
  /** Enable debug logging */
  debug: boolean;
  /** Max listeners per channel (0 = unlimited) */
  maxListeners: number;
  /** Catch and log handler errors instead of throwing */
  catchErrors: boolean;
}

const DEFAULT_CONFIG: MessageBusConfig = {
  debug: false,
  maxListeners: 50,
  catchErrors: true,
};

@injectable()
export class InProcessMessageBus implements MessageBus {
  private config: MessageBusConfig;
  private handlers: HandlerRegistry = {};
  private queue: Array<() => void> = [];
  private drainScheduled = false;
  private draining = false;
  private publishCounts = new Map<ChannelName, number>();

  constructor(config: Partial<MessageBusConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    logger.debug("📡 MessageBus: Initialized", LogCategory.BUS);
  }

  private handlersFor<C extends ChannelName>(
    channel: C,
  ): Set<ChannelHandler<C>> {
    const handlers: { [K in C]?: Set<ChannelHandler<K>> } = this.handlers;
    const existing = handlers[channel];
    if (existing) {
      return existing;
    }
    const created = new Set<ChannelHandler<C>>();
    handlers[channel] = created;
    return created;
  }

  /**
   * Registers a handler for a channel.
   * @returns Function to unsubscribe
   */
  public subscribe<C extends ChannelName>(
    channel: C,
    handler: ChannelHandler<C>,
  ): () => void {
    const handlers = this.handlersFor(channel);

    if (
      this.config.maxListeners > 0 &&
      handlers.size >= this.config.maxListeners
    ) {
      logger.warn(
        `MessageBus: Max listeners (${this.config.maxListeners}) reached for ${channel}`,
        LogCategory.BUS,
      );
    }

    handlers.add(handler);

    if (this.config.debug) {
      logger.debug(`MessageBus: Handler registered for ${channel}`, LogCategory.BUS);
    }

    return () => {
      handlers.delete(handler);
    };
  }

  /**
   * Queues a message for the channel. Handlers unsubscribed before delivery
   * are skipped.
   */
  public publish<C extends ChannelName>(channel: C, data: ChannelData<C>): void {
    this.publishCounts.set(channel, (this.publishCounts.get(channel) ?? 0) + 1);

    const handlers = this.handlers[channel];
    if (!handlers || handlers.size === 0) {
      if (this.config.debug) {
        logger.debug(`MessageBus: No handlers for ${channel}`, LogCategory.BUS);
      }
      return;
    }

    const targets = Array.from(handlers);
    this.queue.push(() => {
      for (const handler of targets) {
        if (!handlers.has(handler)) {
          continue;
        }
        this.invoke(channel, handler, data);
      }
    });
    this.scheduleDrain();
  }

  private invoke<C extends ChannelName>(
    channel: C,
    handler: ChannelHandler<C>,
    data: ChannelData<C>,
  ): void {
    try {
      handler(data);
    } catch (error) {
      if (!this.config.catchErrors) {
        throw error;
      }
      logger.error(`MessageBus: Error in handler for ${channel}`, LogCategory.BUS, {
        error: error instanceof Error ? error.message : String(error),
        tick: data.tick,
      });
    }
  }

  private scheduleDrain(): void {
    if (this.drainScheduled || this.draining) {
      return;
    }
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      this.flush();
    });
  }

  public flush(): void {
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let delivery = this.queue.shift();
      while (delivery) {
        delivery();
        delivery = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  /**
   * Removes all handlers and drops undelivered messages.
   */
  public clear(): void {
    this.handlers = {};
    this.queue = [];
    this.publishCounts.clear();
    logger.debug("MessageBus: All handlers cleared", LogCategory.BUS);
  }

  public getStats(): BusStats {
    const publishCounts: BusStats["publishCounts"] = {};
    const handlerCounts: BusStats["handlerCounts"] = {};

    for (const [channel, count] of this.publishCounts) {
      publishCounts[channel] = count;
    }
    for (const channel of Object.keys(this.handlers)) {
      if (isChannelName(channel, this.handlers)) {
        handlerCounts[channel] = this.handlers[channel]?.size ?? 0;
      }
    }

    return {
      totalPublished: Array.from(this.publishCounts.values()).reduce(
        (a, b) => a + b,
        0,
      ),
      publishCounts,
      handlerCounts,
      pending: this.queue.length,
    };
  }
}

function isChannelName(
  key: string,
  registry: HandlerRegistry,
): key is ChannelName {
  return Object.prototype.hasOwnProperty.call(registry, key);
}

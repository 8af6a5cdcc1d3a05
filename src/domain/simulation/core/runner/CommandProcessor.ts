import { logger } from "../../../../infrastructure/utils/logger";
import { MissionCommandType } from "../../../../shared/constants/CommandEnums";
import { LogCategory } from "../../../../shared/constants/LogEnums";
import type { MissionCommand } from "../../../../shared/types/commands/MissionCommand";
import type { Envelope, MessageBus } from "../../bus/MessageBus";

export interface QueuedCommand {
  command: MissionCommand;
  /** Pre-assigned for ADD_ORDER so the caller gets it back immediately */
  orderId?: string;
}

/**
 * Sequential `ORD_001`, `ORD_002`, ... ids, restarted by a reset.
 */
export class OrderIdAllocator {
  private next = 1;

  public allocate(): string {
    return `ORD_${String(this.next++).padStart(3, "0")}`;
  }

  public reset(): void {
    this.next = 1;
  }
}

/**
 * Buffers user commands while a tick runs and turns them into bus messages.
 */
export class CommandProcessor {
  private queue: QueuedCommand[] = [];
  private droppedCount = 0;
  private commandSeq = 0;

  constructor(
    private readonly bus: MessageBus,
    private readonly maxQueue: number,
  ) {}

  public get size(): number {
    return this.queue.length;
  }

  public get dropped(): number {
    return this.droppedCount;
  }

  /**
   * A reset discards everything buffered before it.
   */
  public enqueue(entry: QueuedCommand): void {
    if (entry.command.type === MissionCommandType.RESET) {
      if (this.queue.length > 0) {
        logger.info(`🔄 Reset supersedes ${this.queue.length} buffered command(s)`, LogCategory.LOOP);
        this.droppedCount += this.queue.length;
      }
      this.queue = [];
    } else if (this.queue.length >= this.maxQueue) {
      const dropped = this.queue.shift();
      this.droppedCount++;
      logger.warn(
        `Command queue full (${this.maxQueue}), dropping oldest command: ${dropped?.command.type}`,
        LogCategory.LOOP,
      );
    }
    this.queue.push(entry);
  }

  public drain(): QueuedCommand[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }

  public clear(): void {
    this.queue = [];
  }

  public dispatch(entry: QueuedCommand, envelope: Envelope): void {
    const { command } = entry;
    logger.debug(`📝 Processing command: ${command.type}`, LogCategory.LOOP);

    switch (command.type) {
      case MissionCommandType.ADD_ORDER:
        if (!entry.orderId) {
          logger.error("ADD_ORDER without an order id", LogCategory.LOOP);
          return;
        }
        this.bus.publish("user.add_order", {
          ...envelope,
          orderId: entry.orderId,
          destination: { ...command.destination },
        });
        return;

      case MissionCommandType.TOGGLE_OBSTACLE:
        this.bus.publish("user.toggle_obstacle", {
          ...envelope,
          commandId: `user_${++this.commandSeq}`,
          cell: { ...command.cell },
        });
        return;

      case MissionCommandType.RESET:
        this.bus.publish("system.reset", envelope);
        return;
    }
  }
}

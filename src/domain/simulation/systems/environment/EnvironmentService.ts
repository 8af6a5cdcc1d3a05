import { inject, injectable } from "inversify";
import type { AppConfig } from "../../../../config/config";
import { TYPES } from "../../../../config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { isMissionError } from "@/shared/errors";
import type {
  EnvironmentSnapshot,
  GridLayout,
  RobotState,
} from "../../../types/simulation/grid";
import { GridWorld } from "../../../world/GridWorld";
import type { EnvironmentCommandKind, MessageBus } from "../../bus/MessageBus";
import { BusComponent } from "../BusComponent";

/**
 * Owns the live grid and robot. The only component that touches them:
 * everything else sends commands and reads published snapshots.
 */
@injectable()
export class EnvironmentService extends BusComponent {
  protected readonly componentName = "EnvironmentService";
  private readonly world: GridWorld;
  private currentTick = 0;

  constructor(
    @inject(TYPES.MessageBus) bus: MessageBus,
    @inject(TYPES.GridLayout) layout: GridLayout,
    @inject(TYPES.AppConfig) config: AppConfig,
  ) {
    super(bus);
    this.world = new GridWorld(layout, config.ROBOT.CAPACITY);
    logger.info(
      `🗺️ Environment ready: ${this.world.width}x${this.world.height}, base (${this.world.base.x},${this.world.base.y})`,
      LogCategory.ENVIRONMENT,
    );
  }

  public snapshot(): EnvironmentSnapshot {
    return this.world.snapshot();
  }

  protected registerHandlers(): void {
    this.listen("system.init", (message) => {
      this.currentTick = message.tick;
      this.broadcast(null);
    });

    this.listen("system.reset", (message) => {
      this.currentTick = message.tick;
      this.world.reset();
      logger.info("🔄 Environment reset", LogCategory.ENVIRONMENT);
      this.broadcast(null);
    });

    this.listen("monitor.request", (message) => {
      this.currentTick = message.tick;
      this.broadcast(message.tick);
    });

    this.listen("environment.move", (message) => {
      this.run(message.tick, message.commandId, "move", () =>
        this.world.moveRobotOneStep(message.direction),
      );
    });

    this.listen("environment.load", (message) => {
      this.run(message.tick, message.commandId, "load", () =>
        this.world.loadOrders(message.orderIds),
      );
    });

    this.listen("environment.deliver", (message) => {
      this.run(message.tick, message.commandId, "deliver", () =>
        this.world.deliverOrder(message.orderId),
      );
    });

    this.listen("environment.set_status", (message) => {
      this.run(message.tick, message.commandId, "status", () => {
        this.world.setRobotStatus(message.status);
        return this.world.getRobot();
      });
    });

    this.listen("user.toggle_obstacle", (message) => {
      this.run(message.tick, message.commandId, "toggle", () => {
        const terrain = this.world.toggleObstacle(message.cell);
        logger.info(
          `🚧 Cell (${message.cell.x},${message.cell.y}) is now ${terrain}`,
          LogCategory.ENVIRONMENT,
        );
        return this.world.getRobot();
      });
    });

    this.listen("user.add_order", (message) => {
      this.currentTick = message.tick;
      try {
        this.world.markOrderLocation(message.orderId, message.destination);
        this.broadcast(null);
      } catch (error) {
        if (!isMissionError(error)) {
          throw error;
        }
        logger.warn(`Order marker rejected: ${error.message}`, LogCategory.ENVIRONMENT);
      }
    });
  }

  /**
   * Applies one command and acknowledges it on `environment.status`.
   * Mission errors become a failed ack; anything else propagates.
   */
  private run(
    tick: number,
    commandId: string,
    command: EnvironmentCommandKind,
    action: () => RobotState,
  ): void {
    this.currentTick = tick;
    try {
      const robot = action();
      this.bus.publish("environment.status", {
        ...this.envelope(tick),
        commandId,
        command,
        ok: true,
        robot,
      });
      this.broadcast(null);
    } catch (error) {
      if (!isMissionError(error)) {
        throw error;
      }
      logger.warn(`Environment ${command} failed: ${error.message}`, LogCategory.ENVIRONMENT, {
        commandId,
        code: error.code,
      });
      this.bus.publish("environment.status", {
        ...this.envelope(tick),
        commandId,
        command,
        ok: false,
        robot: this.world.getRobot(),
        error: error.message,
        errorCode: error.code,
      });
    }
  }

  private broadcast(sampleTick: number | null): void {
    this.bus.publish("environment.update", {
      ...this.envelope(this.currentTick),
      sampleTick,
      snapshot: this.world.snapshot(),
    });
  }
}

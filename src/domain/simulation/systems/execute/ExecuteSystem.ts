import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import {
  AdaptationDecision,
  ExecuteOutcome,
  MissionState,
  PlanResultKind,
  RobotStatus,
} from "@/shared/constants/MissionEnums";
import { stepDirection } from "@/shared/utils/mathUtils";
import type { Coordinate } from "../../../types/simulation/grid";
import type { KnowledgeSnapshot } from "../../../types/simulation/knowledge";
import type { ExecuteReport, PlanOutput } from "../../../types/simulation/mape";
import type { ChannelData, MessageBus } from "../../bus/MessageBus";
import { TickGuard } from "../../bus/TickGuard";
import { BusComponent } from "../BusComponent";
import { MissionDraft } from "./MissionDraft";

type CommandAck = ChannelData<"environment.status">;

interface TickContext {
  tick: number;
  draft: MissionDraft;
  report: ExecuteReport;
}

const PATCH_SOURCE = "execute";

/**
 * Execute stage and mission state machine.
 *
 * Sole writer of the mission and metric fields: every tick ends with at most
 * one `knowledge.set` followed by `execute.result`. Robot side effects go out
 * as environment commands and are confirmed by their `environment.status`
 * acknowledgement before the tick continues.
 */
@injectable()
export class ExecuteSystem extends BusComponent {
  protected readonly componentName = "ExecuteSystem";
  private readonly planGuard = new TickGuard();
  private knowledge: KnowledgeSnapshot | null = null;
  private awaiting = new Map<string, (ack: CommandAck | null) => void>();
  private commandSeq = 0;
  private activeTick: number | null = null;
  private lastTick = 0;

  constructor(@inject(TYPES.MessageBus) bus: MessageBus) {
    super(bus);
  }

  protected registerHandlers(): void {
    this.listen("knowledge.update", (message) => {
      this.knowledge = message.snapshot;
      this.lastTick = Math.max(this.lastTick, message.tick);
      if (message.sampleTick === null) {
        this.promoteToCollecting();
      }
    });

    this.listen("environment.status", (message) => {
      const resolve = this.awaiting.get(message.commandId);
      if (resolve) {
        this.awaiting.delete(message.commandId);
        resolve(message);
      }
    });

    this.listen("plan.result", (message) => {
      if (!this.planGuard.accept(message.tick)) {
        return;
      }
      this.cancelPending();
      this.runTick(message.tick, message.result).catch((error: unknown) => {
        this.releaseTick(message.tick);
        logger.error("Execute tick failed", LogCategory.EXECUTE, {
          tick: message.tick,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });

    this.listen("system.reset", (message) => {
      this.cancelPending();
      this.knowledge = null;
      this.activeTick = null;
      this.lastTick = Math.max(this.lastTick, message.tick);
      logger.debug("Execute in-flight commands cleared", LogCategory.EXECUTE);
    });
  }

  /**
   * Idle with pending orders opens the collection window. Runs between
   * ticks; inside a tick the same transition is part of the tick's patch.
   */
  private promoteToCollecting(): void {
    const knowledge = this.knowledge;
    if (
      !knowledge ||
      this.activeTick !== null ||
      knowledge.missionState !== MissionState.IDLE
    ) {
      return;
    }
    const draft = new MissionDraft(knowledge);
    if (!draft.hasPending()) {
      return;
    }
    draft.state.missionState = MissionState.COLLECTING;
    logger.info("📦 Collecting orders", LogCategory.EXECUTE);
    this.bus.publish("knowledge.set", {
      ...this.envelope(this.lastTick),
      patch: draft.toPatch(),
      source: PATCH_SOURCE,
    });
  }

  private cancelPending(): void {
    for (const resolve of this.awaiting.values()) {
      resolve(null);
    }
    this.awaiting.clear();
  }

  private releaseTick(tick: number): void {
    if (this.activeTick === tick) {
      this.activeTick = null;
    }
  }

  private command(send: (commandId: string) => void): Promise<CommandAck | null> {
    const commandId = `cmd_${++this.commandSeq}`;
    return new Promise((resolve) => {
      this.awaiting.set(commandId, resolve);
      send(commandId);
    });
  }

  private setRobotStatus(tick: number, status: RobotStatus): void {
    this.bus.publish("environment.set_status", {
      ...this.envelope(tick),
      commandId: `cmd_${++this.commandSeq}`,
      status,
    });
  }

  private async runTick(tick: number, result: PlanOutput): Promise<void> {
    const knowledge = this.knowledge;
    this.lastTick = Math.max(this.lastTick, tick);

    if (!knowledge) {
      this.finish(tick, null, {
        decision: result.decision,
        outcome: ExecuteOutcome.IDLE,
        missionState: MissionState.IDLE,
        position: null,
        deliveredOrderIds: [],
        error: "knowledge not initialized",
      });
      return;
    }

    this.activeTick = tick;
    const draft = new MissionDraft(knowledge);
    const ctx: TickContext = {
      tick,
      draft,
      report: {
        decision: result.decision,
        outcome: ExecuteOutcome.IDLE,
        missionState: draft.missionState,
        position: null,
        deliveredOrderIds: [],
      },
    };

    const completed = await this.apply(ctx, result);
    this.releaseTick(tick);
    if (!completed) {
      logger.warn(`Execute tick ${tick} abandoned`, LogCategory.EXECUTE);
      return;
    }

    ctx.report.missionState = draft.missionState;
    this.finish(tick, draft, ctx.report);
  }

  /**
   * @returns false when an in-flight command was cancelled
   */
  private async apply(ctx: TickContext, result: PlanOutput): Promise<boolean> {
    const { draft } = ctx;

    switch (result.kind) {
      case PlanResultKind.ROUTE: {
        if (result.decision === AdaptationDecision.START_MISSION) {
          return this.startMission(ctx, result.loadOrderIds, () =>
            draft.adoptPlan(result.plan),
          );
        }
        draft.adoptPlan(result.plan);
        if (result.countsAsReplan) {
          draft.state.metrics.replanCount += 1;
        }
        if (result.decision === AdaptationDecision.BEGIN_RETURN) {
          draft.state.missionState = MissionState.RETURNING;
          logger.info("🏠 Returning to base", LogCategory.EXECUTE);
        }
        ctx.report.outcome = ExecuteOutcome.TRANSITIONED;
        return this.step(ctx);
      }

      case PlanResultKind.STATE: {
        if (result.missionState === MissionState.STUCK) {
          draft.enterStuck();
          this.setRobotStatus(ctx.tick, RobotStatus.STUCK);
          logger.warn(`⛔ Stuck: ${result.reason}`, LogCategory.EXECUTE, {
            stuckFrom: draft.state.stuckFrom,
          });
          ctx.report.outcome = ExecuteOutcome.TRANSITIONED;
          return true;
        }
        draft.resume(result.missionState);
        this.setRobotStatus(
          ctx.tick,
          draft.isMoving ? RobotStatus.MOVING : RobotStatus.IDLE,
        );
        logger.info(`▶️ Resumed in ${draft.missionState}`, LogCategory.EXECUTE);
        ctx.report.outcome = ExecuteOutcome.TRANSITIONED;
        return draft.isMoving ? this.step(ctx) : true;
      }

      case PlanResultKind.NONE: {
        if (result.decision === AdaptationDecision.COMPLETE_MISSION) {
          draft.completeMission();
          this.setRobotStatus(ctx.tick, RobotStatus.IDLE);
          logger.info(`✅ Mission complete, now ${draft.missionState}`, LogCategory.EXECUTE, {
            metrics: draft.state.metrics,
          });
          ctx.report.outcome = ExecuteOutcome.TRANSITIONED;
          return true;
        }
        if (draft.missionState === MissionState.IDLE && draft.hasPending()) {
          draft.state.missionState = MissionState.COLLECTING;
          ctx.report.outcome = ExecuteOutcome.TRANSITIONED;
          return true;
        }
        return draft.isMoving ? this.step(ctx) : true;
      }
    }
  }

  private async startMission(
    ctx: TickContext,
    orderIds: string[],
    adopt: () => void,
  ): Promise<boolean> {
    const ack = await this.command((commandId) => {
      this.bus.publish("environment.load", {
        ...this.envelope(ctx.tick),
        commandId,
        orderIds,
      });
    });
    if (!ack) {
      return false;
    }
    ctx.report.position = ack.robot ? { ...ack.robot.position } : null;
    if (!ack.ok || !ack.robot) {
      ctx.report.outcome = ExecuteOutcome.BLOCKED;
      ctx.report.error = ack.error;
      logger.error(`Loading failed: ${ack.error ?? "unknown"}`, LogCategory.EXECUTE);
      return true;
    }

    ctx.draft.loadMission(orderIds, ack.robot.carried, Date.now());
    adopt();
    this.setRobotStatus(ctx.tick, RobotStatus.MOVING);
    logger.info(`🚚 Mission started with ${orderIds.length} order(s)`, LogCategory.EXECUTE, {
      orderIds,
      sequence: ctx.draft.state.plan?.destinations,
    });
    ctx.report.outcome = ExecuteOutcome.LOADED;
    return true;
  }

  /**
   * One robot step along the plan, then deliveries at the new cell.
   */
  private async step(ctx: TickContext): Promise<boolean> {
    const { draft } = ctx;
    const next = draft.nextCell();
    const current = draft.state.plan?.path[draft.state.planIndex - 1];
    if (!next || !current) {
      return true;
    }
    const direction = stepDirection(current, next);
    if (!direction) {
      ctx.report.outcome = ExecuteOutcome.BLOCKED;
      ctx.report.error = `plan cells (${current.x},${current.y}) and (${next.x},${next.y}) are not adjacent`;
      return true;
    }

    const ack = await this.command((commandId) => {
      this.bus.publish("environment.move", {
        ...this.envelope(ctx.tick),
        commandId,
        direction,
      });
    });
    if (!ack) {
      return false;
    }
    if (ack.robot) {
      ctx.report.position = { ...ack.robot.position };
    }
    if (!ack.ok || !ack.robot) {
      ctx.report.outcome = ExecuteOutcome.BLOCKED;
      ctx.report.error = ack.error;
      logger.warn(`🚧 Step blocked: ${ack.error ?? "unknown"}`, LogCategory.EXECUTE, {
        tick: ctx.tick,
      });
      return true;
    }

    draft.recordStep();
    ctx.report.outcome = ExecuteOutcome.MOVED;
    return this.deliverAt(ctx, ack.robot.position);
  }

  private async deliverAt(ctx: TickContext, cell: Coordinate): Promise<boolean> {
    for (const order of ctx.draft.deliverableAt(cell)) {
      const ack = await this.command((commandId) => {
        this.bus.publish("environment.deliver", {
          ...this.envelope(ctx.tick),
          commandId,
          orderId: order.id,
        });
      });
      if (!ack) {
        return false;
      }
      if (!ack.ok || !ack.robot) {
        logger.error(`Delivery of ${order.id} failed: ${ack.error ?? "unknown"}`, LogCategory.EXECUTE);
        continue;
      }
      ctx.draft.markDelivered(order.id, ack.robot.carried, Date.now());
      ctx.report.deliveredOrderIds.push(order.id);
      logger.info(`📬 Delivered ${order.id} at (${cell.x},${cell.y})`, LogCategory.EXECUTE);
    }
    return true;
  }

  private finish(
    tick: number,
    draft: MissionDraft | null,
    report: ExecuteReport,
  ): void {
    if (draft) {
      const patch = draft.toPatch();
      if (Object.keys(patch).length > 0) {
        this.bus.publish("knowledge.set", {
          ...this.envelope(tick),
          patch,
          source: PATCH_SOURCE,
        });
      }
    }
    this.bus.publish("execute.result", {
      ...this.envelope(tick),
      report,
    });
  }
}

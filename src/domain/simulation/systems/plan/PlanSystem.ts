import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { PlanResultKind } from "@/shared/constants/MissionEnums";
import type { MessageBus } from "../../bus/MessageBus";
import { TickGuard } from "../../bus/TickGuard";
import { BusComponent } from "../BusComponent";
import { planForDecision } from "./missionPlanning";

/**
 * Plan stage. Every decision yields exactly one `plan.result`, including
 * the ones with nothing to plan, so Execute always runs its tick.
 */
@injectable()
export class PlanSystem extends BusComponent {
  protected readonly componentName = "PlanSystem";
  private readonly guard = new TickGuard();

  constructor(@inject(TYPES.MessageBus) bus: MessageBus) {
    super(bus);
  }

  protected registerHandlers(): void {
    this.listen("analyze.result", (message) => {
      if (!this.guard.accept(message.tick)) {
        return;
      }

      const result = planForDecision(message.decision, message.context, Date.now());

      if (result.kind === PlanResultKind.ROUTE) {
        logger.info(
          `🧭 ${result.decision}: ${result.plan.destinations.length} stop(s), cost ${result.plan.cost}`,
          LogCategory.PLAN,
          { tick: message.tick, destinations: result.plan.destinations },
        );
      } else if (result.kind === PlanResultKind.STATE) {
        logger.info(`🧭 ${result.decision} → ${result.missionState}: ${result.reason}`, LogCategory.PLAN, {
          tick: message.tick,
        });
      }

      this.bus.publish("plan.result", {
        ...this.envelope(message.tick),
        result,
      });
    });
  }
}

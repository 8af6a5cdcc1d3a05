import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { AdaptationDecision } from "@/shared/constants/MissionEnums";
import type { MessageBus } from "../../bus/MessageBus";
import { TickGuard } from "../../bus/TickGuard";
import { BusComponent } from "../BusComponent";
import { evaluateRules } from "./adaptationRules";

/**
 * Analyze stage: one decision per `monitor.result`.
 */
@injectable()
export class AnalyzeSystem extends BusComponent {
  protected readonly componentName = "AnalyzeSystem";
  private readonly guard = new TickGuard();

  constructor(@inject(TYPES.MessageBus) bus: MessageBus) {
    super(bus);
  }

  protected registerHandlers(): void {
    this.listen("monitor.result", (message) => {
      if (!this.guard.accept(message.tick)) {
        return;
      }
      const verdict = evaluateRules(message.facts);
      if (verdict.decision !== AdaptationDecision.NO_ACTION) {
        logger.info(`🔍 ${verdict.decision}: ${verdict.reason}`, LogCategory.ANALYZE, {
          tick: message.tick,
          state: message.facts.missionState,
        });
      }
      this.bus.publish("analyze.result", {
        ...this.envelope(message.tick),
        decision: verdict.decision,
        reason: verdict.reason,
        facts: message.facts,
        context: message.context,
      });
    });
  }
}

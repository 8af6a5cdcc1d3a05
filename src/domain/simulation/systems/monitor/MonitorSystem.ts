import { inject, injectable } from "inversify";
import { TYPES } from "../../../../config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import type { EnvironmentSnapshot } from "../../../types/simulation/grid";
import type { KnowledgeSnapshot } from "../../../types/simulation/knowledge";
import type { MessageBus } from "../../bus/MessageBus";
import { TickGuard } from "../../bus/TickGuard";
import { BusComponent } from "../BusComponent";
import { deriveFacts, type ObstacleBaseline } from "./deriveFacts";

interface PendingSample {
  tick: number;
  knowledge?: KnowledgeSnapshot | null;
  environment?: EnvironmentSnapshot | null;
}

/**
 * Monitor stage. On each `monitor.request` it waits for the Knowledge and
 * Environment answers tagged with that tick, derives the facts and hands
 * them, together with the samples, to Analyze.
 */
@injectable()
export class MonitorSystem extends BusComponent {
  protected readonly componentName = "MonitorSystem";
  private readonly requestGuard = new TickGuard();
  private sample: PendingSample | null = null;
  private baseline: ObstacleBaseline | null = null;

  constructor(@inject(TYPES.MessageBus) bus: MessageBus) {
    super(bus);
  }

  protected registerHandlers(): void {
    this.listen("monitor.request", (message) => {
      if (!this.requestGuard.accept(message.tick)) {
        return;
      }
      this.sample = { tick: message.tick };
    });

    this.listen("knowledge.update", (message) => {
      if (this.sample && message.sampleTick === this.sample.tick) {
        this.sample.knowledge = message.snapshot;
        this.complete();
      }
    });

    this.listen("environment.update", (message) => {
      if (this.sample && message.sampleTick === this.sample.tick) {
        this.sample.environment = message.snapshot;
        this.complete();
      }
    });

    this.listen("system.reset", () => {
      this.baseline = null;
      this.sample = null;
      logger.debug("Monitor baseline cleared", LogCategory.MONITOR);
    });
  }

  private complete(): void {
    const sample = this.sample;
    if (
      !sample ||
      sample.knowledge === undefined ||
      sample.environment === undefined
    ) {
      return;
    }
    this.sample = null;

    const knowledge = sample.knowledge;
    const environment = sample.environment;
    const { facts, baseline } = deriveFacts(
      knowledge,
      environment,
      this.baseline,
      Date.now(),
    );
    this.baseline = baseline;

    if (facts.obstacleDelta.added.length + facts.obstacleDelta.removed.length > 0) {
      logger.info(
        `👁️ Obstacles changed: +${facts.obstacleDelta.added.length} -${facts.obstacleDelta.removed.length}`,
        LogCategory.MONITOR,
      );
    }

    this.bus.publish("monitor.result", {
      ...this.envelope(sample.tick),
      facts,
      context: { knowledge, environment },
    });
  }
}

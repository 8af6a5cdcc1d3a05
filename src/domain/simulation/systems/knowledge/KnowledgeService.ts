import { inject, injectable } from "inversify";
import type { AppConfig } from "../../../../config/config";
import { TYPES } from "../../../../config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { isMissionError } from "@/shared/errors";
import type { GridLayout } from "../../../types/simulation/grid";
import type { MessageBus } from "../../bus/MessageBus";
import { TickGuard } from "../../bus/TickGuard";
import { BusComponent } from "../BusComponent";
import type { KnowledgeSettings } from "./defaultKnowledge";
import { KnowledgeStore } from "./KnowledgeStore";

/**
 * Bus front of the Knowledge store.
 *
 * Answers monitor samples, applies `knowledge.set` patches and new orders,
 * and re-broadcasts every successful update so subscribers see the new
 * revision.
 */
@injectable()
export class KnowledgeService extends BusComponent {
  protected readonly componentName = "KnowledgeService";
  private readonly settings: KnowledgeSettings;
  private readonly patchGuard = new TickGuard();
  private currentTick = 0;

  constructor(
    @inject(TYPES.MessageBus) bus: MessageBus,
    @inject(TYPES.KnowledgeStore) private readonly store: KnowledgeStore,
    @inject(TYPES.AppConfig) config: AppConfig,
    @inject(TYPES.GridLayout) layout: GridLayout,
  ) {
    super(bus);
    this.settings = {
      baseLocation: { ...config.GRID.BASE },
      capacity: config.ROBOT.CAPACITY,
      missionTimeoutMs: config.ROBOT.MISSION_TIMEOUT_MS,
      houses: layout.houses,
    };
  }

  protected registerHandlers(): void {
    this.track(
      this.store.subscribe((change) => {
        this.bus.publish("knowledge.update", {
          ...this.envelope(this.currentTick),
          sampleTick: null,
          snapshot: change.snapshot,
        });
      }),
    );

    this.listen("system.init", (message) => {
      this.currentTick = message.tick;
      if (!this.store.isInitialized()) {
        this.store.initialize(this.settings);
      }
    });

    this.listen("system.reset", (message) => {
      this.currentTick = message.tick;
      if (this.store.isInitialized()) {
        this.store.reset();
      } else {
        this.store.initialize(this.settings);
      }
    });

    this.listen("monitor.request", (message) => {
      this.currentTick = message.tick;
      this.bus.publish("knowledge.update", {
        ...this.envelope(message.tick),
        sampleTick: message.tick,
        snapshot: this.store.snapshot(),
      });
    });

    this.listen("knowledge.set", (message) => {
      if (!this.patchGuard.accept(message.tick)) {
        logger.warn(`Stale knowledge.set from ${message.source} dropped`, LogCategory.KNOWLEDGE, {
          tick: message.tick,
          latest: this.patchGuard.latest,
        });
        return;
      }
      this.currentTick = message.tick;
      this.apply(message.source, () => this.store.applyUpdate(message.patch));
    });

    this.listen("user.add_order", (message) => {
      this.currentTick = message.tick;
      this.apply("user", () =>
        this.store.addOrder({
          id: message.orderId,
          destination: message.destination,
          createdAt: message.timestamp,
        }),
      );
    });
  }

  private apply(source: string, update: () => void): void {
    try {
      update();
    } catch (error) {
      if (!isMissionError(error)) {
        throw error;
      }
      logger.error(`Knowledge update from ${source} rejected`, LogCategory.KNOWLEDGE, {
        error: error.message,
        details: error.details,
      });
    }
  }
}

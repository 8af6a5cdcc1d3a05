import { EventEmitter } from "node:events";
import { inject, injectable } from "inversify";
import type { AppConfig } from "../../../config/config";
import { TYPES } from "../../../config/Types";
import { logger } from "../../../infrastructure/utils/logger";
import { MissionCommandType } from "../../../shared/constants/CommandEnums";
import type { TerrainKind } from "../../../shared/constants/GridEnums";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { InvalidCellError, ValidationError } from "../../../shared/errors";
import type {
  CommandReceipt,
  DashboardView,
  MissionCommand,
} from "../../../shared/types/commands/MissionCommand";
import { samePoint } from "../../../shared/utils/mathUtils";
import type { EnvironmentSnapshot } from "../../types/simulation/grid";
import type { KnowledgeSnapshot } from "../../types/simulation/knowledge";
import type { ExecuteReport } from "../../types/simulation/mape";
import { GridView } from "../../world/GridView";
import { assertToggleAllowed, toggledTerrain } from "../../world/terrainRules";
import type { MessageBus } from "../bus/MessageBus";
import { AnalyzeSystem } from "../systems/analyze/AnalyzeSystem";
import { BusComponent } from "../systems/BusComponent";
import { EnvironmentService } from "../systems/environment/EnvironmentService";
import { ExecuteSystem } from "../systems/execute/ExecuteSystem";
import { KnowledgeService } from "../systems/knowledge/KnowledgeService";
import { MonitorSystem } from "../systems/monitor/MonitorSystem";
import { PlanSystem } from "../systems/plan/PlanSystem";
import {
  CommandProcessor,
  OrderIdAllocator,
  type QueuedCommand,
} from "./runner/CommandProcessor";
import { buildDashboardView } from "./runner/dashboardView";

export interface LoopStats {
  ticks: number;
  timeouts: number;
  skipped: number;
  lastTickMs: number;
  avgTickMs: number;
  bufferedCommands: number;
  droppedCommands: number;
}

export interface MissionSnapshotEvent {
  view: DashboardView;
  report: ExecuteReport | null;
}

/**
 * Paces the MAPE-K loop.
 *
 * One tick at a time: buffered user commands are applied first (a reset
 * ahead of everything), then `monitor.request` starts the chain and the tick
 * ends on the matching `execute.result` or after `TICK_TIMEOUT_MS`.
 */
@injectable()
export class MapeLoopRunner extends BusComponent {
  protected readonly componentName = "MapeLoopRunner";
  private readonly emitter = new EventEmitter();
  private readonly commands: CommandProcessor;
  private readonly orderIds = new OrderIdAllocator();
  private readonly components: BusComponent[];
  private tickHandle?: NodeJS.Timeout;
  private tickCounter = 0;
  private tickInFlight = false;
  private initialized = false;

  private knowledge: KnowledgeSnapshot | null = null;
  private environment: EnvironmentSnapshot | null = null;
  private lastReport: { tick: number; report: ExecuteReport } | null = null;
  private stats: LoopStats = {
    ticks: 0,
    timeouts: 0,
    skipped: 0,
    lastTickMs: 0,
    avgTickMs: 0,
    bufferedCommands: 0,
    droppedCommands: 0,
  };

  constructor(
    @inject(TYPES.MessageBus) bus: MessageBus,
    @inject(TYPES.KnowledgeService) knowledgeService: KnowledgeService,
    @inject(TYPES.EnvironmentService) environmentService: EnvironmentService,
    @inject(TYPES.MonitorSystem) monitorSystem: MonitorSystem,
    @inject(TYPES.AnalyzeSystem) analyzeSystem: AnalyzeSystem,
    @inject(TYPES.PlanSystem) planSystem: PlanSystem,
    @inject(TYPES.ExecuteSystem) executeSystem: ExecuteSystem,
    @inject(TYPES.AppConfig) private readonly config: AppConfig,
  ) {
    super(bus);
    this.components = [
      knowledgeService,
      environmentService,
      monitorSystem,
      analyzeSystem,
      planSystem,
      executeSystem,
    ];
    this.commands = new CommandProcessor(bus, config.LOOP.MAX_COMMAND_QUEUE);
  }

  protected registerHandlers(): void {
    this.listen("knowledge.update", (message) => {
      if (message.snapshot) {
        this.knowledge = message.snapshot;
      }
    });
    this.listen("environment.update", (message) => {
      if (message.snapshot) {
        this.environment = message.snapshot;
      }
    });
  }

  /**
   * Attaches every component and seeds Knowledge and Environment.
   */
  public initialize(): void {
    if (this.initialized) {
      return;
    }
    for (const component of this.components) {
      component.attach();
    }
    this.attach();
    this.bus.publish("system.init", this.envelope(this.tickCounter));
    this.bus.flush();
    this.initialized = true;
    logger.info("🤖 MAPE-K loop initialized", LogCategory.LOOP, {
      tickIntervalMs: this.config.LOOP.TICK_INTERVAL_MS,
      capacity: this.config.ROBOT.CAPACITY,
    });
  }

  public on(event: "snapshot", listener: (event: MissionSnapshotEvent) => void): void {
    this.emitter.on(event, listener);
  }

  public off(event: "snapshot", listener: (event: MissionSnapshotEvent) => void): void {
    this.emitter.off(event, listener);
  }

  public getTickCounter(): number {
    return this.tickCounter;
  }

  public isTickInFlight(): boolean {
    return this.tickInFlight;
  }

  public getStats(): LoopStats {
    return {
      ...this.stats,
      bufferedCommands: this.commands.size,
      droppedCommands: this.commands.dropped,
    };
  }

  public getKnowledge(): KnowledgeSnapshot | null {
    return this.knowledge;
  }

  public getEnvironment(): EnvironmentSnapshot | null {
    return this.environment;
  }

  public getView(): DashboardView {
    return buildDashboardView({
      tick: this.tickCounter,
      now: Date.now(),
      knowledge: this.knowledge,
      environment: this.environment,
      lastReport: this.lastReport,
    });
  }

  /**
   * Validates a user command against the latest environment and applies it,
   * right away when no tick runs, otherwise before the next tick. A buffered
   * toggle is checked again when applied, so its receipt carries no terrain.
   *
   * @throws InvalidCellError for a destination that is not a house or an illegal toggle
   * @throws ValidationError before initialization
   */
  public submit(command: MissionCommand): CommandReceipt {
    const environment = this.environment;
    if (!this.initialized || !environment) {
      throw new ValidationError("Mission loop is not initialized");
    }

    const entry: QueuedCommand = { command };
    const receipt: CommandReceipt = { type: command.type, applied: false };
    let terrain: TerrainKind | undefined;

    switch (command.type) {
      case MissionCommandType.ADD_ORDER: {
        const destination = command.destination;
        if (!environment.houses.some((house) => samePoint(house, destination))) {
          throw new InvalidCellError(destination, "not a delivery house");
        }
        entry.orderId = this.orderIds.allocate();
        receipt.orderId = entry.orderId;
        break;
      }
      case MissionCommandType.TOGGLE_OBSTACLE: {
        const view = new GridView(environment);
        assertToggleAllowed(view, environment.robot.position, command.cell);
        terrain = toggledTerrain(view.terrainAt(command.cell));
        break;
      }
      case MissionCommandType.RESET:
        this.orderIds.reset();
        break;
    }

    if (this.tickInFlight) {
      this.commands.enqueue(entry);
      return receipt;
    }

    this.apply([entry]);
    receipt.applied = true;
    if (terrain !== undefined) {
      receipt.terrain = terrain;
    }
    this.emitSnapshot(null);
    return receipt;
  }

  private apply(entries: QueuedCommand[]): void {
    for (const entry of entries) {
      if (entry.command.type === MissionCommandType.RESET) {
        this.lastReport = null;
        logger.info("🔄 System reset", LogCategory.LOOP);
      }
      this.commands.dispatch(entry, this.envelope(this.tickCounter));
      this.bus.flush();
    }
  }

  /**
   * Runs one full Monitor → Analyze → Plan → Execute chain.
   *
   * @returns the Execute report, or null when skipped or timed out
   */
  public async tick(): Promise<ExecuteReport | null> {
    if (!this.initialized) {
      this.initialize();
    }
    if (this.tickInFlight) {
      this.stats.skipped++;
      logger.debug("Tick skipped, previous tick still running", LogCategory.LOOP);
      return null;
    }

    this.tickInFlight = true;
    const started = performance.now();
    try {
      this.apply(this.commands.drain());
      this.bus.flush();

      const tick = ++this.tickCounter;
      logger.setTick(tick);
      const completion = this.awaitReport(tick);
      this.bus.publish("monitor.request", this.envelope(tick));
      const report = await completion;
      this.bus.flush();

      const elapsed = performance.now() - started;
      this.stats.ticks++;
      this.stats.lastTickMs = elapsed;
      this.stats.avgTickMs += (elapsed - this.stats.avgTickMs) / this.stats.ticks;

      if (report) {
        this.lastReport = { tick, report };
      }
      this.emitSnapshot(report);
      return report;
    } finally {
      this.tickInFlight = false;
    }
  }

  private awaitReport(tick: number): Promise<ExecuteReport | null> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        unsubscribe();
        this.stats.timeouts++;
        logger.warn(`Tick ${tick} timed out after ${this.config.LOOP.TICK_TIMEOUT_MS} ms`, LogCategory.LOOP);
        resolve(null);
      }, this.config.LOOP.TICK_TIMEOUT_MS);

      const unsubscribe = this.bus.subscribe("execute.result", (message) => {
        if (message.tick !== tick) {
          return;
        }
        clearTimeout(timer);
        unsubscribe();
        resolve(message.report);
      });
    });
  }

  private emitSnapshot(report: ExecuteReport | null): void {
    this.emitter.emit("snapshot", { view: this.getView(), report });
  }

  /**
   * Starts the periodic trigger.
   */
  public start(): void {
    this.initialize();
    if (this.tickHandle) {
      return;
    }
    this.tickHandle = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logger.error("Tick failed", LogCategory.LOOP, {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.config.LOOP.TICK_INTERVAL_MS);
    logger.info(`🚀 Loop started (${this.config.LOOP.TICK_INTERVAL_MS} ms per tick)`, LogCategory.LOOP);
  }

  /**
   * Stops the trigger and drops buffered commands.
   */
  public stop(): void {
    if (this.tickHandle) {
      clearInterval(this.tickHandle);
      this.tickHandle = undefined;
    }
    this.commands.clear();
  }

  /**
   * Stops and unsubscribes every component from the bus. A later
   * `initialize()` attaches them again.
   */
  public dispose(): void {
    this.stop();
    for (const component of this.components) {
      component.detach();
    }
    this.detach();
    this.initialized = false;
    logger.info("MAPE-K loop disposed", LogCategory.LOOP);
  }
}

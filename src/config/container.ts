import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, type AppConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Every loop component is a singleton bound to one shared message bus. The
 * layout is fitted to the configured grid once, so Environment and Knowledge
 * agree on the houses.
 * `createContainer` builds an isolated graph, which is what tests use to get
 * a fresh loop with their own configuration.
 *
 * @module config
 */
import { InProcessMessageBus } from "../domain/simulation/bus/InProcessMessageBus";
import type { MessageBus } from "../domain/simulation/bus/MessageBus";
import { MapeLoopRunner } from "../domain/simulation/core/MapeLoopRunner";
import { AnalyzeSystem } from "../domain/simulation/systems/analyze/AnalyzeSystem";
import { EnvironmentService } from "../domain/simulation/systems/environment/EnvironmentService";
import { ExecuteSystem } from "../domain/simulation/systems/execute/ExecuteSystem";
import { KnowledgeService } from "../domain/simulation/systems/knowledge/KnowledgeService";
import { KnowledgeStore } from "../domain/simulation/systems/knowledge/KnowledgeStore";
import { MonitorSystem } from "../domain/simulation/systems/monitor/MonitorSystem";
import { PlanSystem } from "../domain/simulation/systems/plan/PlanSystem";
import type { GridLayout } from "../domain/types/simulation/grid";
import { DEFAULT_LAYOUT, fitLayout } from "../domain/world/layout";
import { MissionController } from "../infrastructure/controllers/missionController";

export interface ContainerOptions {
  config?: AppConfig;
  layout?: GridLayout;
}

export function createContainer(options: ContainerOptions = {}): Container {
  const container = new Container();
  const config = options.config ?? CONFIG;

  container.bind<AppConfig>(TYPES.AppConfig).toConstantValue(config);
  container.bind<GridLayout>(TYPES.GridLayout).toConstantValue(
    fitLayout(options.layout ?? DEFAULT_LAYOUT, {
      width: config.GRID.WIDTH,
      height: config.GRID.HEIGHT,
      base: config.GRID.BASE,
    }),
  );

  container
    .bind<MessageBus>(TYPES.MessageBus)
    .toDynamicValue(() => new InProcessMessageBus())
    .inSingletonScope();

  container
    .bind<KnowledgeStore>(TYPES.KnowledgeStore)
    .to(KnowledgeStore)
    .inSingletonScope();
  container
    .bind<KnowledgeService>(TYPES.KnowledgeService)
    .to(KnowledgeService)
    .inSingletonScope();
  container
    .bind<EnvironmentService>(TYPES.EnvironmentService)
    .to(EnvironmentService)
    .inSingletonScope();
  container
    .bind<MonitorSystem>(TYPES.MonitorSystem)
    .to(MonitorSystem)
    .inSingletonScope();
  container
    .bind<AnalyzeSystem>(TYPES.AnalyzeSystem)
    .to(AnalyzeSystem)
    .inSingletonScope();
  container.bind<PlanSystem>(TYPES.PlanSystem).to(PlanSystem).inSingletonScope();
  container
    .bind<ExecuteSystem>(TYPES.ExecuteSystem)
    .to(ExecuteSystem)
    .inSingletonScope();

  container
    .bind<MapeLoopRunner>(TYPES.MapeLoopRunner)
    .to(MapeLoopRunner)
    .inSingletonScope();
  container
    .bind<MissionController>(TYPES.MissionController)
    .to(MissionController)
    .inSingletonScope();

  return container;
}

export const container = createContainer();

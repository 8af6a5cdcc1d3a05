/**
 * Dependency injection type symbols.
 *
 * Used by Inversify container to identify and resolve dependencies.
 * Each symbol represents a unique service or component type.
 *
 * @module config
 */
export const TYPES = {
  AppConfig: Symbol.for("AppConfig"),
  MessageBus: Symbol.for("MessageBus"),
  GridLayout: Symbol.for("GridLayout"),

  KnowledgeStore: Symbol.for("KnowledgeStore"),
  KnowledgeService: Symbol.for("KnowledgeService"),
  EnvironmentService: Symbol.for("EnvironmentService"),
  MonitorSystem: Symbol.for("MonitorSystem"),
  AnalyzeSystem: Symbol.for("AnalyzeSystem"),
  PlanSystem: Symbol.for("PlanSystem"),
  ExecuteSystem: Symbol.for("ExecuteSystem"),

  MapeLoopRunner: Symbol.for("MapeLoopRunner"),
  MissionController: Symbol.for("MissionController"),
};

/**
 * Mission lifecycle enumerations.
 *
 * @module shared/constants/MissionEnums
 */

/**
 * Lifecycle of the single mission in flight.
 */
export enum MissionState {
  IDLE = "idle",
  COLLECTING = "collecting",
  ACTIVE = "active",
  RETURNING = "returning",
  STUCK = "stuck",
}

/**
 * Lifecycle of a delivery order.
 */
export enum OrderStatus {
  PENDING = "pending",
  LOADED = "loaded",
  DELIVERED = "delivered",
}

/**
 * Movement status reported by the robot model.
 */
export enum RobotStatus {
  IDLE = "idle",
  MOVING = "moving",
  STUCK = "stuck",
}

/**
 * Outcome of the Analyze rule table. Exactly one per tick.
 */
export enum AdaptationDecision {
  START_MISSION = "start_mission",
  REPLAN = "replan",
  ENTER_STUCK = "enter_stuck",
  RESUME = "resume",
  BEGIN_RETURN = "begin_return",
  COMPLETE_MISSION = "complete_mission",
  NO_ACTION = "no_action",
}

/**
 * Shape of the plan stage output.
 */
export enum PlanResultKind {
  /** A new route for Execute to adopt */
  ROUTE = "route",
  /** Mission state transition without a route */
  STATE = "state",
  /** Nothing to plan this tick */
  NONE = "none",
}

/**
 * What Execute did with the tick.
 */
export enum ExecuteOutcome {
  MOVED = "moved",
  BLOCKED = "blocked",
  LOADED = "loaded",
  TRANSITIONED = "transitioned",
  IDLE = "idle",
}

/**
 * Command type enumerations for user-originated mission commands.
 *
 * @module shared/constants/CommandEnums
 */

/**
 * Enumeration of commands accepted from HTTP and WebSocket clients.
 */
export enum MissionCommandType {
  ADD_ORDER = "ADD_ORDER",
  TOGGLE_OBSTACLE = "TOGGLE_OBSTACLE",
  RESET = "RESET",
}

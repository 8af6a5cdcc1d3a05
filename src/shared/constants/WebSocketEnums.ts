/**
 * WebSocket message type enumerations for the mission dashboard.
 *
 * @module shared/constants/WebSocketEnums
 */

/**
 * Messages pushed from the backend to dashboard clients.
 */
export enum WebSocketMessageType {
  SNAPSHOT = "SNAPSHOT",
  STATE = "STATE",
  ERROR = "ERROR",
  ACK = "ACK",
}

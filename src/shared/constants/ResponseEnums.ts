/**
 * `status` field of JSON command responses.
 *
 * @module shared/constants/ResponseEnums
 */

export enum ResponseStatus {
  OK = "ok",
  /** Buffered behind the tick in flight */
  QUEUED = "queued",
  ERROR = "error",
}

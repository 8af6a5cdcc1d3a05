/**
 * HTTP status codes answered by the mission API.
 *
 * @module shared/constants/HttpStatusCodes
 */

export enum HttpStatusCode {
  OK = 200,
  /** Command accepted; applied now or buffered until the running tick ends */
  ACCEPTED = 202,

  BAD_REQUEST = 400,
  NOT_FOUND = 404,

  INTERNAL_SERVER_ERROR = 500,
}

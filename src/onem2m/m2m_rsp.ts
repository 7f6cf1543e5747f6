import type { JSONObject } from "./m2m_base"

export interface M2M_RSP<T> {
  /**
   * Response Code
   */
  rsc: number
  /**
   * Request ID
   */
  rqi: number | string
  /**
   * Response
   */
  pc: T
  /**
   * originator
   */
  to: string
  /**
   * destination
   */
  fr: string
}

/**
 * Outcome of a dispatched operation.
 *
 * Expected failures never throw across the dispatcher: they come back as a
 * status code with an optional debug message.
 */
export interface M2MResult {
  rsc: M2MStatusCode
  pc?: JSONObject
  dbg?: string
}

export enum M2MStatusCode {
  ACCEPTED = 1000,
  OK = 2000,
  CREATED = 2001,
  DELETED = 2002,
  CHANGED = 2004,
  BAD_REQUEST = 4000,
  NOT_FOUND = 4004,
  OPERATION_NOT_ALLOWED = 4005,
  ORIGINATOR_HAS_NO_PRIVILEGE = 4103,
  CONFLICT = 4105,
  SECURITY_ASSOCIATION_REQUIRED = 4107,
  INVALID_CHILD_RESOURCE_TYPE = 4108,
  ORIGINATOR_HAS_ALREADY_REGISTERED = 4117,
  INTERNAL_SERVER_ERROR = 5000,
  NOT_IMPLEMENTED = 5001,
  TARGET_NOT_REACHABLE = 5103,
  TARGET_NOT_SUBSCRIBABLE = 5203,
  NOT_ACCEPTABLE = 5207,
  INVALID_ARGUMENTS = 6023,
}

export function isSuccess(rsc: number) {
  return rsc >= 2000 && rsc < 3000
}

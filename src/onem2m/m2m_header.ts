import type { JSONObject } from "./m2m_base"

/**
 * HTTP - 6.2.1
 */
export enum M2MOperation {
  CREATE = 1,
  RETRIEVE = 2,
  UPDATE = 3,
  DELETE = 4,
  NOTIFY = 5,
  DISCOVERY = 6,
}

export enum M2MKeys {
  debug = "m2m:dbg",
  cseBase = "m2m:cb",
  container = "m2m:cnt",
  contentInstance = "m2m:cin",
  applicationEntity = "m2m:ae",
  subscribe = "m2m:sub",
  uriList = "m2m:uril",
  childList = "m2m:ch",
  aggregatedResponse = "m2m:agr",
  response = "m2m:rsp",
  requestPrimitive = "m2m:rqp",
}

export const supportedContentTypes = [
  "application/json",
  "application/vnd.onem2m-res+json",
]

/**
 * Request primitive as seen by the dispatcher.
 *
 * Produced by a protocol binding, no framing is left at this point.
 */
export interface M2MRequest {
  /**
   * Operation
   */
  op: M2MOperation
  /**
   * Target address, optionally followed by `?<filter & result options>`
   */
  to: string
  /**
   * Originator
   */
  fr?: string
  /**
   * Request Identifier
   */
  rqi?: string
  /**
   * Declared resource type of a CREATE
   */
  ty?: number
  /**
   * Content type (without parameters), e.g. `application/json`
   */
  ct?: string
  /**
   * Primitive content
   */
  pc?: JSONObject
  /**
   * Filter criteria and result options
   *
   * Merged with the query part of `to`, explicit values win.
   */
  query?: Record<string, string | string[]>
}

/**
 * Split a `Content-Type` header into the media type and the `ty` parameter.
 *
 * An unsupported media type yields neither.
 *
 * `Ex`: `application/vnd.onem2m-res+json;ty=3` → `{ ct: "application/vnd.onem2m-res+json", ty: 3 }`
 */
export function parseContentType(header?: string): {
  ct?: string
  ty?: number
} {
  if (header == null) {
    return {}
  }
  const [mediaType, ...params] = header.split(";").map((s) => s.trim())
  if (!supportedContentTypes.includes(mediaType)) {
    return {}
  }
  for (const param of params) {
    const [key, value] = param.split("=")
    if (key === "ty" && value != null) {
      return {
        ct: mediaType,
        ty: /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN,
      }
    }
  }
  return { ct: mediaType }
}

import { z } from "zod"

import { M2MStatusCode } from "./m2m_rsp"
import { DateString, M2MType } from "./m2m_type"

export type JSONObject = Record<string, unknown>

/**
 * Common attributes of every resource
 *
 * `pi`, `ri`, `ty`, `ct`, `rn`, `lt`, `lbl`, `acpi`, `et`
 */
export interface M2MBase {
  /**
   * Parent resource's id
   *
   * Absent only for the CSEBase.
   */
  pi?: string
  /**
   * Resource Id
   *
   * Assigned by the CSE at creation, never changes.
   */
  ri: string
  /**
   * M2M resource type
   */
  ty: M2MType
  /**
   * Creation time
   */
  ct: DateString
  /**
   * Resource Name
   *
   * Unique among the siblings.
   */
  rn: string
  /**
   * Last Modified Time
   */
  lt: DateString
  /**
   * labels
   */
  lbl?: string[]
  /**
   * Access control policy ids
   *
   * Absent means the privileges of the parent apply (where the type allows).
   */
  acpi?: string[]
  /**
   * Expiration Time
   */
  et?: DateString
}

export class M2MError extends Error {
  public debugLog: string
  public responseCode: M2MStatusCode
  public constructor(msg: string, respCode?: M2MStatusCode) {
    super(msg)
    this.debugLog = msg
    this.responseCode = respCode ?? M2MStatusCode.INTERNAL_SERVER_ERROR
  }
}

export function isJSONObject(value: unknown): value is JSONObject {
  return typeof value === "object" && value != null && !Array.isArray(value)
}

/**
 * Convert between `Date` and the oneM2M basic time format
 * (`YYYYMMDDTHHMMSS`, an optional `,ffffff` fraction is accepted on parse).
 */
export function convertM2MTimestamp(param: Date): DateString
export function convertM2MTimestamp(param: DateString): Date
export function convertM2MTimestamp(param: Date | DateString): Date | DateString {
  if (param instanceof Date) {
    const toStr = (num: number, ln: number) =>
      num.toString(10).padStart(ln, "0")
    let out = ""
    out += toStr(param.getUTCFullYear(), 4)
    out += toStr(param.getUTCMonth() + 1, 2)
    out += toStr(param.getUTCDate(), 2)
    out += "T"
    out += toStr(param.getUTCHours(), 2)
    out += toStr(param.getUTCMinutes(), 2)
    out += toStr(param.getUTCSeconds(), 2)
    return out
  }
  const parseNum = (start: number, ln: number) =>
    Number.parseInt(param.substring(start, start + ln), 10)
  const fraction = param.indexOf(",")
  const millis =
    fraction >= 0 ? Math.floor(Number(`0.${param.substring(fraction + 1)}`) * 1000) : 0
  return new Date(
    Date.UTC(
      parseNum(0, 4),
      parseNum(4, 2) - 1,
      parseNum(6, 2),
      parseNum(9, 2),
      parseNum(11, 2),
      parseNum(13, 2),
      Number.isNaN(millis) ? 0 : millis
    )
  )
}

/**
 * Lenient variant of {@link convertM2MTimestamp} for values coming from
 * requests or stored attributes.
 */
export function parseM2MTimestamp(value: unknown): Date | undefined {
  if (typeof value !== "string" || !/^\d{8}T\d{6}(,\d+)?$/.test(value)) {
    return undefined
  }
  const date = convertM2MTimestamp(value)
  return Number.isNaN(date.getTime()) ? undefined : date
}

/**
 * Attributes a client may send for every resource type on CREATE.
 *
 * Unknown attributes pass through, the type decides what to do with them.
 */
export const m2mBaseSchema = z
  .object({
    rn: z
      .string()
      .min(1)
      .regex(/^[^/?#]+$/, "resource name must not contain a path separator")
      .optional(),
    lbl: z.array(z.string()).optional(),
    acpi: z.array(z.string()).optional(),
    et: z.string().optional(),
  })
  .passthrough()

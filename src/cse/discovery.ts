import Chalk from "chalk"
import Debug from "debug"
import queryString from "query-string"

import { M2MError, parseM2MTimestamp } from "../onem2m/m2m_base"
import { invalidArguments } from "../onem2m/m2m_debug"
import { M2MOperation } from "../onem2m/m2m_header"
import { M2MStatusCode } from "../onem2m/m2m_rsp"
import {
  DesiredIdentifierResultType,
  FilterOperation,
  FilterUsage,
  ResultContent,
} from "../onem2m/m2m_type"
import type { Resource } from "./resources/resource"
import type { ResourceStorage } from "./storage"

const debugDiscovery = Debug("CSE:discovery")

export type QueryMap = Record<string, string | string[]>

export interface HandlingOptions {
  /**
   * Maximum number of results
   */
  lim?: number
  /**
   * Depth below the root
   */
  lvl?: number
  /**
   * 1-based index of the first result
   */
  ofst?: number
  /**
   * Relative path applied to every match
   */
  arp?: string
}

export interface FilterConditions {
  crb?: Date
  cra?: Date
  ms?: Date
  us?: Date
  exb?: Date
  exa?: Date
  sts?: number
  stb?: number
  sza?: number
  szb?: number
  lbl?: string[]
  lbq?: string[]
  cty?: string[]
  ty?: number[]
  /**
   * Attribute equality predicates
   */
  attributes: Record<string, string>
}

export interface RequestArguments {
  fu: FilterUsage
  drt: DesiredIdentifierResultType
  rcn: ResultContent
  fo: FilterOperation
  handling: HandlingOptions
  conditions: FilterConditions
}

const timeConditions = ["crb", "cra", "ms", "us", "exb", "exa"] as const
const numberConditions = ["sts", "stb", "sza", "szb"] as const
const listConditions = ["lbl", "lbq", "cty"] as const
/**
 * Request parameters that are neither filter nor result options
 */
const ignoredKeys = ["rt", "rp", "rqet", "rset", "oet", "rvi", "rqi", "da"]
const knownKeys: readonly string[] = [
  "fu",
  "drt",
  "rcn",
  "fo",
  "lim",
  "lvl",
  "ofst",
  "arp",
  "ty",
  ...timeConditions,
  ...numberConditions,
  ...listConditions,
  ...ignoredKeys,
]

/**
 * Split a target into its path and its query
 *
 * `cse-in/cnt?fu=1&ty=4` → `{ path: "cse-in/cnt", query: { fu: "1", ty: "4" } }`
 */
export function splitTarget(to: string): { path: string; query: QueryMap } {
  const { url, query } = queryString.parseUrl(to)
  const result: QueryMap = {}
  for (const [key, value] of Object.entries(query)) {
    if (Array.isArray(value)) {
      result[key] = value.map((v) => v ?? "")
    } else {
      result[key] = value ?? ""
    }
  }
  return { path: url, query: result }
}

function invalid(key: string, value: unknown): never {
  throw new M2MError(
    `${invalidArguments}: ${key}=${String(value)}`,
    M2MStatusCode.INVALID_ARGUMENTS
  )
}

function valuesOf(query: QueryMap, key: string): string[] {
  const value = query[key]
  if (value == null) {
    return []
  }
  return Array.isArray(value) ? value : [value]
}

function firstOf(query: QueryMap, key: string): string | undefined {
  return valuesOf(query, key)[0]
}

function intOf(query: QueryMap, key: string, min?: number): number | undefined {
  const value = firstOf(query, key)
  if (value == null) {
    return undefined
  }
  if (!/^-?\d+$/.test(value)) {
    return invalid(key, value)
  }
  const num = Number.parseInt(value, 10)
  if (min != null && num < min) {
    return invalid(key, value)
  }
  return num
}

function enumOf<T extends number>(
  query: QueryMap,
  key: string,
  allowed: readonly T[],
  fallback: T
): T {
  const num = intOf(query, key)
  if (num == null) {
    return fallback
  }
  const found = allowed.find((v) => v === num)
  return found ?? invalid(key, num)
}

function listOf(query: QueryMap, key: string): string[] | undefined {
  const values = valuesOf(query, key)
    .flatMap((v) => v.split(/\s+/))
    .filter((v) => v.length > 0)
  return values.length > 0 ? values : undefined
}

const resultContents: readonly ResultContent[] = [
  ResultContent.NOTHING,
  ResultContent.ATTRIBUTES,
  ResultContent.HIERARCHICAL_ADDRESS,
  ResultContent.HIERARCHICAL_ADDRESS_ATTRIBUTES,
  ResultContent.ATTRIBUTES_AND_CHILD_RESOURCES,
  ResultContent.ATTRIBUTES_AND_CHILD_RESOURCE_REFERENCES,
  ResultContent.CHILD_RESOURCE_REFERENCES,
  ResultContent.ORIGINAL_RESOURCE,
  ResultContent.CHILD_RESOURCES,
  ResultContent.MODIFIED_ATTRIBUTES,
]

/**
 * Read filter criteria and result options from a query.
 *
 * Defaults: `fu=2`, `drt=1`, `fo=1`, `rcn=1` (`6` for discovery).
 * @throws M2MError `INVALID_ARGUMENTS`
 */
export function getRequestArguments(
  query: QueryMap = {},
  operation: M2MOperation = M2MOperation.RETRIEVE
): RequestArguments {
  const fu = enumOf(
    query,
    "fu",
    [FilterUsage.DISCOVERY, FilterUsage.CONDITIONAL_RETRIEVAL],
    operation === M2MOperation.DISCOVERY
      ? FilterUsage.DISCOVERY
      : FilterUsage.CONDITIONAL_RETRIEVAL
  )
  const drt = enumOf(
    query,
    "drt",
    [DesiredIdentifierResultType.STRUCTURED, DesiredIdentifierResultType.UNSTRUCTURED],
    DesiredIdentifierResultType.STRUCTURED
  )
  const fo = enumOf(
    query,
    "fo",
    [FilterOperation.AND, FilterOperation.OR],
    FilterOperation.AND
  )
  const rcn = enumOf(
    query,
    "rcn",
    resultContents,
    fu === FilterUsage.DISCOVERY
      ? ResultContent.CHILD_RESOURCE_REFERENCES
      : ResultContent.ATTRIBUTES
  )

  const handling: HandlingOptions = {
    lim: intOf(query, "lim", 0),
    lvl: intOf(query, "lvl", 1),
    ofst: intOf(query, "ofst", 1),
    arp: firstOf(query, "arp"),
  }

  const conditions: FilterConditions = { attributes: {} }
  for (const key of timeConditions) {
    const value = firstOf(query, key)
    if (value != null) {
      conditions[key] = parseM2MTimestamp(value) ?? invalid(key, value)
    }
  }
  for (const key of numberConditions) {
    conditions[key] = intOf(query, key, 0)
  }
  for (const key of listConditions) {
    conditions[key] = listOf(query, key)
  }
  const ty = listOf(query, "ty")
  if (ty != null) {
    conditions.ty = ty.map((value) =>
      /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : invalid("ty", value)
    )
  }
  for (const key of Object.keys(query)) {
    if (!knownKeys.includes(key)) {
      const value = firstOf(query, key)
      if (value != null) {
        conditions.attributes[key] = value
      }
    }
  }
  return { fu, drt, rcn, fo, handling, conditions }
}

function attributeMatches(value: unknown, expected: string): boolean {
  if (Array.isArray(value)) {
    return value.some((v) => attributeMatches(v, expected))
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return String(value) === expected
  }
  return false
}

function timeOf(resource: Resource, key: string) {
  return parseM2MTimestamp(resource.getAttribute(key))?.getTime()
}

/**
 * Evaluate the filter conditions against one resource.
 *
 * `ty` and `cty` each count as one condition whatever number of values they
 * list; the conditions are then combined by `fo`. No condition matches all.
 */
export function matchesConditions(
  resource: Resource,
  conditions: FilterConditions,
  fo: FilterOperation = FilterOperation.AND
): boolean {
  const results: boolean[] = []
  const compare = (
    actual: number | undefined,
    expected: number | undefined,
    test: (a: number, e: number) => boolean
  ) => {
    if (expected != null) {
      results.push(actual != null && test(actual, expected))
    }
  }
  const ct = timeOf(resource, "ct")
  const lt = timeOf(resource, "lt")
  const et = timeOf(resource, "et")
  const st = resource.getNumber("st")
  const cs = resource.getNumber("cs")

  if (conditions.ty != null) {
    results.push(conditions.ty.includes(resource.ty))
  }
  if (conditions.cty != null) {
    const cnf = resource.getString("cnf")
    const mediaType = cnf?.split(":")[0]
    results.push(mediaType != null && conditions.cty.includes(mediaType))
  }
  compare(ct, conditions.crb?.getTime(), (a, e) => a < e)
  compare(ct, conditions.cra?.getTime(), (a, e) => a > e)
  compare(lt, conditions.ms?.getTime(), (a, e) => a > e)
  compare(lt, conditions.us?.getTime(), (a, e) => a < e)
  compare(et, conditions.exb?.getTime(), (a, e) => a < e)
  compare(et, conditions.exa?.getTime(), (a, e) => a > e)
  compare(st, conditions.stb, (a, e) => a > e)
  compare(st, conditions.sts, (a, e) => a < e)
  compare(cs, conditions.sza, (a, e) => a >= e)
  compare(cs, conditions.szb, (a, e) => a < e)
  if (conditions.lbl != null) {
    const labels = resource.lbl
    results.push(conditions.lbl.some((l) => labels.includes(l)))
  }
  if (conditions.lbq != null) {
    const labels = resource.lbl
    results.push(conditions.lbq.every((l) => labels.includes(l)))
  }
  for (const [key, expected] of Object.entries(conditions.attributes)) {
    results.push(attributeMatches(resource.getAttribute(key), expected))
  }

  if (results.length === 0) {
    return true
  }
  return fo === FilterOperation.OR
    ? results.some((r) => r)
    : results.every((r) => r)
}

/**
 * Descendant search
 *
 * No access checks here, the dispatcher filters the result.
 */
export class DiscoveryEngine {
  public constructor(private readonly storage: ResourceStorage) {}

  public discover(
    root: Resource,
    args: Pick<RequestArguments, "handling" | "conditions" | "fo">
  ): Resource[] {
    const { handling, conditions, fo } = args
    let found = this.storage.queryDescendants(root.ri, {
      level: handling.lvl,
      match: (resource) => matchesConditions(resource, conditions, fo),
    })
    const arp = handling.arp
    if (arp != null && arp.length > 0) {
      found = found.flatMap((resource) => {
        const target =
          resource.srn != null
            ? this.storage.retrieveResourceBySrn(`${resource.srn}/${arp}`)
            : undefined
        return target != null ? [target] : []
      })
    }
    const start = (handling.ofst ?? 1) - 1
    const result = found.slice(
      start,
      handling.lim != null ? start + handling.lim : undefined
    )
    debugDiscovery(
      `${Chalk.gray("[discovery]")} ${root.ri} ${Chalk.green(result.length)} of ${found.length}`
    )
    return result
  }
}

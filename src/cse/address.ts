import Chalk from "chalk"
import Debug from "debug"

const debugAddress = Debug("CSE:address")

/**
 * A target after parsing
 *
 * `ri` unstructured resource id, `srn` structured path (starts with the
 * CSEBase name), `csi` target CSE-ID without `/` when the address named one.
 */
export interface M2MAddress {
  ri?: string
  csi?: string
  srn?: string
  spid?: string
}

/**
 * Lookups the resolver needs from the resource store
 */
export interface AddressIndex {
  riFromStructuredPath(srn: string): string | undefined
  structuredPathFromRI(ri: string): string | undefined
  resolveCseId(csi: string): string | undefined
}

/**
 * `/csi/...`
 */
export function isSPRelative(uri: string) {
  return uri.length >= 2 && uri[0] === "/" && uri[1] !== "/"
}

/**
 * `//spid/csi/...`
 */
export function isAbsolute(uri: string) {
  return uri.startsWith("//")
}

export function isCSERelative(uri: string) {
  return uri.length > 0 && uri[0] !== "/"
}

/**
 * Whether an id has more path separators than its addressing form needs
 * for a bare resource id.
 */
export function isStructured(uri: string) {
  const separators = uri.split("/").length - 1
  if (isCSERelative(uri)) {
    return separators > 0
  }
  if (isSPRelative(uri)) {
    return separators > 2
  }
  if (isAbsolute(uri)) {
    return separators > 4
  }
  return false
}

/**
 * Split a request target into its components.
 *
 * - `~/<csi>/<ri>` or `~/<csi>/<csern>/...` SP-relative
 * - `_/<spid>/<csi>/<ri>` or `_/<spid>/<csi>/<csern>/...` Absolute
 * - `<ri>` or `<csern>/...` CSE-relative
 *
 * A structured path below another CSE is only recognized when the local
 * CSE-ID (`csi`, without `/`) is given.
 *
 * @param path target without query
 * @param csern resource name of the local CSEBase
 * @param cseri resource id of the local CSEBase
 * @returns `undefined` if the address cannot be parsed
 */
export function parseAddress(
  path: string,
  csern: string,
  cseri: string,
  csi?: string
): M2MAddress | undefined {
  const id = path.startsWith("/") ? path.substring(1) : path
  if (id.length === 0) {
    return undefined
  }
  const ids = id.split("/")
  const idsLen = ids.length

  if (ids[0] === "~") {
    // SP-Relative
    if (idsLen < 3 || ids[1].length === 0) {
      return undefined
    }
    const target = ids[1]
    if (idsLen > 2 && ids[2] === csern) {
      return { csi: target, srn: ids.slice(2).join("/") }
    }
    if (idsLen === 3) {
      return { csi: target, ri: ids[2] }
    }
    if (csi != null && target !== csi) {
      return { csi: target, srn: ids.slice(2).join("/") }
    }
    return undefined
  }

  if (ids[0] === "_") {
    // Absolute
    if (idsLen < 4 || ids[2].length === 0) {
      return undefined
    }
    const spid = ids[1]
    const target = ids[2]
    if (idsLen > 3 && ids[3] === csern) {
      return { spid, csi: target, srn: ids.slice(3).join("/") }
    }
    if (idsLen === 4) {
      return { spid, csi: target, ri: ids[3] }
    }
    if (csi != null && target !== csi) {
      return { spid, csi: target, srn: ids.slice(3).join("/") }
    }
    return undefined
  }

  // CSE-Relative
  if (idsLen === 1 && (ids[0] !== csern || ids[0] === cseri)) {
    return { ri: ids[0] }
  }
  return { srn: ids.join("/") }
}

/**
 * Parse a target and map it to a local resource id where possible.
 *
 * A structured path goes through the path index. The `ri` stays unset when
 * nothing is found, `srn` and `csi` are kept for redirection.
 */
export function resolveAddress(
  path: string,
  csern: string,
  cseri: string,
  index: AddressIndex,
  csi?: string
): M2MAddress | undefined {
  const address = parseAddress(path, csern, cseri, csi)
  if (address == null) {
    debugAddress(`${Chalk.yellow("unresolvable")} ${path}`)
    return undefined
  }
  if (address.ri != null) {
    return address
  }
  if (address.srn == null) {
    return undefined
  }
  if (csi != null && address.csi != null && address.csi !== csi) {
    return address
  }
  return { ...address, ri: index.riFromStructuredPath(address.srn) }
}

/**
 * Structured path of a resource, derived from the parent's indexed path.
 */
export function structuredPath(
  resource: { rn: string; pi?: string },
  index: Pick<AddressIndex, "structuredPathFromRI">
) {
  if (resource.pi == null) {
    return resource.rn
  }
  const parentPath = index.structuredPathFromRI(resource.pi)
  if (parentPath == null) {
    debugAddress(
      `${Chalk.redBright("parent not found")} ${resource.pi} of ${resource.rn}`
    )
    return resource.rn
  }
  return `${parentPath}/${resource.rn}`
}

export const fanoutPointName = "fopt"

/**
 * Structured path of the fanOutPoint a path ends in or passes through.
 *
 * `cse-in/grp/fopt/la` → `cse-in/grp/fopt`
 */
export function fanoutPointPath(srn: string): string | undefined {
  const segment = `/${fanoutPointName}`
  if (srn.endsWith(segment)) {
    return srn
  }
  const index = srn.indexOf(`${segment}/`)
  if (index >= 0) {
    return srn.substring(0, index + segment.length)
  }
  return undefined
}

/**
 * AE-ID-Stem or CSE-ID of an originator given SP-relative or Absolute.
 */
export function getIdFromOriginator(originator: string, idOnly = false) {
  if (idOnly || originator.startsWith("/")) {
    const parts = originator.split("/")
    return parts[parts.length - 1]
  }
  return originator
}

/**
 * Whether an originator fully matches one of the regular expressions.
 */
export function isAllowedOriginator(
  originator: string | undefined,
  allowedOriginators: readonly string[]
) {
  if (originator == null || originator.length === 0) {
    return false
  }
  const id = getIdFromOriginator(originator)
  return allowedOriginators.some((pattern) => {
    let expression: RegExp
    try {
      expression = new RegExp(`^(?:${pattern})$`)
    } catch (err) {
      debugAddress(
        `${Chalk.redBright("invalid pattern")} ${pattern}: ${String(err)}`
      )
      return false
    }
    return expression.test(id) || expression.test(originator)
  })
}

/**
 * Request-primitive form of a target to the form {@link parseAddress} reads.
 *
 * `/csi/ri` → `~/csi/ri`, `//spid/csi/ri` → `_/spid/csi/ri`
 */
export function normalizeTarget(uri: string) {
  if (uri.startsWith("/~/") || uri.startsWith("/_/")) {
    return uri.substring(1)
  }
  if (isAbsolute(uri)) {
    return `_/${uri.substring(2)}`
  }
  if (isSPRelative(uri)) {
    return `~${uri}`
  }
  return uri
}

import type { JSONObject } from "../onem2m/m2m_base"
import { M2MKeys } from "../onem2m/m2m_header"
import { DesiredIdentifierResultType, latestOldestTypes } from "../onem2m/m2m_type"
import type { Resource } from "./resources/resource"

export interface ResourceTree {
  tree: JSONObject
  /**
   * Resources that found no place below the root
   */
  remaining: Resource[]
}

/**
 * `<latest>` and `<oldest>` never show up in a result
 */
export function withoutLatestOldest(resources: readonly Resource[]) {
  return resources.filter((resource) => !latestOldestTypes.includes(resource.ty))
}

/**
 * Identifier of a resource as `drt` asks for it
 *
 * Structured: `cse-in/ae/cnt`, unstructured: `/id-in/cnt123`
 */
export function resourceIdentifier(
  resource: Resource,
  drt: DesiredIdentifierResultType,
  csi: string
) {
  if (drt === DesiredIdentifierResultType.UNSTRUCTURED || resource.srn == null) {
    return `${csi}/${resource.ri}`
  }
  return resource.srn
}

/**
 * `{ "m2m:uril": [...] }`
 */
export function resourcesToURIList(
  resources: readonly Resource[],
  drt: DesiredIdentifierResultType,
  csi: string
): JSONObject {
  return {
    [M2MKeys.uriList]: withoutLatestOldest(resources).map((resource) =>
      resourceIdentifier(resource, drt, csi)
    ),
  }
}

/**
 * Child references `{ nm, typ, val }`, under `ch` of `target`, or under
 * `m2m:ch` when there is no target. `val` is the structured path or the
 * bare resource id.
 */
export function resourceTreeReferences(
  resources: readonly Resource[],
  target: JSONObject | undefined,
  drt: DesiredIdentifierResultType
): JSONObject {
  const result = target ?? {}
  if (resources.length === 0) {
    return result
  }
  result[target == null ? M2MKeys.childList : "ch"] = withoutLatestOldest(
    resources
  ).map((resource) => ({
    nm: resource.rn,
    typ: resource.ty,
    val:
      drt === DesiredIdentifierResultType.STRUCTURED && resource.srn != null
        ? resource.srn
        : resource.ri,
  }))
  return result
}

/**
 * Attach every resource accepted by `isChild`, and then recursively their
 * own children, grouped by type in order of first appearance.
 */
function partition(
  resources: readonly Resource[],
  isChild: (resource: Resource) => boolean
): { children: JSONObject; remaining: Resource[] } {
  let remaining = [...resources]
  const children: JSONObject = {}
  for (;;) {
    const first = remaining.find(isChild)
    if (first == null) {
      break
    }
    const sameType = (resource: Resource) =>
      isChild(resource) && resource.ty === first.ty
    const siblings = remaining.filter(sameType)
    remaining = remaining.filter((resource) => !sameType(resource))
    const nodes: JSONObject[] = []
    for (const sibling of siblings) {
      const sub = partition(remaining, (resource) => resource.pi === sibling.ri)
      remaining = sub.remaining
      nodes.push({ ...sibling.publicAttributes(), ...sub.children })
    }
    children[first.tpe] = nodes
  }
  return { children, remaining }
}

/**
 * Nest a flat resource list into a tree.
 *
 * With a root, the tree is the root's representation with its descendants
 * nested inside. Without, resources whose parent is not part of the list
 * form the top level.
 */
export function resourceTreeJSON(
  resources: readonly Resource[],
  root?: Resource
): ResourceTree {
  const candidates = withoutLatestOldest(resources)
  if (root != null) {
    const { children, remaining } = partition(
      candidates.filter((resource) => resource.ri !== root.ri),
      (resource) => resource.pi === root.ri
    )
    return {
      tree: { [root.tpe]: { ...root.publicAttributes(), ...children } },
      remaining,
    }
  }
  const ids = new Set(candidates.map((resource) => resource.ri))
  const { children, remaining } = partition(
    candidates,
    (resource) => resource.pi == null || !ids.has(resource.pi)
  )
  return { tree: children, remaining }
}

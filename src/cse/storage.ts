import Chalk from "chalk"
import Debug from "debug"

import type { JSONObject } from "../onem2m/m2m_base"
import { M2MType } from "../onem2m/m2m_type"
import { AddressIndex, structuredPath } from "./address"
import { Resource } from "./resources/resource"

const debugStorage = Debug("CSE:storage")

export interface DescendantQuery {
  /**
   * Depth below the root, unlimited when unset
   */
  level?: number
  match?: (resource: Resource) => boolean
}

/**
 * Store of resource records.
 *
 * Every read returns a fresh copy, callers never share an instance.
 */
export interface ResourceStorage extends AddressIndex {
  readonly size: number
  retrieveResource(ri: string): Resource | undefined
  retrieveResourceBySrn(srn: string): Resource | undefined
  hasResource(ri?: string, srn?: string): boolean
  /**
   * @returns `false` if the id or the structured path is taken
   */
  createResource(resource: Resource): boolean
  updateResource(resource: Resource): Resource
  deleteResource(ri: string): boolean
  /**
   * Descendants of `rootRi` in pre-order, the root excluded
   */
  queryDescendants(rootRi: string, query?: DescendantQuery): Resource[]
  /**
   * Direct children in creation order
   */
  childResources(pi: string, ty?: M2MType): Resource[]
}

/**
 * Builds a resource from a stored record
 */
export type ResourceHydrator = (record: JSONObject) => Resource

/**
 * In-memory store
 *
 * Records by id, with a structured path index, a CSE-ID index and a
 * children-by-parent index.
 */
export class MemoryStorage implements ResourceStorage {
  private readonly records = new Map<string, JSONObject>()
  private readonly srnIndex = new Map<string, string>()
  private readonly csiIndex = new Map<string, string>()
  private readonly children = new Map<string, Set<string>>()

  public constructor(private readonly hydrate: ResourceHydrator) {}

  public get size() {
    return this.records.size
  }

  public retrieveResource(ri: string) {
    const record = this.records.get(ri)
    return record == null ? undefined : this.hydrate(structuredClone(record))
  }

  public retrieveResourceBySrn(srn: string) {
    const ri = this.srnIndex.get(srn)
    return ri == null ? undefined : this.retrieveResource(ri)
  }

  public hasResource(ri?: string, srn?: string) {
    return (
      (ri != null && this.records.has(ri)) ||
      (srn != null && this.srnIndex.has(srn))
    )
  }

  public createResource(resource: Resource) {
    const srn = resource.srn ?? structuredPath(resource, this)
    if (this.hasResource(resource.ri, srn)) {
      debugStorage(`${Chalk.yellow("already exists")} ${resource.ri} ${srn}`)
      return false
    }
    resource.srn = srn
    this.records.set(resource.ri, structuredClone(resource.attributes))
    this.srnIndex.set(srn, resource.ri)
    const csi = cseIdOf(resource)
    if (csi != null) {
      this.csiIndex.set(csi, resource.ri)
    }
    if (resource.pi != null) {
      const siblings = this.children.get(resource.pi) ?? new Set<string>()
      siblings.add(resource.ri)
      this.children.set(resource.pi, siblings)
    }
    debugStorage(`${Chalk.green("create")} ${resource.ri} ${Chalk.gray(srn)}`)
    return true
  }

  public updateResource(resource: Resource) {
    const record = this.records.get(resource.ri)
    if (record == null) {
      throw new Error(`resource ${resource.ri} is not stored`)
    }
    if (resource.srn == null) {
      resource.srn = this.structuredPathFromRI(resource.ri)
    }
    this.records.set(resource.ri, structuredClone(resource.attributes))
    debugStorage(`${Chalk.blueBright("update")} ${resource.ri}`)
    return resource
  }

  public deleteResource(ri: string) {
    const record = this.records.get(ri)
    if (record == null) {
      return false
    }
    const resource = this.hydrate(record)
    this.records.delete(ri)
    if (resource.srn != null) {
      this.srnIndex.delete(resource.srn)
    }
    const csi = cseIdOf(resource)
    if (csi != null && this.csiIndex.get(csi) === ri) {
      this.csiIndex.delete(csi)
    }
    if (resource.pi != null) {
      this.children.get(resource.pi)?.delete(ri)
    }
    this.children.delete(ri)
    debugStorage(`${Chalk.redBright("delete")} ${ri}`)
    return true
  }

  public queryDescendants(rootRi: string, query: DescendantQuery = {}) {
    const result: Resource[] = []
    const walk = (pi: string, depth: number) => {
      if (query.level != null && depth > query.level) {
        return
      }
      for (const child of this.childResources(pi)) {
        if (query.match == null || query.match(child)) {
          result.push(child)
        }
        walk(child.ri, depth + 1)
      }
    }
    walk(rootRi, 1)
    return result
  }

  public childResources(pi: string, ty?: M2MType) {
    const result: Resource[] = []
    for (const ri of this.children.get(pi) ?? []) {
      const child = this.retrieveResource(ri)
      if (child != null && (ty == null || child.ty === ty)) {
        result.push(child)
      }
    }
    return result
  }

  public riFromStructuredPath(srn: string) {
    return this.srnIndex.get(srn)
  }

  public structuredPathFromRI(ri: string) {
    const record = this.records.get(ri)
    if (record == null) {
      return undefined
    }
    const srn = record[Resource.srnKey]
    return typeof srn === "string" ? srn : undefined
  }

  public resolveCseId(csi: string) {
    return this.csiIndex.get(csi)
  }
}

function cseIdOf(resource: Resource) {
  if (resource.ty !== M2MType.CSEBase && resource.ty !== M2MType.RemoteCSE) {
    return undefined
  }
  return resource.getString("csi")
}

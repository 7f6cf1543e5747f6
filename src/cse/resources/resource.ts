import Chalk from "chalk"
import Debug from "debug"
import shortid from "shortid"

import {
  convertM2MTimestamp,
  isJSONObject,
  JSONObject,
  parseM2MTimestamp,
} from "../../onem2m/m2m_base"
import type { M2MRequest } from "../../onem2m/m2m_header"
import { M2MResult, M2MStatusCode } from "../../onem2m/m2m_rsp"
import { M2MType, M2MTypeTag } from "../../onem2m/m2m_type"
import type { CSEConfig } from "../config"
import type { AccessFilter } from "../security"
import type { ResourceStorage } from "../storage"

const debugResource = Debug("CSE:resource")

/**
 * A resource, a resource-producing response or a failure
 */
export interface ResourceResult {
  resource?: Resource
  pc?: JSONObject
  rsc: M2MStatusCode
  dbg?: string
}

export interface CheckResult {
  ok: boolean
  rsc: M2MStatusCode
  dbg?: string
}

export const checkOK: CheckResult = { ok: true, rsc: M2MStatusCode.OK }

export function checkFailed(rsc: M2MStatusCode, dbg?: string): CheckResult {
  return { ok: false, rsc, dbg }
}

/**
 * Dispatcher operations available to resource hooks.
 *
 * Hooks run while the dispatcher holds the tree lock, so these never lock.
 */
export interface ResourceDispatcher {
  retrieveLocalResource(id: string): ResourceResult
  createResource(
    resource: Resource,
    parentResource: Resource | undefined,
    originator: string
  ): Promise<ResourceResult>
  updateResource(
    resource: Resource,
    payload: JSONObject | undefined,
    originator: string,
    doUpdateCheck?: boolean
  ): Promise<ResourceResult>
  deleteResource(
    resource: Resource,
    originator: string,
    withDeregistration?: boolean
  ): Promise<ResourceResult>
  processRequest(request: M2MRequest): Promise<M2MResult>
}

/**
 * Collaborators handed to resource hooks
 */
export interface ResourceContext {
  readonly config: CSEConfig
  readonly storage: ResourceStorage
  readonly dispatcher: ResourceDispatcher
  readonly security: AccessFilter
}

export interface ResourceOptions {
  readOnly?: boolean
  isVirtual?: boolean
  /**
   * Privileges are those of the parent
   */
  inheritACP?: boolean
  /**
   * Fixed resource name
   */
  rn?: string
}

/**
 * Values the CSE assigns when a resource is built from a CREATE
 */
export interface CreationInfo {
  now: Date
  expirationDelta: number
}

/**
 * Attributes a client may never set
 */
const assignedAttributes = ["ri", "pi", "ct", "lt"]
/**
 * Attributes a client may never change
 */
const immutableAttributes = ["ri", "rn", "pi", "ty", "ct", "lt"]

export const internalPrefix = "__"

/**
 * Random id part, never containing `fopt`
 */
export function randomID() {
  for (;;) {
    const id = shortid.generate()
    if (!id.includes("fopt")) {
      return id
    }
  }
}

export function uniqueRI(prefix: string) {
  return `${prefix}${randomID()}`
}

export function uniqueRN(prefix: string) {
  return `${prefix}_${randomID()}`
}

/**
 * Common part of every resource type.
 *
 * A resource is a request-scoped copy of a stored record; the store owns
 * the record itself.
 */
export abstract class Resource {
  public static readonly srnKey = "__srn__"

  public readonly ty: M2MType
  public readonly tpe: string
  public readonly readOnly: boolean
  public readonly isVirtual: boolean
  public readonly inheritACP: boolean
  public readonly attributes: JSONObject
  protected abstract readonly allowedChildTypes: readonly M2MType[]

  public constructor(
    ty: M2MType,
    attributes: JSONObject,
    pi: string | undefined,
    options: ResourceOptions = {},
    creation?: CreationInfo
  ) {
    this.ty = ty
    this.tpe = M2MTypeTag[ty]
    this.readOnly = options.readOnly ?? false
    this.isVirtual = options.isVirtual ?? false
    this.inheritACP = options.inheritACP ?? false
    this.attributes = structuredClone(attributes)
    this.attributes.ty = ty
    if (pi != null) {
      this.attributes.pi = pi
    }
    if (creation != null) {
      const prefix = this.tpe.replace(/^m2m:/, "")
      const now = convertM2MTimestamp(creation.now)
      this.setAttribute("ri", uniqueRI(prefix), false)
      this.setAttribute("rn", options.rn ?? uniqueRN(prefix), options.rn != null)
      this.setAttribute("ct", now)
      this.setAttribute("lt", now)
      if (!this.isVirtual && ty !== M2MType.CSEBase) {
        const et = new Date(creation.now.getTime() + creation.expirationDelta * 1000)
        this.setAttribute("et", convertM2MTimestamp(et), false)
      }
    }
  }

  public get ri(): string {
    return this.getString("ri") ?? ""
  }
  public get rn(): string {
    return this.getString("rn") ?? ""
  }
  public get pi(): string | undefined {
    return this.getString("pi")
  }
  public get ct(): string | undefined {
    return this.getString("ct")
  }
  public get lt(): string | undefined {
    return this.getString("lt")
  }
  public get srn(): string | undefined {
    return this.getString(Resource.srnKey)
  }
  public set srn(srn: string | undefined) {
    if (srn == null) {
      this.delAttribute(Resource.srnKey)
    } else {
      this.setAttribute(Resource.srnKey, srn)
    }
  }
  public get acpi(): string[] | undefined {
    return this.getStringList("acpi")
  }
  public get lbl(): string[] {
    return this.getStringList("lbl") ?? []
  }

  public getAttribute(key: string): unknown {
    return this.attributes[key]
  }
  public hasAttribute(key: string) {
    return Object.prototype.hasOwnProperty.call(this.attributes, key)
  }
  public getString(key: string): string | undefined {
    const value = this.attributes[key]
    return typeof value === "string" ? value : undefined
  }
  public getNumber(key: string): number | undefined {
    const value = this.attributes[key]
    return typeof value === "number" ? value : undefined
  }
  public getStringList(key: string): string[] | undefined {
    const value = this.attributes[key]
    if (!Array.isArray(value)) {
      return undefined
    }
    return value.filter((v): v is string => typeof v === "string")
  }
  public setAttribute(key: string, value: unknown, overwrite = true) {
    if (!overwrite && this.hasAttribute(key)) {
      return
    }
    this.attributes[key] = value
  }
  public delAttribute(key: string) {
    delete this.attributes[key]
  }

  /**
   * Whether resources of `childType` may be created below this one
   */
  public canHaveChild(childType: M2MType) {
    return this.allowedChildTypes.includes(childType)
  }

  /**
   * Last say of the parent before a child is stored
   */
  public childWillBeAdded(
    _child: Resource,
    _originator: string,
    _ctx: ResourceContext
  ): CheckResult {
    return checkOK
  }

  /**
   * Called once after the first write to the store.
   *
   * May create child resources and change own attributes.
   */
  public async activate(
    _parentResource: Resource | undefined,
    originator: string,
    ctx: ResourceContext
  ): Promise<CheckResult> {
    debugResource(`${Chalk.gray("activate")} ${this.ri}`)
    const expiration = this.checkExpirationTime(ctx)
    return expiration.ok ? this.validate(originator, ctx) : expiration
  }

  /**
   * Merge an UPDATE payload. `null` removes an attribute.
   */
  public async update(
    payload: JSONObject,
    originator: string,
    ctx: ResourceContext
  ): Promise<CheckResult> {
    const content = this.unwrap(payload)
    if (content == null) {
      return checkFailed(M2MStatusCode.BAD_REQUEST, "wrong resource type")
    }
    for (const key of Object.keys(content)) {
      if (immutableAttributes.includes(key) || key.startsWith(internalPrefix)) {
        return checkFailed(
          M2MStatusCode.BAD_REQUEST,
          `attribute ${key} cannot be updated`
        )
      }
    }
    const previous = structuredClone(this.attributes)
    for (const [key, value] of Object.entries(content)) {
      if (value === null) {
        this.delAttribute(key)
      } else {
        this.setAttribute(key, value)
      }
    }
    this.setAttribute("lt", convertM2MTimestamp(ctx.config.clock()))
    const expiration = this.checkExpirationTime(ctx)
    const result = expiration.ok ? this.validate(originator, ctx) : expiration
    if (!result.ok) {
      for (const key of Object.keys(this.attributes)) {
        delete this.attributes[key]
      }
      Object.assign(this.attributes, previous)
    }
    return result
  }

  /**
   * Whether `et` has passed at `now`. Resources without `et` never expire.
   */
  public isExpired(now: Date) {
    const et = parseM2MTimestamp(this.getAttribute("et"))
    return et != null && et.getTime() <= now.getTime()
  }

  /**
   * `et` must lie ahead, and is cut back to `maxExpirationDelta`
   */
  private checkExpirationTime(ctx: ResourceContext): CheckResult {
    const value = this.getAttribute("et")
    if (value == null) {
      return checkOK
    }
    const et = parseM2MTimestamp(value)
    if (et == null) {
      return checkFailed(M2MStatusCode.BAD_REQUEST, "invalid expirationTime")
    }
    const now = ctx.config.clock()
    if (et.getTime() <= now.getTime()) {
      return checkFailed(M2MStatusCode.BAD_REQUEST, "expirationTime is in the past")
    }
    const latest = new Date(now.getTime() + ctx.config.maxExpirationDelta * 1000)
    if (et.getTime() > latest.getTime()) {
      this.setAttribute("et", convertM2MTimestamp(latest))
    }
    return checkOK
  }

  /**
   * Type specific consistency check after a change
   */
  public validate(_originator: string, _ctx: ResourceContext): CheckResult {
    return checkOK
  }

  /**
   * Called before the resource is removed. Removes all children.
   */
  public async deactivate(originator: string, ctx: ResourceContext) {
    for (const child of ctx.storage.childResources(this.ri)) {
      const result = await ctx.dispatcher.deleteResource(child, originator)
      if (result.resource == null) {
        debugResource(
          `${Chalk.redBright("cannot remove child")} ${child.ri}: ${result.rsc}`
        )
      }
    }
  }

  public async childAdded(
    _child: Resource,
    _originator: string,
    _ctx: ResourceContext
  ): Promise<void> {
    // nothing
  }

  public async childRemoved(
    _child: Resource,
    _originator: string,
    _ctx: ResourceContext
  ): Promise<void> {
    // nothing
  }

  /**
   * Persist own attributes through the store
   */
  public dbUpdate(ctx: ResourceContext) {
    return ctx.storage.updateResource(this)
  }

  /**
   * Attributes without the internal ones
   */
  public publicAttributes(): JSONObject {
    const out: JSONObject = {}
    for (const [key, value] of Object.entries(this.attributes)) {
      if (!key.startsWith(internalPrefix)) {
        out[key] = structuredClone(value)
      }
    }
    return out
  }

  /**
   * Resource representation, wrapped in its type tag when `embedded`
   */
  public asJSON(embedded = true): JSONObject {
    const attrs = this.publicAttributes()
    return embedded ? { [this.tpe]: attrs } : attrs
  }

  /**
   * Payload without the optional `m2m:xxx` level.
   *
   * `undefined` if the level names another type.
   */
  protected unwrap(payload: JSONObject): JSONObject | undefined {
    const keys = Object.keys(payload)
    if (keys.length === 1 && keys[0].startsWith("m2m:")) {
      const inner = payload[keys[0]]
      if (keys[0] !== this.tpe || !isJSONObject(inner)) {
        return undefined
      }
      return inner
    }
    return payload
  }

  /**
   * Attributes assigned by the CSE, a CREATE payload must not carry them
   */
  public static readonly assignedAttributes: readonly string[] =
    assignedAttributes
}

/**
 * Addressable resource without stored semantics of its own.
 *
 * Requests reaching it are answered by the handlers.
 */
export abstract class VirtualResource extends Resource {
  public abstract handleRetrieveRequest(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext
  ): Promise<ResourceResult>
  public abstract handleCreateRequest(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext
  ): Promise<ResourceResult>
  public abstract handleUpdateRequest(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext
  ): Promise<ResourceResult>
  public abstract handleDeleteRequest(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext
  ): Promise<ResourceResult>
}

export function isVirtualResource(
  resource: Resource
): resource is VirtualResource {
  return resource instanceof VirtualResource
}

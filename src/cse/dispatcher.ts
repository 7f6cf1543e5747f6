import Chalk from "chalk"
import Debug from "debug"
import { isDeepStrictEqual } from "util"

import { isJSONObject, JSONObject, M2MError } from "../onem2m/m2m_base"
import {
  deregistrationFailed,
  invalidChildType,
  invalidResultContent,
  malformedContent,
  missingContentType,
  noPrivilege,
  readOnlyResource,
  resNotExists,
  resourceExists,
  targetMissing,
  transitDisabled,
} from "../onem2m/m2m_debug"
import { M2MOperation, M2MRequest, parseContentType } from "../onem2m/m2m_header"
import { M2MResult, M2MStatusCode } from "../onem2m/m2m_rsp"
import {
  FilterOperation,
  FilterUsage,
  M2MPermission,
  M2MType,
  ResultContent,
} from "../onem2m/m2m_type"
import {
  fanoutPointPath,
  M2MAddress,
  resolveAddress,
  structuredPath,
} from "./address"
import { bareCsi, CSEConfig } from "./config"
import {
  DiscoveryEngine,
  getRequestArguments,
  QueryMap,
  RequestArguments,
  splitTarget,
} from "./discovery"
import type { EventManager } from "./event"
import { ReadWriteLock } from "./lock"
import type { RegistrationManager } from "./registration"
import type { RemoteCSEManager } from "./remote"
import { resourceFromPayload } from "./resources/factory"
import {
  CheckResult,
  internalPrefix,
  isVirtualResource,
  Resource,
  ResourceContext,
  ResourceDispatcher,
  ResourceResult,
  VirtualResource,
} from "./resources/resource"
import {
  resourcesToURIList,
  resourceTreeJSON,
  resourceTreeReferences,
} from "./result_tree"
import type { AccessFilter } from "./security"
import type { ResourceStorage } from "./storage"

const debugDispatcher = Debug("CSE:dispatcher")

export interface DispatcherOptions {
  config: CSEConfig
  storage: ResourceStorage
  security: AccessFilter
  registration: RegistrationManager
  remote: RemoteCSEManager
  events: EventManager
  lock?: ReadWriteLock
}

/**
 * A request after target parsing
 */
interface PreparedRequest {
  request: M2MRequest
  address: M2MAddress
  /**
   * Resource id or structured path of the target
   */
  id: string
  query: QueryMap
  originator: string
}

const discoveryResultContents: readonly ResultContent[] = [
  ResultContent.ATTRIBUTES_AND_CHILD_RESOURCES,
  ResultContent.ATTRIBUTES_AND_CHILD_RESOURCE_REFERENCES,
  ResultContent.CHILD_RESOURCE_REFERENCES,
  ResultContent.CHILD_RESOURCES,
]

/**
 * Changed or new attributes of `after`, internal ones excluded
 */
export function resourceDiff(before: JSONObject, after: JSONObject): JSONObject {
  const diff: JSONObject = {}
  for (const [key, value] of Object.entries(after)) {
    if (key.startsWith(internalPrefix)) {
      continue
    }
    if (
      !Object.prototype.hasOwnProperty.call(before, key) ||
      !isDeepStrictEqual(before[key], value)
    ) {
      diff[key] = value
    }
  }
  return diff
}

function failure(rsc: M2MStatusCode, dbg?: string): M2MResult {
  return dbg != null ? { rsc, dbg } : { rsc }
}

/**
 * Result of a failed step. `M2MError` keeps its code, anything else gets
 * `fallback`.
 */
function errorResult(
  err: unknown,
  fallback = M2MStatusCode.INTERNAL_SERVER_ERROR
): M2MResult {
  if (err instanceof M2MError) {
    return failure(err.responseCode, err.debugLog)
  }
  return failure(fallback, err instanceof Error ? err.message : String(err))
}

/**
 * Routes requests to the resource tree
 *
 * `Resolve → Redirect? → Authorize → Execute → Notify/Rollback`
 */
export class Dispatcher implements ResourceDispatcher {
  public readonly lock: ReadWriteLock
  private readonly config: CSEConfig
  private readonly storage: ResourceStorage
  private readonly security: AccessFilter
  private readonly registration: RegistrationManager
  private readonly remote: RemoteCSEManager
  private readonly events: EventManager
  private readonly discovery: DiscoveryEngine
  private readonly context: ResourceContext

  public constructor(options: DispatcherOptions) {
    this.config = options.config
    this.storage = options.storage
    this.security = options.security
    this.registration = options.registration
    this.remote = options.remote
    this.events = options.events
    this.lock = options.lock ?? new ReadWriteLock()
    this.discovery = new DiscoveryEngine(this.storage)
    this.context = {
      config: this.config,
      storage: this.storage,
      dispatcher: this,
      security: this.security,
    }
  }

  /**
   * Single entry point. Never throws.
   */
  public async processRequest(request: M2MRequest): Promise<M2MResult> {
    try {
      switch (request.op) {
        case M2MOperation.RETRIEVE:
        case M2MOperation.DISCOVERY:
          return await this.retrieveRequest(request)
        case M2MOperation.CREATE:
          return await this.createRequest(request)
        case M2MOperation.UPDATE:
          return await this.updateRequest(request)
        case M2MOperation.DELETE:
          return await this.deleteRequest(request)
        default:
          return failure(
            M2MStatusCode.OPERATION_NOT_ALLOWED,
            `operation ${String(request.op)} is not supported`
          )
      }
    } catch (err) {
      const result = errorResult(err)
      debugDispatcher(
        `${Chalk.redBright("request failed")} ${request.to} ${result.rsc}: ${result.dbg ?? ""}`
      )
      return result
    }
  }

  /*
   * Retrieve
   */

  public async retrieveRequest(request: M2MRequest): Promise<M2MResult> {
    const prepared = this.prepare(request)
    if (!("address" in prepared)) {
      return prepared
    }
    const redirected = await this.redirect(prepared)
    if (redirected != null) {
      return redirected
    }
    return this.lock.read(() => this.handleRetrieveRequest(prepared))
  }

  private async handleRetrieveRequest(prepared: PreparedRequest): Promise<M2MResult> {
    const { request, id, query, originator } = prepared
    let args: RequestArguments
    try {
      args = getRequestArguments(query, request.op)
    } catch (err) {
      return errorResult(err, M2MStatusCode.INVALID_ARGUMENTS)
    }

    if (args.fu === FilterUsage.DISCOVERY && args.rcn !== ResultContent.ATTRIBUTES) {
      debugDispatcher(
        `${Chalk.blueBright("DISCOVERY")} ${id} ${Chalk.gray(`rcn: ${args.rcn}`)}`
      )
      if (!discoveryResultContents.includes(args.rcn)) {
        return failure(M2MStatusCode.INVALID_ARGUMENTS, invalidResultContent)
      }
      const root = this.retrieveLocalResource(id).resource
      if (root == null) {
        return failure(M2MStatusCode.NOT_FOUND, resNotExists)
      }
      const found = this.discovery
        .discover(root, args)
        .filter((resource) =>
          this.security.hasAccess(originator, resource, M2MPermission.DISCOVERY)
        )
      switch (args.rcn) {
        case ResultContent.CHILD_RESOURCE_REFERENCES:
          return this.ok(resourceTreeReferences(found, undefined, args.drt))
        case ResultContent.ATTRIBUTES_AND_CHILD_RESOURCE_REFERENCES:
          return this.ok({
            [root.tpe]: resourceTreeReferences(found, root.publicAttributes(), args.drt),
          })
        case ResultContent.ATTRIBUTES_AND_CHILD_RESOURCES:
          return this.ok({
            [root.tpe]: { ...root.publicAttributes(), ...resourceTreeJSON(found).tree },
          })
      }
      return this.ok(resourceTreeJSON(found).tree)
    }

    if (args.fu === FilterUsage.CONDITIONAL_RETRIEVAL || args.rcn === ResultContent.ATTRIBUTES) {
      debugDispatcher(
        `${Chalk.blueBright("RETRIEVE")} ${id} ${Chalk.gray(`originator: ${originator}`)}`
      )
      const target = this.retrieveLocalResource(id)
      if (target.resource == null) {
        return this.toResult(target)
      }
      let resource = target.resource
      if (isVirtualResource(resource)) {
        const handled = await resource.handleRetrieveRequest(
          request,
          id,
          originator,
          this.context
        )
        if (handled.resource == null) {
          return this.toResult(handled)
        }
        resource = handled.resource
      }
      if (!this.security.hasAccess(originator, resource, M2MPermission.RETRIEVE)) {
        return failure(M2MStatusCode.ORIGINATOR_HAS_NO_PRIVILEGE, noPrivilege)
      }
      if (args.rcn === ResultContent.ATTRIBUTES) {
        return this.ok(resource.asJSON())
      }
      const found = this.discovery
        .discover(resource, {
          handling: args.handling,
          conditions: { attributes: {} },
          fo: FilterOperation.AND,
        })
        .filter((child) =>
          this.security.hasAccess(originator, child, M2MPermission.RETRIEVE)
        )
      switch (args.rcn) {
        case ResultContent.ATTRIBUTES_AND_CHILD_RESOURCES:
          return this.ok(resourceTreeJSON(found, resource).tree)
        case ResultContent.ATTRIBUTES_AND_CHILD_RESOURCE_REFERENCES:
          return this.ok({
            [resource.tpe]: resourceTreeReferences(
              found,
              resource.publicAttributes(),
              args.drt
            ),
          })
        case ResultContent.CHILD_RESOURCE_REFERENCES:
          return this.ok(resourcesToURIList(found, args.drt, this.config.csi))
      }
      return failure(M2MStatusCode.INVALID_ARGUMENTS, invalidResultContent)
    }
    return failure(M2MStatusCode.INVALID_ARGUMENTS, invalidResultContent)
  }

  /**
   * Stored resource by id or structured path
   */
  public retrieveLocalResource(id: string): ResourceResult {
    const resource =
      this.storage.retrieveResource(id) ?? this.storage.retrieveResourceBySrn(id)
    if (resource == null) {
      return { rsc: M2MStatusCode.NOT_FOUND, dbg: resNotExists }
    }
    return { resource, rsc: M2MStatusCode.OK }
  }

  /*
   * Create
   */

  public async createRequest(request: M2MRequest): Promise<M2MResult> {
    const prepared = this.prepare(request)
    if (!("address" in prepared)) {
      return prepared
    }
    const redirected = await this.redirect(prepared)
    if (redirected != null) {
      return redirected
    }
    return this.lock.write(() => this.handleCreateRequest(prepared))
  }

  private async handleCreateRequest(prepared: PreparedRequest): Promise<M2MResult> {
    const { request, id, originator } = prepared
    debugDispatcher(
      `${Chalk.greenBright("CREATE")} ${id} ${Chalk.gray(`ty: ${request.ty}, originator: ${originator}`)}`
    )
    const ty = request.ty
    if (parseContentType(request.ct).ct == null || ty == null) {
      return failure(M2MStatusCode.BAD_REQUEST, missingContentType)
    }
    const parentResource = this.retrieveLocalResource(id).resource
    if (parentResource == null) {
      return failure(M2MStatusCode.NOT_FOUND, resNotExists)
    }
    if (
      !this.security.hasAccess(originator, parentResource, M2MPermission.CREATE, { ty })
    ) {
      return failure(
        ty === M2MType.ApplicationEntity
          ? M2MStatusCode.SECURITY_ASSOCIATION_REQUIRED
          : M2MStatusCode.ORIGINATOR_HAS_NO_PRIVILEGE,
        noPrivilege
      )
    }
    if (isVirtualResource(parentResource)) {
      return this.toResult(
        await parentResource.handleCreateRequest(request, id, originator, this.context)
      )
    }

    let resource: Resource
    try {
      resource = resourceFromPayload(ty, request.pc ?? {}, parentResource.ri, {
        now: this.config.clock(),
        expirationDelta: this.config.expirationDelta,
      })
    } catch (err) {
      return errorResult(err, M2MStatusCode.BAD_REQUEST)
    }

    const allowed = this.checkChildType(parentResource, resource)
    if (!allowed.ok) {
      return failure(allowed.rsc, allowed.dbg)
    }
    const accepted = parentResource.childWillBeAdded(resource, originator, this.context)
    if (!accepted.ok) {
      return failure(accepted.rsc, accepted.dbg)
    }
    resource.srn = structuredPath(resource, this.storage)
    if (this.storage.hasResource(resource.ri, resource.srn)) {
      return failure(M2MStatusCode.CONFLICT, resourceExists)
    }

    const registration = this.registration.checkResourceCreation(
      resource,
      originator,
      parentResource
    )
    if (!registration.ok) {
      return failure(registration.rsc, registration.dbg)
    }

    const created = await this.createResource(
      resource,
      parentResource,
      registration.originator
    )
    if (created.resource == null) {
      this.deregister(resource, registration.originator)
      return this.toResult(created)
    }
    return { rsc: M2MStatusCode.CREATED, pc: created.resource.asJSON() }
  }

  /**
   * Persist, activate and announce a new resource. Does not lock.
   */
  public async createResource(
    resource: Resource,
    parentResource: Resource | undefined,
    originator: string
  ): Promise<ResourceResult> {
    if (parentResource != null) {
      const allowed = this.checkChildType(parentResource, resource)
      if (!allowed.ok) {
        return { rsc: allowed.rsc, dbg: allowed.dbg }
      }
    }
    if (!this.storage.createResource(resource)) {
      return { rsc: M2MStatusCode.CONFLICT, dbg: resourceExists }
    }

    let activated: CheckResult
    try {
      activated = await resource.activate(parentResource, originator, this.context)
    } catch (err) {
      const result = errorResult(err)
      activated = { ok: false, rsc: result.rsc, dbg: result.dbg }
    }
    if (!activated.ok) {
      debugDispatcher(
        `${Chalk.redBright("activation failed")} ${resource.ri}: ${activated.dbg ?? activated.rsc}`
      )
      await resource.deactivate(originator, this.context)
      this.storage.deleteResource(resource.ri)
      return { rsc: activated.rsc, dbg: activated.dbg }
    }
    this.storage.updateResource(resource)

    if (parentResource != null) {
      const parent = this.storage.retrieveResource(parentResource.ri) ?? parentResource
      await parent.childAdded(resource, originator, this.context)
    }
    this.events.resourceCreated(resource, originator)
    return { resource, rsc: M2MStatusCode.CREATED }
  }

  /*
   * Update
   */

  public async updateRequest(request: M2MRequest): Promise<M2MResult> {
    const prepared = this.prepare(request)
    if (!("address" in prepared)) {
      return prepared
    }
    const redirected = await this.redirect(prepared)
    if (redirected != null) {
      return redirected
    }
    return this.lock.write(() => this.handleUpdateRequest(prepared))
  }

  private async handleUpdateRequest(prepared: PreparedRequest): Promise<M2MResult> {
    const { request, id, query, originator } = prepared
    debugDispatcher(
      `${Chalk.yellowBright("UPDATE")} ${id} ${Chalk.gray(`originator: ${originator}`)}`
    )
    let args: RequestArguments
    try {
      args = getRequestArguments(query, request.op)
    } catch (err) {
      return errorResult(err, M2MStatusCode.INVALID_ARGUMENTS)
    }
    if (parseContentType(request.ct).ct == null) {
      return failure(M2MStatusCode.BAD_REQUEST, missingContentType)
    }
    const target = this.retrieveLocalResource(id)
    if (target.resource == null) {
      return this.toResult(target)
    }
    const resource = target.resource
    if (resource.readOnly) {
      return failure(M2MStatusCode.OPERATION_NOT_ALLOWED, readOnlyResource)
    }
    const payload = request.pc
    if (payload == null) {
      return failure(M2MStatusCode.BAD_REQUEST, malformedContent)
    }

    const keys = Object.keys(payload)
    const inner = keys.length === 1 ? payload[keys[0]] : undefined
    const content = isJSONObject(inner) ? inner : payload
    const granted =
      "acpi" in content
        ? this.security.hasAccess(
            originator,
            resource,
            content.acpi === null ? M2MPermission.DELETE : M2MPermission.UPDATE,
            { checkSelf: true }
          )
        : this.security.hasAccess(originator, resource, M2MPermission.UPDATE)
    if (!granted) {
      return failure(M2MStatusCode.ORIGINATOR_HAS_NO_PRIVILEGE, noPrivilege)
    }

    if (isVirtualResource(resource)) {
      return this.toResult(
        await resource.handleUpdateRequest(request, id, originator, this.context)
      )
    }
    if (
      args.rcn !== ResultContent.ATTRIBUTES &&
      args.rcn !== ResultContent.MODIFIED_ATTRIBUTES
    ) {
      return failure(M2MStatusCode.NOT_IMPLEMENTED, invalidResultContent)
    }

    const before = resource.publicAttributes()
    const updated = await this.updateResource(resource, payload, originator)
    if (updated.resource == null) {
      return this.toResult(updated)
    }
    if (args.rcn === ResultContent.MODIFIED_ATTRIBUTES) {
      return {
        rsc: M2MStatusCode.CHANGED,
        pc: { [resource.tpe]: resourceDiff(before, updated.resource.attributes) },
      }
    }
    return { rsc: M2MStatusCode.CHANGED, pc: updated.resource.asJSON() }
  }

  /**
   * Apply a payload through the type's update hook and persist. Does not lock.
   */
  public async updateResource(
    resource: Resource,
    payload: JSONObject | undefined,
    originator: string,
    doUpdateCheck = true
  ): Promise<ResourceResult> {
    if (doUpdateCheck && payload != null) {
      const result = await resource.update(payload, originator, this.context)
      if (!result.ok) {
        return { rsc: result.rsc, dbg: result.dbg }
      }
    }
    this.storage.updateResource(resource)
    return { resource, rsc: M2MStatusCode.CHANGED }
  }

  /*
   * Delete
   */

  public async deleteRequest(request: M2MRequest): Promise<M2MResult> {
    const prepared = this.prepare(request)
    if (!("address" in prepared)) {
      return prepared
    }
    const redirected = await this.redirect(prepared)
    if (redirected != null) {
      return redirected
    }
    return this.lock.write(() => this.handleDeleteRequest(prepared))
  }

  private async handleDeleteRequest(prepared: PreparedRequest): Promise<M2MResult> {
    const { request, id, originator } = prepared
    debugDispatcher(
      `${Chalk.redBright("DELETE")} ${id} ${Chalk.gray(`originator: ${originator}`)}`
    )
    const target = this.retrieveLocalResource(id)
    if (target.resource == null) {
      return this.toResult(target)
    }
    const resource = target.resource
    if (!this.security.hasAccess(originator, resource, M2MPermission.DELETE)) {
      return failure(M2MStatusCode.ORIGINATOR_HAS_NO_PRIVILEGE, noPrivilege)
    }
    if (isVirtualResource(resource)) {
      return this.toResult(
        await resource.handleDeleteRequest(request, id, originator, this.context)
      )
    }
    return this.toResult(await this.deleteResource(resource, originator, true))
  }

  /**
   * Deactivate and remove a resource, then tell its parent. Does not lock.
   */
  public async deleteResource(
    resource: Resource,
    originator: string,
    withDeregistration = false
  ): Promise<ResourceResult> {
    if (withDeregistration) {
      const check = this.registration.checkResourceDeletion(resource, originator)
      if (!check.ok) {
        return { rsc: M2MStatusCode.BAD_REQUEST, dbg: check.dbg ?? deregistrationFailed }
      }
    }
    const parentResource =
      resource.pi != null ? this.storage.retrieveResource(resource.pi) : undefined
    await resource.deactivate(originator, this.context)
    this.storage.deleteResource(resource.ri)
    this.events.resourceDeleted(resource, originator)
    if (parentResource != null) {
      await parentResource.childRemoved(resource, originator, this.context)
    }
    return { resource, rsc: M2MStatusCode.DELETED }
  }

  /*
   * Helpers
   */

  /**
   * Split and resolve the target. A result instead when nothing is addressed.
   */
  private prepare(request: M2MRequest): PreparedRequest | M2MResult {
    const { path, query } = splitTarget(request.to)
    const address = resolveAddress(
      path,
      this.config.rn,
      this.config.ri,
      this.storage,
      bareCsi(this.config)
    )
    const id = address?.srn ?? address?.ri
    if (address == null || id == null) {
      debugDispatcher(`${Chalk.yellow("no target")} ${request.to}`)
      return failure(M2MStatusCode.NOT_FOUND, targetMissing)
    }
    return {
      request,
      address,
      id,
      query: { ...query, ...request.query },
      originator: request.fr ?? "",
    }
  }

  /**
   * Transit and fanOutPoint requests, handled outside the lock.
   *
   * `undefined` when the request stays with the generic handling.
   */
  private async redirect(prepared: PreparedRequest): Promise<M2MResult | undefined> {
    const { request, address, query, originator } = prepared
    if (this.remote.isTransitTarget(address.csi)) {
      if (!this.config.enableTransitRequests) {
        return failure(M2MStatusCode.OPERATION_NOT_ALLOWED, transitDisabled)
      }
      return this.remote.forward({ ...request, query }, address, originator)
    }
    const foptPath = address.srn != null ? fanoutPointPath(address.srn) : undefined
    const fopt =
      foptPath != null
        ? this.storage.retrieveResourceBySrn(foptPath)
        : address.ri != null
        ? this.storage.retrieveResource(address.ri)
        : undefined
    if (
      fopt == null ||
      fopt.ty !== M2MType.GroupFanOutPoint ||
      !isVirtualResource(fopt)
    ) {
      return undefined
    }
    debugDispatcher(`${Chalk.gray("redirect to fanOutPoint")} ${fopt.ri}`)
    return this.toResult(
      await this.handleVirtual(fopt, { ...request, query }, prepared.id, originator)
    )
  }

  private handleVirtual(
    resource: VirtualResource,
    request: M2MRequest,
    id: string,
    originator: string
  ): Promise<ResourceResult> {
    switch (request.op) {
      case M2MOperation.CREATE:
        return resource.handleCreateRequest(request, id, originator, this.context)
      case M2MOperation.UPDATE:
        return resource.handleUpdateRequest(request, id, originator, this.context)
      case M2MOperation.DELETE:
        return resource.handleDeleteRequest(request, id, originator, this.context)
    }
    return resource.handleRetrieveRequest(request, id, originator, this.context)
  }

  private checkChildType(parentResource: Resource, resource: Resource): CheckResult {
    if (parentResource.canHaveChild(resource.ty)) {
      return { ok: true, rsc: M2MStatusCode.OK }
    }
    return {
      ok: false,
      rsc:
        resource.ty === M2MType.Subscribe
          ? M2MStatusCode.TARGET_NOT_SUBSCRIBABLE
          : M2MStatusCode.INVALID_CHILD_RESOURCE_TYPE,
      dbg: invalidChildType(parentResource.tpe, resource.tpe),
    }
  }

  /**
   * Undo a registration after a failed create. Failures are only logged.
   */
  private deregister(resource: Resource, originator: string) {
    const result = this.registration.checkResourceDeletion(resource, originator)
    if (!result.ok) {
      debugDispatcher(
        `${Chalk.redBright(deregistrationFailed)} ${resource.ri}: ${result.dbg ?? result.rsc}`
      )
    }
  }

  private ok(pc: JSONObject): M2MResult {
    return { rsc: M2MStatusCode.OK, pc }
  }

  private toResult(result: ResourceResult): M2MResult {
    const response: M2MResult = { rsc: result.rsc }
    const pc = result.resource?.asJSON() ?? result.pc
    if (pc != null) {
      response.pc = pc
    }
    if (result.dbg != null) {
      response.dbg = result.dbg
    }
    return response
  }
}

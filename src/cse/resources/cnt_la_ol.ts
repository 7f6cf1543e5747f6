import type { JSONObject } from "../../onem2m/m2m_base"
import { noInstance, operationNotAllowedFor } from "../../onem2m/m2m_debug"
import type { M2MRequest } from "../../onem2m/m2m_header"
import { M2MStatusCode } from "../../onem2m/m2m_rsp"
import { M2MType } from "../../onem2m/m2m_type"
import {
  CreationInfo,
  Resource,
  ResourceContext,
  ResourceResult,
  VirtualResource,
} from "./resource"

/**
 * `<latest>` / `<oldest>` of a container
 *
 * Stands for the newest or the oldest content instance of the parent.
 */
abstract class InstancePointer extends VirtualResource {
  protected readonly allowedChildTypes: readonly M2MType[] = []
  protected abstract readonly label: string

  protected abstract pick(instances: Resource[]): Resource | undefined

  protected instance(ctx: ResourceContext) {
    if (this.pi == null) {
      return undefined
    }
    return this.pick(ctx.storage.childResources(this.pi, M2MType.ContentInstance))
  }

  public async handleRetrieveRequest(
    _request: M2MRequest,
    _id: string,
    _originator: string,
    ctx: ResourceContext
  ): Promise<ResourceResult> {
    const resource = this.instance(ctx)
    if (resource == null) {
      return { rsc: M2MStatusCode.NOT_FOUND, dbg: noInstance(this.label) }
    }
    return { resource, rsc: M2MStatusCode.OK }
  }

  public async handleCreateRequest(): Promise<ResourceResult> {
    return {
      rsc: M2MStatusCode.OPERATION_NOT_ALLOWED,
      dbg: operationNotAllowedFor(this.label),
    }
  }

  public async handleUpdateRequest(): Promise<ResourceResult> {
    return {
      rsc: M2MStatusCode.OPERATION_NOT_ALLOWED,
      dbg: operationNotAllowedFor(this.label),
    }
  }

  public async handleDeleteRequest(
    _request: M2MRequest,
    _id: string,
    originator: string,
    ctx: ResourceContext
  ): Promise<ResourceResult> {
    const resource = this.instance(ctx)
    if (resource == null) {
      return { rsc: M2MStatusCode.NOT_FOUND, dbg: noInstance(this.label) }
    }
    return ctx.dispatcher.deleteResource(resource, originator)
  }
}

export class CNT_LA extends InstancePointer {
  protected readonly label = "latest"

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(
      M2MType.ContainerLatest,
      attributes,
      pi,
      { isVirtual: true, inheritACP: true, rn: "la" },
      creation
    )
  }

  protected pick(instances: Resource[]) {
    return instances[instances.length - 1]
  }
}

export class CNT_OL extends InstancePointer {
  protected readonly label = "oldest"

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(
      M2MType.ContainerOldest,
      attributes,
      pi,
      { isVirtual: true, inheritACP: true, rn: "ol" },
      creation
    )
  }

  protected pick(instances: Resource[]) {
    return instances[0]
  }
}

import Chalk from "chalk"
import Debug from "debug"

import type { JSONObject } from "../../onem2m/m2m_base"
import { noPrivilege, resNotExists } from "../../onem2m/m2m_debug"
import { M2MKeys, M2MRequest } from "../../onem2m/m2m_header"
import { M2MStatusCode } from "../../onem2m/m2m_rsp"
import { M2MPermission, M2MType } from "../../onem2m/m2m_type"
import {
  fanoutPointName,
  fanoutPointPath,
  isCSERelative,
  isStructured,
  normalizeTarget,
} from "../address"
import {
  CreationInfo,
  ResourceContext,
  ResourceResult,
  VirtualResource,
} from "./resource"

const debugGroup = Debug("CSE:group")

/**
 * `<fanOutPoint>` of a group
 *
 * A request to `grp/fopt[/rest]` goes to `<member>[/rest]` for every member.
 */
export class GroupFanOutPoint extends VirtualResource {
  protected readonly allowedChildTypes: readonly M2MType[] = []

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(
      M2MType.GroupFanOutPoint,
      attributes,
      pi,
      { isVirtual: true, inheritACP: true, rn: fanoutPointName },
      creation
    )
  }

  public handleRetrieveRequest(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext
  ) {
    return this.fanout(request, id, originator, ctx, M2MPermission.RETRIEVE)
  }

  public handleCreateRequest(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext
  ) {
    return this.fanout(request, id, originator, ctx, M2MPermission.CREATE)
  }

  public handleUpdateRequest(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext
  ) {
    return this.fanout(request, id, originator, ctx, M2MPermission.UPDATE)
  }

  public handleDeleteRequest(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext
  ) {
    return this.fanout(request, id, originator, ctx, M2MPermission.DELETE)
  }

  /**
   * @param id structured path the request addressed
   */
  private async fanout(
    request: M2MRequest,
    id: string,
    originator: string,
    ctx: ResourceContext,
    permission: M2MPermission
  ): Promise<ResourceResult> {
    const group = this.pi != null ? ctx.storage.retrieveResource(this.pi) : undefined
    if (group == null) {
      return { rsc: M2MStatusCode.NOT_FOUND, dbg: resNotExists }
    }
    if (!ctx.security.hasAccess(originator, group, permission)) {
      return { rsc: M2MStatusCode.ORIGINATOR_HAS_NO_PRIVILEGE, dbg: noPrivilege }
    }
    const foptPath = fanoutPointPath(id) ?? id
    const rest = id.substring(foptPath.length)
    const responses: JSONObject[] = []
    for (const mid of group.getStringList("mid") ?? []) {
      const to = normalizeTarget(`${this.memberPath(mid, rest, ctx)}${rest}`)
      debugGroup(`${Chalk.gray("[fopt]")} ${Chalk.blueBright(request.op)} ${to}`)
      const result = await ctx.dispatcher.processRequest({
        ...request,
        to,
        fr: originator,
      })
      const rsp: JSONObject = { rsc: result.rsc, fr: mid, to: originator }
      if (request.rqi != null) {
        rsp.rqi = request.rqi
      }
      if (result.pc != null) {
        rsp.pc = result.pc
      }
      if (result.dbg != null) {
        rsp.dbg = result.dbg
      }
      responses.push(rsp)
    }
    return {
      rsc: M2MStatusCode.OK,
      pc: { [M2MKeys.aggregatedResponse]: { [M2MKeys.response]: responses } },
    }
  }

  /**
   * A local member given by resource id takes its structured path, so a
   * remaining path can be appended.
   */
  private memberPath(mid: string, rest: string, ctx: ResourceContext) {
    if (rest.length === 0 || isStructured(mid)) {
      return mid
    }
    const localPrefix = `${ctx.config.csi}/`
    const ri = isCSERelative(mid)
      ? mid
      : mid.startsWith(localPrefix)
      ? mid.substring(localPrefix.length)
      : undefined
    return (ri != null ? ctx.storage.structuredPathFromRI(ri) : undefined) ?? mid
  }
}

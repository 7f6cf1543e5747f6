import type { JSONObject } from "../../onem2m/m2m_base"
import { M2MStatusCode } from "../../onem2m/m2m_rsp"
import { M2MType } from "../../onem2m/m2m_type"
import { GroupFanOutPoint } from "./grp_fopt"
import {
  checkFailed,
  checkOK,
  CheckResult,
  CreationInfo,
  Resource,
  ResourceContext,
} from "./resource"

/**
 * Group of resources, addressed together through its `fopt`
 */
export class GRP extends Resource {
  protected readonly allowedChildTypes: readonly M2MType[] = [
    M2MType.Subscribe,
    M2MType.GroupFanOutPoint,
  ]

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(M2MType.Group, attributes, pi, {}, creation)
    if (creation != null) {
      // mixed
      this.setAttribute("mt", 0, false)
    }
  }

  public get mid() {
    return this.getStringList("mid") ?? []
  }

  public async activate(
    parentResource: Resource | undefined,
    originator: string,
    ctx: ResourceContext
  ): Promise<CheckResult> {
    const result = await super.activate(parentResource, originator, ctx)
    if (!result.ok) {
      return result
    }
    const fopt = new GroupFanOutPoint({}, this.ri, {
      now: ctx.config.clock(),
      expirationDelta: ctx.config.expirationDelta,
    })
    const created = await ctx.dispatcher.createResource(fopt, this, originator)
    if (created.resource == null) {
      return checkFailed(created.rsc, created.dbg)
    }
    return checkOK
  }

  /**
   * Drop duplicate members and refresh `cnm`
   */
  public validate(): CheckResult {
    const mid = [...new Set(this.mid)]
    const mnm = this.getNumber("mnm")
    if (mnm != null && mid.length > mnm) {
      return checkFailed(
        M2MStatusCode.BAD_REQUEST,
        "maximum number of members exceeded"
      )
    }
    this.setAttribute("mid", mid)
    this.setAttribute("cnm", mid.length)
    return checkOK
  }
}

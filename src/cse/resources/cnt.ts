import Chalk from "chalk"
import Debug from "debug"

import type { JSONObject } from "../../onem2m/m2m_base"
import { M2MStatusCode } from "../../onem2m/m2m_rsp"
import { M2MType } from "../../onem2m/m2m_type"
import { CNT_LA, CNT_OL } from "./cnt_la_ol"
import {
  checkFailed,
  checkOK,
  CheckResult,
  CreationInfo,
  Resource,
  ResourceContext,
} from "./resource"

const debugContainer = Debug("CSE:container")

const limitAttributes = ["mni", "mbs", "mia"]

/**
 * Container
 *
 * Keeps `cni`/`cbs` in line with its content instances and drops the oldest
 * ones when `mni` or `mbs` is exceeded.
 */
export class CNT extends Resource {
  protected readonly allowedChildTypes: readonly M2MType[] = [
    M2MType.Container,
    M2MType.ContentInstance,
    M2MType.Subscribe,
    M2MType.ContainerLatest,
    M2MType.ContainerOldest,
  ]

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(M2MType.Container, attributes, pi, {}, creation)
    if (creation != null) {
      this.setAttribute("cni", 0)
      this.setAttribute("cbs", 0)
      this.setAttribute("st", 0)
    }
  }

  public get mni() {
    return this.getNumber("mni")
  }
  public get mbs() {
    return this.getNumber("mbs")
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
    const creation: CreationInfo = {
      now: ctx.config.clock(),
      expirationDelta: ctx.config.expirationDelta,
    }
    for (const pointer of [
      new CNT_LA({}, this.ri, creation),
      new CNT_OL({}, this.ri, creation),
    ]) {
      const created = await ctx.dispatcher.createResource(pointer, this, originator)
      if (created.resource == null) {
        return checkFailed(created.rsc, created.dbg)
      }
    }
    return checkOK
  }

  public validate(): CheckResult {
    for (const key of limitAttributes) {
      const value = this.getAttribute(key)
      if (
        value != null &&
        (typeof value !== "number" || !Number.isInteger(value) || value < 0)
      ) {
        return checkFailed(
          M2MStatusCode.BAD_REQUEST,
          `${key} must be a non-negative integer`
        )
      }
    }
    return checkOK
  }

  public childWillBeAdded(child: Resource): CheckResult {
    const mbs = this.mbs
    if (child.ty === M2MType.ContentInstance && mbs != null) {
      const cs = child.getNumber("cs") ?? 0
      if (cs > mbs) {
        return checkFailed(
          M2MStatusCode.NOT_ACCEPTABLE,
          `content size ${cs} exceeds mbs ${mbs}`
        )
      }
    }
    return checkOK
  }

  public async update(
    payload: JSONObject,
    originator: string,
    ctx: ResourceContext
  ): Promise<CheckResult> {
    const result = await super.update(payload, originator, ctx)
    if (result.ok) {
      await this.enforceLimits(originator, ctx)
      this.setAttribute("st", (this.getNumber("st") ?? 0) + 1)
    }
    return result
  }

  public async childAdded(
    child: Resource,
    originator: string,
    ctx: ResourceContext
  ) {
    if (child.ty !== M2MType.ContentInstance) {
      return
    }
    await this.enforceLimits(originator, ctx)
    this.setAttribute("st", (this.getNumber("st") ?? 0) + 1)
    this.dbUpdate(ctx)
  }

  public async childRemoved(
    child: Resource,
    _originator: string,
    ctx: ResourceContext
  ) {
    if (child.ty !== M2MType.ContentInstance || !ctx.storage.hasResource(this.ri)) {
      return
    }
    this.refreshCounters(ctx)
    this.dbUpdate(ctx)
  }

  /**
   * Remove the oldest instances until `mni` and `mbs` hold
   */
  private async enforceLimits(originator: string, ctx: ResourceContext) {
    const instances = ctx.storage.childResources(this.ri, M2MType.ContentInstance)
    const mni = this.mni
    const mbs = this.mbs
    let cbs = instances.reduce((sum, cin) => sum + (cin.getNumber("cs") ?? 0), 0)
    let oldest = instances.shift()
    while (
      oldest != null &&
      ((mni != null && instances.length + 1 > mni) || (mbs != null && cbs > mbs))
    ) {
      cbs -= oldest.getNumber("cs") ?? 0
      debugContainer(`${Chalk.yellow("drop oldest")} ${oldest.ri} of ${this.ri}`)
      const removed = await ctx.dispatcher.deleteResource(oldest, originator)
      if (removed.resource == null) {
        debugContainer(`${Chalk.redBright("cannot drop")} ${oldest.ri}: ${removed.rsc}`)
      }
      oldest = instances.shift()
    }
    this.refreshCounters(ctx)
  }

  private refreshCounters(ctx: ResourceContext) {
    const instances = ctx.storage.childResources(this.ri, M2MType.ContentInstance)
    this.setAttribute("cni", instances.length)
    this.setAttribute(
      "cbs",
      instances.reduce((sum, cin) => sum + (cin.getNumber("cs") ?? 0), 0)
    )
  }
}

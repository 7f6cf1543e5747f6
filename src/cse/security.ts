import Chalk from "chalk"
import Debug from "debug"

import { M2MPermission, M2MType } from "../onem2m/m2m_type"
import { isAllowedOriginator } from "./address"
import type { CSEConfig } from "./config"
import { ACP } from "./resources/acp"
import type { Resource } from "./resources/resource"
import type { ResourceStorage } from "./storage"

const debugSecurity = Debug("CSE:security")

export interface AccessOptions {
  /**
   * Evaluate the self-privileges (`pvs`) of the referenced policies
   */
  checkSelf?: boolean
  /**
   * Type of the resource to be created below `resource`
   */
  ty?: number
}

export interface AccessFilter {
  hasAccess(
    originator: string,
    resource: Resource,
    permission: M2MPermission,
    options?: AccessOptions
  ): boolean
}

/**
 * Types that fall back to the parent's privileges when they carry no `acpi`
 */
const inheritingTypes: readonly M2MType[] = [
  M2MType.Container,
  M2MType.ContentInstance,
  M2MType.Group,
  M2MType.Subscribe,
  M2MType.GroupFanOutPoint,
  M2MType.ContainerLatest,
  M2MType.ContainerOldest,
]

/**
 * Access decisions from access control policies
 */
export class SecurityManager implements AccessFilter {
  public constructor(
    private readonly config: CSEConfig,
    private readonly storage: ResourceStorage
  ) {}

  public hasAccess(
    originator: string,
    resource: Resource,
    permission: M2MPermission,
    options: AccessOptions = {}
  ): boolean {
    const granted = this.evaluate(originator, resource, permission, options)
    if (!granted) {
      debugSecurity(
        `${Chalk.redBright("denied")} ${originator} ${permission} on ${resource.ri}`
      )
    }
    return granted
  }

  private evaluate(
    originator: string,
    resource: Resource,
    permission: M2MPermission,
    options: AccessOptions
  ): boolean {
    if (!this.config.enableACPChecks || originator === this.config.adminOriginator) {
      return true
    }
    if (permission === M2MPermission.CREATE) {
      if (options.ty === M2MType.ApplicationEntity) {
        return (
          originator === "" ||
          originator === "C" ||
          originator === "S" ||
          isAllowedOriginator(originator, this.config.allowedAEOriginators)
        )
      }
      if (options.ty === M2MType.RemoteCSE) {
        return isAllowedOriginator(originator, this.config.allowedCSROriginators)
      }
    }
    if (resource.inheritACP) {
      return this.checkParent(originator, resource, permission)
    }
    if (resource instanceof ACP) {
      return resource.checkPermission(originator, permission, true)
    }
    const acpi = resource.acpi ?? []
    if (acpi.length === 0) {
      if (resource.ty === M2MType.ApplicationEntity) {
        return originator === resource.getString("aei")
      }
      if (resource.ty === M2MType.RemoteCSE) {
        return originator === resource.getString("csi")
      }
      if (inheritingTypes.includes(resource.ty)) {
        return this.checkParent(originator, resource, permission)
      }
      return false
    }
    return acpi.some((ri) => {
      const acp = this.storage.retrieveResource(ri)
      if (!(acp instanceof ACP)) {
        debugSecurity(`${Chalk.yellow("no policy")} ${ri} for ${resource.ri}`)
        return false
      }
      return acp.checkPermission(originator, permission, options.checkSelf)
    })
  }

  private checkParent(
    originator: string,
    resource: Resource,
    permission: M2MPermission
  ) {
    const parent =
      resource.pi != null ? this.storage.retrieveResource(resource.pi) : undefined
    if (parent == null) {
      return false
    }
    return this.evaluate(originator, parent, permission, {})
  }
}

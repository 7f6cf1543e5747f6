import Chalk from "chalk"
import Debug from "debug"

import { M2MStatusCode } from "../onem2m/m2m_rsp"
import { M2MType } from "../onem2m/m2m_type"
import { getIdFromOriginator } from "./address"
import type { CSEConfig } from "./config"
import { checkFailed, checkOK, CheckResult, randomID, Resource } from "./resources/resource"
import type { ResourceStorage } from "./storage"

const debugRegistration = Debug("CSE:registration")

export interface CreationCheck extends CheckResult {
  /**
   * Originator to continue with, possibly assigned here
   */
  originator: string
}

/**
 * Bookkeeping of AE and remoteCSE registrations
 */
export class RegistrationManager {
  public constructor(
    private readonly config: CSEConfig,
    private readonly storage: ResourceStorage
  ) {}

  /**
   * Registration of an AE or a remoteCSE. Other types pass unchanged.
   */
  public checkResourceCreation(
    resource: Resource,
    originator: string,
    _parentResource?: Resource
  ): CreationCheck {
    switch (resource.ty) {
      case M2MType.ApplicationEntity:
        return this.registerAE(resource, originator)
      case M2MType.RemoteCSE:
        return this.registerCSR(resource, originator)
    }
    return { ...checkOK, originator }
  }

  /**
   * @returns failure if the resource must not be removed
   */
  public checkResourceDeletion(resource: Resource, originator: string): CheckResult {
    if (resource.ty === M2MType.CSEBase) {
      debugRegistration(`${Chalk.redBright("refused")} removal of the CSEBase`)
      return checkFailed(M2MStatusCode.OPERATION_NOT_ALLOWED, "CSEBase cannot be removed")
    }
    if (resource.ty === M2MType.ApplicationEntity || resource.ty === M2MType.RemoteCSE) {
      debugRegistration(
        `${Chalk.yellow("deregister")} ${resource.ri} ${Chalk.gray(`by ${originator}`)}`
      )
    }
    return checkOK
  }

  private registerAE(resource: Resource, originator: string): CreationCheck {
    let aei = originator
    if (aei === "" || aei === "C" || aei === "S") {
      aei = `${aei === "" ? "C" : aei}${randomID()}`
    }
    aei = getIdFromOriginator(aei)
    if (this.storage.hasResource(aei)) {
      return {
        ...checkFailed(
          M2MStatusCode.ORIGINATOR_HAS_ALREADY_REGISTERED,
          `originator ${aei} has already registered`
        ),
        originator,
      }
    }
    resource.setAttribute("ri", aei)
    resource.setAttribute("aei", aei)
    debugRegistration(`${Chalk.green("AE")} ${aei}`)
    return { ...checkOK, originator: aei }
  }

  private registerCSR(resource: Resource, originator: string): CreationCheck {
    const csi = resource.getString("csi")
    if (csi == null || csi !== originator) {
      return {
        ...checkFailed(M2MStatusCode.BAD_REQUEST, "csi must equal the originator"),
        originator,
      }
    }
    if (csi === this.config.csi) {
      return {
        ...checkFailed(M2MStatusCode.BAD_REQUEST, "a CSE cannot register itself"),
        originator,
      }
    }
    const ri = getIdFromOriginator(csi)
    if (this.storage.hasResource(ri) || this.storage.resolveCseId(csi) != null) {
      return {
        ...checkFailed(
          M2MStatusCode.ORIGINATOR_HAS_ALREADY_REGISTERED,
          `CSE ${csi} has already registered`
        ),
        originator,
      }
    }
    resource.setAttribute("ri", ri)
    debugRegistration(`${Chalk.green("remoteCSE")} ${csi}`)
    return { ...checkOK, originator }
  }
}

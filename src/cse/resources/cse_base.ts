import type { JSONObject } from "../../onem2m/m2m_base"
import { M2MType, m2mTypes } from "../../onem2m/m2m_type"
import type { CSEConfig } from "../config"
import { CreationInfo, Resource } from "./resource"

/**
 * Root of the local resource tree
 */
export class CSEBase extends Resource {
  protected readonly allowedChildTypes: readonly M2MType[] = [
    M2MType.AccessControlPolicy,
    M2MType.ApplicationEntity,
    M2MType.Container,
    M2MType.Group,
    M2MType.RemoteCSE,
    M2MType.Subscribe,
  ]

  public constructor(attributes: JSONObject, creation?: CreationInfo) {
    super(M2MType.CSEBase, attributes, undefined, {}, creation)
  }

  public get csi() {
    return this.getString("csi") ?? ""
  }

  /**
   * A new CSEBase carrying the configured identity
   */
  public static fromConfig(config: CSEConfig) {
    return new CSEBase(
      {
        ri: config.ri,
        rn: config.rn,
        csi: config.csi,
        cst: config.cseType,
        srt: m2mTypes.filter((ty) => ty > 0),
        poa: config.poa,
      },
      { now: config.clock(), expirationDelta: config.expirationDelta }
    )
  }
}

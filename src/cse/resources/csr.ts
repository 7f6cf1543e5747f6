import type { JSONObject } from "../../onem2m/m2m_base"
import { M2MType } from "../../onem2m/m2m_type"
import { CreationInfo, Resource } from "./resource"

/**
 * Registration record of another CSE, the route for transit requests
 */
export class CSR extends Resource {
  protected readonly allowedChildTypes: readonly M2MType[] = [
    M2MType.AccessControlPolicy,
    M2MType.Container,
    M2MType.Group,
    M2MType.Subscribe,
  ]

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(M2MType.RemoteCSE, attributes, pi, {}, creation)
  }

  public get csi() {
    return this.getString("csi") ?? ""
  }

  public get poa() {
    return this.getStringList("poa") ?? []
  }
}

import type { JSONObject } from "../../onem2m/m2m_base"
import { M2MType } from "../../onem2m/m2m_type"
import { CreationInfo, Resource } from "./resource"

/**
 * Application Entity, registered by its originator
 */
export class AE extends Resource {
  protected readonly allowedChildTypes: readonly M2MType[] = [
    M2MType.AccessControlPolicy,
    M2MType.Container,
    M2MType.Group,
    M2MType.Subscribe,
  ]

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(M2MType.ApplicationEntity, attributes, pi, {}, creation)
  }

  /**
   * AE-ID, equal to the registering originator
   */
  public get aei() {
    return this.getString("aei")
  }
}

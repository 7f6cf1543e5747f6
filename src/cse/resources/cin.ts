import type { JSONObject } from "../../onem2m/m2m_base"
import { M2MType } from "../../onem2m/m2m_type"
import { CreationInfo, Resource } from "./resource"

/**
 * Byte length of a content value as it is sent on the wire
 */
export function contentSize(con: unknown) {
  return Buffer.byteLength(typeof con === "string" ? con : String(con), "utf8")
}

/**
 * Content Instance, immutable once created
 */
export class CIN extends Resource {
  protected readonly allowedChildTypes: readonly M2MType[] = []

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(
      M2MType.ContentInstance,
      attributes,
      pi,
      { readOnly: true, inheritACP: true },
      creation
    )
    if (creation != null) {
      this.setAttribute("cs", contentSize(this.getAttribute("con")))
    }
  }

  public get cs() {
    return this.getNumber("cs") ?? 0
  }
}

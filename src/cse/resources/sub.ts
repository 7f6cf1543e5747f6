import type { JSONObject } from "../../onem2m/m2m_base"
import { M2MStatusCode } from "../../onem2m/m2m_rsp"
import { M2MType } from "../../onem2m/m2m_type"
import {
  checkFailed,
  checkOK,
  CheckResult,
  CreationInfo,
  Resource,
} from "./resource"

/**
 * Subscription. Only the record is kept, delivery is not part of the CSE.
 */
export class SUB extends Resource {
  protected readonly allowedChildTypes: readonly M2MType[] = []

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(M2MType.Subscribe, attributes, pi, {}, creation)
    if (creation != null) {
      // notificationContentType: all attributes
      this.setAttribute("nct", 1, false)
    }
  }

  public validate(): CheckResult {
    const nu = this.getStringList("nu")
    if (nu == null || nu.length === 0) {
      return checkFailed(M2MStatusCode.BAD_REQUEST, "nu must not be empty")
    }
    return checkOK
  }
}

import { isJSONObject, JSONObject } from "../../onem2m/m2m_base"
import type { M2M_ACR } from "../../onem2m/m2m_acp"
import { M2MPermission, M2MType } from "../../onem2m/m2m_type"
import { CreationInfo, Resource } from "./resource"

/**
 * Whether an `acor` entry covers the originator
 *
 * `all` and `*` cover everyone, `C*` every originator starting with `C`.
 */
export function matchesOriginator(acor: string, originator: string) {
  if (acor === "all" || acor === "*") {
    return true
  }
  if (acor.endsWith("*")) {
    return originator.startsWith(acor.substring(0, acor.length - 1))
  }
  return acor === originator
}

function rulesOf(value: unknown): M2M_ACR[] {
  if (!isJSONObject(value) || !Array.isArray(value.acr)) {
    return []
  }
  const rules: M2M_ACR[] = []
  for (const rule of value.acr) {
    if (
      isJSONObject(rule) &&
      Array.isArray(rule.acor) &&
      typeof rule.acop === "number"
    ) {
      rules.push({
        acor: rule.acor.filter((v): v is string => typeof v === "string"),
        acop: rule.acop,
      })
    }
  }
  return rules
}

/**
 * Access Control Policy
 */
export class ACP extends Resource {
  protected readonly allowedChildTypes: readonly M2MType[] = []

  public constructor(attributes: JSONObject, pi?: string, creation?: CreationInfo) {
    super(M2MType.AccessControlPolicy, attributes, pi, {}, creation)
  }

  /**
   * Check the privileges (`pv`), or the self-privileges (`pvs`).
   */
  public checkPermission(
    originator: string,
    permission: M2MPermission,
    checkSelf = false
  ) {
    const rules = rulesOf(this.getAttribute(checkSelf ? "pvs" : "pv"))
    return rules.some(
      (rule) =>
        (rule.acop & permission) === permission &&
        rule.acor.some((acor) => matchesOriginator(acor, originator))
    )
  }
}

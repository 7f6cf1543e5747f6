import { z } from "zod"

import { M2MBase, m2mBaseSchema } from "./m2m_base"
import { M2MType } from "./m2m_type"

/**
 * One access control rule
 */
export interface M2M_ACR {
  /**
   * Originators the rule applies to
   *
   * `all`, `*`, an exact originator or a prefix ending in `*`
   */
  acor: string[]
  /**
   * Granted operations, see `M2MPermission`
   */
  acop: number
}

/**
 * oneM2M Access Control Policy
 */
export interface M2M_ACP extends M2MBase {
  ty: M2MType.AccessControlPolicy
  /**
   * Privileges for the resources referring to this policy
   */
  pv: { acr: M2M_ACR[] }
  /**
   * Privileges for this policy itself
   */
  pvs: { acr: M2M_ACR[] }
}

export type M2M_ACPRes = {
  "m2m:acp": M2M_ACP
}

export const acrListSchema = z.object({
  acr: z.array(
    z.object({
      acor: z.array(z.string()),
      acop: z.number().int().min(0).max(63),
    })
  ),
})

export const acpCreateSchema = m2mBaseSchema
  .extend({
    pv: acrListSchema,
    pvs: acrListSchema,
  })
  .passthrough()

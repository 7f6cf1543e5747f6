import { z } from "zod"

import { M2MBase, m2mBaseSchema } from "./m2m_base"
import { DateString, M2MType } from "./m2m_type"

/**
 * oneM2M AE(Application Entity)
 */
export interface M2M_AE extends M2MBase {
  ty: M2MType.ApplicationEntity
  /**
   * Expire Time
   */
  et: DateString
  /**
   * App-ID
   *
   * `Ex`: `0.2.481.2.0001.001.000111`
   */
  api: string
  /**
   * Request Reachability
   */
  rr: boolean
  /**
   * AE pointOfAccess
   *
   * `Ex`: http://123.123.123.123:123
   */
  poa?: string[]
  /**
   * Application Entity ID
   *
   * The (possibly CSE assigned) originator of the registration.
   */
  aei: string
}

export type M2M_AERes = {
  "m2m:ae": M2M_AE
}

export const aeCreateSchema = m2mBaseSchema
  .extend({
    api: z.string().min(1),
    rr: z.boolean(),
    poa: z.array(z.string()).optional(),
    aei: z.never().optional(),
  })
  .passthrough()

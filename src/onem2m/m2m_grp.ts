import { z } from "zod"

import { M2MBase, m2mBaseSchema } from "./m2m_base"
import { M2MType } from "./m2m_type"

/**
 * oneM2M Group
 */
export interface M2M_GRP extends M2MBase {
  ty: M2MType.Group
  /**
   * Member Type, `0` for mixed
   */
  mt: number
  /**
   * Member IDs
   */
  mid: string[]
  /**
   * Current Number of Members
   */
  cnm: number
  /**
   * Maximum Number of Members
   */
  mnm?: number
}

export type M2M_GRPRes = {
  "m2m:grp": M2M_GRP
}

export const grpCreateSchema = m2mBaseSchema
  .extend({
    mid: z.array(z.string().min(1)),
    mt: z.number().int().optional(),
    mnm: z.number().int().positive().optional(),
    cnm: z.never().optional(),
  })
  .passthrough()

import { z } from "zod"

import { M2MBase, m2mBaseSchema } from "./m2m_base"
import { DateString, M2MType } from "./m2m_type"

/**
 * oneM2M Container
 */
export interface M2M_CNT extends M2MBase {
  ty: M2MType.Container
  /**
   * Expire Time
   */
  et: DateString
  /**
   * State Tag, incremented on every change of the container
   */
  st: number
  /**
   * max Number Of Instances
   */
  mni?: number
  /**
   * Max Buffer Size
   */
  mbs?: number
  /**
   * Max Instance Age
   */
  mia?: number
  /**
   * Creator
   */
  cr?: string
  /**
   * Current number of Instance
   */
  cni: number
  /**
   * Current Byte Size
   */
  cbs: number
}

export type M2M_CNTRes = {
  "m2m:cnt": M2M_CNT
}

const limit = z.number().int().nonnegative()

export const cntCreateSchema = m2mBaseSchema
  .extend({
    mni: limit.optional(),
    mbs: limit.optional(),
    mia: limit.optional(),
    cni: z.never().optional(),
    cbs: z.never().optional(),
  })
  .passthrough()

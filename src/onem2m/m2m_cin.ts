import { z } from "zod"

import { M2MBase, m2mBaseSchema } from "./m2m_base"
import { DateString, M2MType } from "./m2m_type"

/**
 * oneM2M Content Instance
 */
export interface M2M_CIN extends M2MBase {
  ty: M2MType.ContentInstance
  /**
   * State Tag of the container when this instance was added
   */
  st: number
  /**
   * Expire Time
   */
  et: DateString
  /**
   * Content Size (bytes of `con`)
   */
  cs: number
  /**
   * Content Info
   *
   * `<media type>:<encoding>`, e.g. `text/plain:0`
   */
  cnf?: string
  /**
   * **Important**
   *
   * Content = Value
   */
  con: string
  /**
   * Creator
   */
  cr?: string
}

export type M2M_CINRes = {
  "m2m:cin": M2M_CIN
}

export const cinCreateSchema = m2mBaseSchema
  .extend({
    con: z.union([z.string(), z.number(), z.boolean()]),
    cnf: z.string().optional(),
    cs: z.never().optional(),
    st: z.never().optional(),
  })
  .passthrough()

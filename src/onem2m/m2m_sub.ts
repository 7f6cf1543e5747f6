import { z } from "zod"

import { M2MBase, m2mBaseSchema } from "./m2m_base"
import { M2MType } from "./m2m_type"

/**
 * oneM2M Subscription
 */
export interface M2M_SUB extends M2MBase {
  ty: M2MType.Subscribe
  /**
   * Nofication URL
   */
  nu: string[]
  /**
   * Event Notification Criteria
   */
  enc?: {
    /**
     * Notification Event Type
     */
    net: number[]
  }
  /**
   * Expiration Counter
   */
  exc?: number
  /**
   * Notification Content Type
   */
  nct?: number
  /**
   * Creator
   */
  cr?: string
}

export type M2M_SUBRes = {
  "m2m:sub": M2M_SUB
}

export const subCreateSchema = m2mBaseSchema
  .extend({
    nu: z.array(z.string().min(1)).min(1),
    enc: z.object({ net: z.array(z.number().int()) }).optional(),
    exc: z.number().int().positive().optional(),
    nct: z.number().int().optional(),
  })
  .passthrough()

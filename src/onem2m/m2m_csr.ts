import { z } from "zod"

import { M2MBase, m2mBaseSchema } from "./m2m_base"
import { M2MType } from "./m2m_type"

/**
 * oneM2M remoteCSE, the registration record of another CSE
 */
export interface M2M_CSR extends M2MBase {
  ty: M2MType.RemoteCSE
  /**
   * CSE-ID of the remote CSE, SP-relative (`/id-mn`)
   */
  csi: string
  /**
   * CSEBase address of the remote CSE (`/id-mn/cse-mn`)
   */
  cb?: string
  /**
   * remote CSE pointOfAccess
   *
   * `Ex`: http://10.0.0.2:8080, mqtt://10.0.0.2:1883
   */
  poa?: string[]
}

export type M2M_CSRRes = {
  "m2m:csr": M2M_CSR
}

export const csrCreateSchema = m2mBaseSchema
  .extend({
    csi: z.string().regex(/^\/[^/]+$/, "csi must be SP-relative"),
    cb: z.string().optional(),
    poa: z.array(z.string()).optional(),
  })
  .passthrough()

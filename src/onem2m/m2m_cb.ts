import { M2MBase } from "./m2m_base"
import { M2MType } from "./m2m_type"

/**
 * oneM2M CSE(Common Service Entity) Base
 *
 * The root of the local resource tree.
 */
export interface M2M_CB extends M2MBase {
  ty: M2MType.CSEBase
  /**
   * CSE(Common Service Entity) Type
   *
   * `1`: IN-CSE, `2`: MN-CSE, `3`: ASN-CSE
   */
  cst: 1 | 2 | 3
  /**
   * CSE(Common Service Entity) ID, SP-relative (`/id-in`)
   */
  csi: string
  /**
   * CSE Supported Resource Type
   */
  srt: number[]
  /**
   * CSE pointOfAccess
   *
   * `Ex`: http://123.123.123.123:123
   */
  poa: string[]
}

export type M2M_CBRes = {
  "m2m:cb": M2M_CB
}

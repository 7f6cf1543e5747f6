import { z } from "zod"

import { aeCreateSchema } from "../../onem2m/m2m_ae"
import { acpCreateSchema } from "../../onem2m/m2m_acp"
import { isJSONObject, JSONObject, M2MError } from "../../onem2m/m2m_base"
import { cinCreateSchema } from "../../onem2m/m2m_cin"
import { cntCreateSchema } from "../../onem2m/m2m_cnt"
import { csrCreateSchema } from "../../onem2m/m2m_csr"
import { malformedContent } from "../../onem2m/m2m_debug"
import { grpCreateSchema } from "../../onem2m/m2m_grp"
import { M2MStatusCode } from "../../onem2m/m2m_rsp"
import { subCreateSchema } from "../../onem2m/m2m_sub"
import { isM2MType, M2MType, typeOfTag } from "../../onem2m/m2m_type"
import { ACP } from "./acp"
import { AE } from "./ae"
import { CIN } from "./cin"
import { CNT } from "./cnt"
import { CNT_LA, CNT_OL } from "./cnt_la_ol"
import { CSEBase } from "./cse_base"
import { CSR } from "./csr"
import { GRP } from "./grp"
import { GroupFanOutPoint } from "./grp_fopt"
import { CreationInfo, internalPrefix, Resource } from "./resource"
import { SUB } from "./sub"

type ResourceBuilder = (
  attributes: JSONObject,
  pi: string | undefined,
  creation?: CreationInfo
) => Resource

const builders: Readonly<Record<M2MType, ResourceBuilder>> = {
  [M2MType.AccessControlPolicy]: (a, pi, c) => new ACP(a, pi, c),
  [M2MType.ApplicationEntity]: (a, pi, c) => new AE(a, pi, c),
  [M2MType.Container]: (a, pi, c) => new CNT(a, pi, c),
  [M2MType.ContentInstance]: (a, pi, c) => new CIN(a, pi, c),
  [M2MType.CSEBase]: (a, _pi, c) => new CSEBase(a, c),
  [M2MType.Group]: (a, pi, c) => new GRP(a, pi, c),
  [M2MType.RemoteCSE]: (a, pi, c) => new CSR(a, pi, c),
  [M2MType.Subscribe]: (a, pi, c) => new SUB(a, pi, c),
  [M2MType.ContainerLatest]: (a, pi, c) => new CNT_LA(a, pi, c),
  [M2MType.ContainerOldest]: (a, pi, c) => new CNT_OL(a, pi, c),
  [M2MType.GroupFanOutPoint]: (a, pi, c) => new GroupFanOutPoint(a, pi, c),
}

/**
 * Types a client may create, with their payload schema
 */
const createSchemas: Partial<
  Record<M2MType, z.ZodType<JSONObject, z.ZodTypeDef, unknown>>
> = {
  [M2MType.AccessControlPolicy]: acpCreateSchema,
  [M2MType.ApplicationEntity]: aeCreateSchema,
  [M2MType.Container]: cntCreateSchema,
  [M2MType.ContentInstance]: cinCreateSchema,
  [M2MType.Group]: grpCreateSchema,
  [M2MType.RemoteCSE]: csrCreateSchema,
  [M2MType.Subscribe]: subCreateSchema,
}

/**
 * Rebuild a resource from a stored record
 */
export function resourceFromRecord(record: JSONObject): Resource {
  const ty = record.ty
  if (typeof ty !== "number" || !isM2MType(ty)) {
    throw new M2MError(`unknown resource type in record: ${String(ty)}`)
  }
  const pi = typeof record.pi === "string" ? record.pi : undefined
  return builders[ty](record, pi)
}

/**
 * Build a new resource from a CREATE payload (`{ "m2m:cnt": {...} }`).
 *
 * The root key must name the declared type.
 * @throws M2MError `BAD_REQUEST`
 */
export function resourceFromPayload(
  ty: number,
  payload: JSONObject,
  pi: string,
  creation: CreationInfo
): Resource {
  const schema = isM2MType(ty) ? createSchemas[ty] : undefined
  if (!isM2MType(ty) || schema == null) {
    throw new M2MError(
      `resource type ${ty} cannot be created`,
      M2MStatusCode.BAD_REQUEST
    )
  }
  const keys = Object.keys(payload)
  const content = keys.length === 1 ? payload[keys[0]] : undefined
  if (typeOfTag(keys[0] ?? "") !== ty || !isJSONObject(content)) {
    throw new M2MError(malformedContent, M2MStatusCode.BAD_REQUEST)
  }
  if (content.ty != null && content.ty !== ty) {
    throw new M2MError(malformedContent, M2MStatusCode.BAD_REQUEST)
  }
  for (const key of Object.keys(content)) {
    if (Resource.assignedAttributes.includes(key) || key.startsWith(internalPrefix)) {
      throw new M2MError(
        `attribute ${key} is assigned by the CSE`,
        M2MStatusCode.BAD_REQUEST
      )
    }
  }
  const parsed = schema.safeParse(content)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new M2MError(
      issue != null
        ? `${malformedContent}: ${issue.path.join(".")} ${issue.message}`
        : malformedContent,
      M2MStatusCode.BAD_REQUEST
    )
  }
  return builders[ty](parsed.data, pi, creation)
}

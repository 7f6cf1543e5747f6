import { CSE, CSERuntimeOptions } from "../src/cse"
import { isJSONObject, JSONObject } from "../src/onem2m/m2m_base"
import { M2MResult } from "../src/onem2m/m2m_rsp"
import { M2MType } from "../src/onem2m/m2m_type"

/**
 * 2024-03-01T12:00:00Z, every test CSE runs on it
 */
export const fixedNow = new Date(Date.UTC(2024, 2, 1, 12, 0, 0))
export const fixedTimestamp = "20240301T120000"

export const admin = "CAdmin"

export async function startCSE(options: CSERuntimeOptions = {}) {
  const cse = new CSE({ clock: () => fixedNow, ...options })
  await cse.start()
  return cse
}

/**
 * Inner representation of a single-resource response
 */
export function contentOf(result: M2MResult, tag: string): JSONObject {
  const inner = result.pc?.[tag]
  if (!isJSONObject(inner)) {
    throw new Error(`no ${tag} in ${JSON.stringify(result.pc)}`)
  }
  return inner
}

/**
 * Register an AE and return its AE-ID
 */
export async function registerAE(cse: CSE, rn: string, originator = "C") {
  const result = await cse.create("cse-in", originator, M2MType.ApplicationEntity, {
    "m2m:ae": { rn, api: "Ntest", rr: true },
  })
  const aei = contentOf(result, "m2m:ae").aei
  if (typeof aei !== "string") {
    throw new Error(`registration of ${rn} failed: ${result.rsc} ${result.dbg ?? ""}`)
  }
  return aei
}

export async function createContainer(
  cse: CSE,
  parent: string,
  rn: string,
  originator = admin,
  attributes: JSONObject = {}
) {
  return cse.create(parent, originator, M2MType.Container, {
    "m2m:cnt": { rn, ...attributes },
  })
}

export async function createInstance(
  cse: CSE,
  parent: string,
  con: string,
  originator = admin,
  attributes: JSONObject = {}
) {
  return cse.create(parent, originator, M2MType.ContentInstance, {
    "m2m:cin": { con, ...attributes },
  })
}

import Chalk from "chalk"
import Debug from "debug"

import { CSE } from "./cse"
import { isJSONObject, JSONObject, M2MError } from "./onem2m/m2m_base"
import { M2MKeys } from "./onem2m/m2m_header"
import { isSuccess, M2MResult } from "./onem2m/m2m_rsp"
import { M2MType } from "./onem2m/m2m_type"

const debugDemo = Debug("CSE:main")

const appId = "Nsensor-demo"

export interface DemoResult {
  originator: string
  latest?: JSONObject
  discovered: string[]
}

function expectSuccess(step: string, result: M2MResult) {
  if (!isSuccess(result.rsc)) {
    throw new M2MError(`${step} failed: ${result.rsc} ${result.dbg ?? ""}`, result.rsc)
  }
  debugDemo(`${Chalk.green(step)} ${Chalk.gray(String(result.rsc))}`)
  return result
}

/**
 * Register an AE, store a few readings and read them back
 */
export async function runDemo(cse = new CSE()): Promise<DemoResult> {
  await cse.start()
  try {
    return await storeReadings(cse)
  } finally {
    cse.stop()
  }
}

async function storeReadings(cse: CSE): Promise<DemoResult> {
  const rn = cse.config.rn

  // register
  const registered = expectSuccess(
    "register AE",
    await cse.create(rn, "C", M2MType.ApplicationEntity, {
      "m2m:ae": { rn: "sensor", api: appId, rr: false, lbl: ["demo"] },
    })
  )
  const ae = registered.pc?.["m2m:ae"]
  const originator = isJSONObject(ae) && typeof ae.aei === "string" ? ae.aei : "C"

  // container with room for two readings
  expectSuccess(
    "create container",
    await cse.create(`${rn}/sensor`, originator, M2MType.Container, {
      "m2m:cnt": { rn: "temperature", mni: 2 },
    })
  )
  for (const reading of ["21.5", "22.0", "22.4"]) {
    expectSuccess(
      `store ${reading}`,
      await cse.create(`${rn}/sensor/temperature`, originator, M2MType.ContentInstance, {
        "m2m:cin": { con: reading, cnf: "text/plain:0" },
      })
    )
  }

  const latest = expectSuccess(
    "retrieve latest",
    await cse.retrieve(`${rn}/sensor/temperature/la`, originator)
  ).pc

  const discovery = expectSuccess(
    "discover instances",
    await cse.discover(rn, originator, { ty: String(M2MType.ContentInstance) })
  )
  const references = discovery.pc?.[M2MKeys.childList]
  const discovered = Array.isArray(references)
    ? references.flatMap((ref: unknown) =>
        isJSONObject(ref) && typeof ref.val === "string" ? [ref.val] : []
      )
    : []

  console.log(`Latest reading: ${JSON.stringify(latest)}`)
  console.log(`Stored readings: ${discovered.join(", ")}`)
  return { originator, latest, discovered }
}

if (require.main === module) {
  runDemo().catch((err: unknown) => {
    console.error(err)
    process.exitCode = 1
  })
}

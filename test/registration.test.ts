import { expect } from "chai"
import { describe, it } from "mocha"

import { M2MStatusCode } from "../src/onem2m/m2m_rsp"
import { M2MType } from "../src/onem2m/m2m_type"
import { CSE } from "../src/cse"
import { admin, contentOf, registerAE, startCSE } from "./helpers"

function createAE(cse: CSE, originator: string, rn: string) {
  return cse.create("cse-in", originator, M2MType.ApplicationEntity, {
    "m2m:ae": { rn, api: "Nregistration", rr: false },
  })
}

describe("AE registration", () => {
  it("assigns an AE-ID to an originator of C", async () => {
    const cse = await startCSE()
    const aei = await registerAE(cse, "first")
    expect(aei).to.match(/^C.+/)
    const ae = cse.storage.retrieveResourceBySrn("cse-in/first")
    expect(ae?.ri).to.equal(aei)
    expect(ae?.getString("aei")).to.equal(aei)
  })

  it("assigns different AE-IDs to every registration", async () => {
    const cse = await startCSE()
    const first = await registerAE(cse, "first")
    const second = await registerAE(cse, "second")
    expect(first).to.not.equal(second)
  })

  it("keeps a given AE-ID", async () => {
    const cse = await startCSE()
    const result = await createAE(cse, "Cmyapp", "app")
    expect(result.rsc).to.equal(M2MStatusCode.CREATED)
    expect(contentOf(result, "m2m:ae")).to.include({ ri: "Cmyapp", aei: "Cmyapp" })
  })

  it("takes the id part of an SP-relative originator", async () => {
    const cse = await startCSE()
    const result = await createAE(cse, "/id-in/Cmyapp", "app")
    expect(contentOf(result, "m2m:ae").aei).to.equal("Cmyapp")
  })

  it("refuses a second registration of the same originator", async () => {
    const cse = await startCSE()
    await createAE(cse, "Cmyapp", "app")
    const size = cse.storage.size
    expect(await createAE(cse, "Cmyapp", "again")).to.deep.equal({
      rsc: M2MStatusCode.ORIGINATOR_HAS_ALREADY_REGISTERED,
      dbg: "originator Cmyapp has already registered",
    })
    expect(cse.storage.size).to.equal(size)
  })

  it("frees the AE-ID again on deregistration", async () => {
    const cse = await startCSE()
    await createAE(cse, "Cmyapp", "app")
    expect((await cse.delete("cse-in/app", "Cmyapp")).rsc).to.equal(M2MStatusCode.DELETED)
    expect((await createAE(cse, "Cmyapp", "app")).rsc).to.equal(M2MStatusCode.CREATED)
  })

  it("rejects an AE-ID in the content", async () => {
    const cse = await startCSE()
    const result = await cse.create("cse-in", admin, M2MType.ApplicationEntity, {
      "m2m:ae": { rn: "app", api: "Nregistration", rr: false, aei: "Cforged" },
    })
    expect(result.rsc).to.equal(M2MStatusCode.BAD_REQUEST)
  })
})

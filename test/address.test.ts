import { expect } from "chai"
import { describe, it } from "mocha"

import {
  fanoutPointPath,
  getIdFromOriginator,
  isAllowedOriginator,
  isStructured,
  normalizeTarget,
  parseAddress,
  resolveAddress,
} from "../src/cse/address"
import { admin, createContainer, startCSE } from "./helpers"

const csern = "cse-in"
const cseri = "id-in"

describe("parseAddress", () => {
  it("reads CSE-relative ids and paths", () => {
    expect(parseAddress("cnt123", csern, cseri)).to.deep.equal({ ri: "cnt123" })
    expect(parseAddress("id-in", csern, cseri)).to.deep.equal({ ri: "id-in" })
    expect(parseAddress("cse-in", csern, cseri)).to.deep.equal({ srn: "cse-in" })
    expect(parseAddress("cse-in/ae1/cnt", csern, cseri)).to.deep.equal({
      srn: "cse-in/ae1/cnt",
    })
  })

  it("reads SP-relative addresses", () => {
    expect(parseAddress("~/id-in/cnt123", csern, cseri)).to.deep.equal({
      csi: "id-in",
      ri: "cnt123",
    })
    expect(parseAddress("~/id-in/cse-in/cnt", csern, cseri)).to.deep.equal({
      csi: "id-in",
      srn: "cse-in/cnt",
    })
  })

  it("reads absolute addresses", () => {
    expect(parseAddress("_/sp.example.com/id-in/cnt123", csern, cseri)).to.deep.equal({
      spid: "sp.example.com",
      csi: "id-in",
      ri: "cnt123",
    })
    expect(parseAddress("_/sp.example.com/id-in/cse-in/cnt", csern, cseri)).to.deep.equal({
      spid: "sp.example.com",
      csi: "id-in",
      srn: "cse-in/cnt",
    })
  })

  it("rejects addresses below the minimum number of segments", () => {
    expect(parseAddress("", csern, cseri)).to.equal(undefined)
    expect(parseAddress("/", csern, cseri)).to.equal(undefined)
    expect(parseAddress("~", csern, cseri)).to.equal(undefined)
    expect(parseAddress("~/", csern, cseri)).to.equal(undefined)
    expect(parseAddress("_/sp.example.com", csern, cseri)).to.equal(undefined)
    expect(parseAddress("~/id-in", csern, cseri)).to.equal(undefined)
    expect(parseAddress("_/sp.example.com/id-in", csern, cseri)).to.equal(undefined)
  })

  it("needs the local CSE-ID for a structured path of another CSE", () => {
    expect(parseAddress("~/id-mn/cse-mn/cnt", csern, cseri)).to.equal(undefined)
    expect(parseAddress("~/id-mn/cse-mn/cnt", csern, cseri, "id-in")).to.deep.equal({
      csi: "id-mn",
      srn: "cse-mn/cnt",
    })
  })
})

describe("resolveAddress", () => {
  it("maps structured paths to resource ids", async () => {
    const cse = await startCSE()
    await createContainer(cse, "cse-in", "box", admin)
    const ri = cse.storage.riFromStructuredPath("cse-in/box")
    expect(ri).to.be.a("string")
    expect(resolveAddress("cse-in/box", csern, cseri, cse.storage)).to.deep.equal({
      srn: "cse-in/box",
      ri,
    })
    expect(resolveAddress("~/id-in", csern, cseri, cse.storage)).to.equal(undefined)
    expect(resolveAddress("cse-in/nothing", csern, cseri, cse.storage)).to.deep.equal({
      srn: "cse-in/nothing",
      ri: undefined,
    })
  })

  it("round-trips every structured path of the tree", async () => {
    const cse = await startCSE()
    await createContainer(cse, "cse-in", "a", admin)
    await createContainer(cse, "cse-in/a", "b", admin)
    await createContainer(cse, "cse-in/a/b", "c", admin)
    for (const srn of ["cse-in", "cse-in/a", "cse-in/a/b", "cse-in/a/b/c", "cse-in/a/b/c/la"]) {
      const address = resolveAddress(srn, csern, cseri, cse.storage)
      const ri = address?.ri
      expect(ri, srn).to.be.a("string")
      expect(cse.storage.structuredPathFromRI(ri ?? "")).to.equal(srn)
    }
  })

  it("keeps a remote structured path unresolved", async () => {
    const cse = await startCSE()
    expect(
      resolveAddress("~/id-mn/cse-mn/cnt", csern, cseri, cse.storage, "id-in")
    ).to.deep.equal({ csi: "id-mn", srn: "cse-mn/cnt" })
  })
})

describe("address helpers", () => {
  it("tells structured from unstructured ids", () => {
    expect(isStructured("cnt123")).to.equal(false)
    expect(isStructured("cse-in/cnt")).to.equal(true)
    expect(isStructured("/id-in/cnt123")).to.equal(false)
    expect(isStructured("/id-in/cse-in/cnt")).to.equal(true)
    expect(isStructured("//sp/id-in/cnt123")).to.equal(false)
    expect(isStructured("//sp/id-in/cse-in/cnt")).to.equal(true)
  })

  it("normalizes request targets", () => {
    expect(normalizeTarget("/id-in/cnt123")).to.equal("~/id-in/cnt123")
    expect(normalizeTarget("//sp/id-in/cnt123")).to.equal("_/sp/id-in/cnt123")
    expect(normalizeTarget("/~/id-in/cnt123")).to.equal("~/id-in/cnt123")
    expect(normalizeTarget("cse-in/cnt")).to.equal("cse-in/cnt")
  })

  it("finds the fanOutPoint in a path", () => {
    expect(fanoutPointPath("cse-in/grp/fopt")).to.equal("cse-in/grp/fopt")
    expect(fanoutPointPath("cse-in/grp/fopt/la")).to.equal("cse-in/grp/fopt")
    expect(fanoutPointPath("cse-in/grp")).to.equal(undefined)
    expect(fanoutPointPath("cse-in/foptx/a")).to.equal(undefined)
  })

  it("extracts ids from originators", () => {
    expect(getIdFromOriginator("/id-mn")).to.equal("id-mn")
    expect(getIdFromOriginator("Cabc")).to.equal("Cabc")
    expect(getIdFromOriginator("//sp/id-mn/Cabc")).to.equal("Cabc")
  })

  it("matches originators against patterns", () => {
    expect(isAllowedOriginator("Cabc", ["C.*"])).to.equal(true)
    expect(isAllowedOriginator("Sabc", ["C.*"])).to.equal(false)
    expect(isAllowedOriginator("", ["C.*"])).to.equal(false)
    expect(isAllowedOriginator("/id-mn", ["/.*"])).to.equal(true)
    expect(isAllowedOriginator("Cabc", ["("])).to.equal(false)
  })
})

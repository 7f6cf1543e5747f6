import { expect } from "chai"
import { describe, it } from "mocha"

import { CIN } from "../src/cse/resources/cin"
import { CNT } from "../src/cse/resources/cnt"
import { CSEBase } from "../src/cse/resources/cse_base"
import { resourceFromRecord } from "../src/cse/resources/factory"
import { MemoryStorage } from "../src/cse/storage"
import { M2MType } from "../src/onem2m/m2m_type"

function populated() {
  const storage = new MemoryStorage(resourceFromRecord)
  storage.createResource(new CSEBase({ ri: "id-in", rn: "cse-in", csi: "/id-in" }))
  storage.createResource(new CNT({ ri: "cnt1", rn: "box" }, "id-in"))
  storage.createResource(new CIN({ ri: "cin1", rn: "r1", con: "a" }, "cnt1"))
  storage.createResource(new CNT({ ri: "cnt2", rn: "sub" }, "cnt1"))
  storage.createResource(new CIN({ ri: "cin2", rn: "r2", con: "b" }, "cnt2"))
  return storage
}

describe("MemoryStorage", () => {
  it("indexes structured paths and CSE-IDs", () => {
    const storage = populated()
    expect(storage.size).to.equal(5)
    expect(storage.structuredPathFromRI("cin2")).to.equal("cse-in/box/sub/r2")
    expect(storage.riFromStructuredPath("cse-in/box")).to.equal("cnt1")
    expect(storage.resolveCseId("/id-in")).to.equal("id-in")
    expect(storage.retrieveResourceBySrn("cse-in/box/r1")?.ri).to.equal("cin1")
  })

  it("refuses a taken id or structured path", () => {
    const storage = populated()
    expect(storage.createResource(new CNT({ ri: "cnt1", rn: "other" }, "id-in"))).to.equal(
      false
    )
    expect(storage.createResource(new CNT({ ri: "cnt9", rn: "box" }, "id-in"))).to.equal(false)
    expect(storage.size).to.equal(5)
    expect(storage.hasResource(undefined, "cse-in/other")).to.equal(false)
  })

  it("hands out copies of the records", () => {
    const storage = populated()
    const copy = storage.retrieveResource("cnt1")
    copy?.setAttribute("mni", 3)
    expect(storage.retrieveResource("cnt1")?.getAttribute("mni")).to.equal(undefined)
    if (copy == null) {
      throw new Error("missing")
    }
    storage.updateResource(copy)
    expect(storage.retrieveResource("cnt1")?.getAttribute("mni")).to.equal(3)
  })

  it("rejects the update of an unknown record", () => {
    const storage = populated()
    expect(() => storage.updateResource(new CNT({ ri: "ghost", rn: "ghost" }, "id-in"))).to.throw(
      "resource ghost is not stored"
    )
  })

  it("lists children and descendants", () => {
    const storage = populated()
    expect(storage.childResources("cnt1").map((r) => r.ri)).to.deep.equal(["cin1", "cnt2"])
    expect(
      storage.childResources("cnt1", M2MType.ContentInstance).map((r) => r.ri)
    ).to.deep.equal(["cin1"])
    expect(storage.queryDescendants("id-in").map((r) => r.ri)).to.deep.equal([
      "cnt1",
      "cin1",
      "cnt2",
      "cin2",
    ])
    expect(storage.queryDescendants("id-in", { level: 2 }).map((r) => r.ri)).to.deep.equal([
      "cnt1",
      "cin1",
      "cnt2",
    ])
    expect(
      storage
        .queryDescendants("id-in", { match: (r) => r.ty === M2MType.ContentInstance })
        .map((r) => r.ri)
    ).to.deep.equal(["cin1", "cin2"])
  })

  it("drops a deleted record from every index", () => {
    const storage = populated()
    expect(storage.deleteResource("cin1")).to.equal(true)
    expect(storage.deleteResource("cin1")).to.equal(false)
    expect(storage.hasResource("cin1")).to.equal(false)
    expect(storage.riFromStructuredPath("cse-in/box/r1")).to.equal(undefined)
    expect(storage.childResources("cnt1").map((r) => r.ri)).to.deep.equal(["cnt2"])
  })
})

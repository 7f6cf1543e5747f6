import { expect } from "chai"
import { afterEach, describe, it } from "mocha"
import sinon from "sinon"

import { M2MStatusCode } from "../src/onem2m/m2m_rsp"
import { CNT } from "../src/cse/resources/cnt"
import { admin, contentOf, createContainer, createInstance, startCSE } from "./helpers"

describe("EventManager", () => {
  afterEach(() => {
    sinon.restore()
  })

  it("hands created and deleted resources to listeners", async () => {
    const cse = await startCSE()
    const seen: string[] = []
    cse.events.onResourceCreated((resource, originator) => seen.push(`+${resource.rn} ${originator}`))
    cse.events.onResourceDeleted((resource) => seen.push(`-${resource.rn}`))
    await createContainer(cse, "cse-in", "box", admin)
    await cse.delete("cse-in/box", admin)
    expect(seen).to.deep.equal([
      `+la ${admin}`,
      `+ol ${admin}`,
      `+box ${admin}`,
      "-la",
      "-ol",
      "-box",
    ])
  })

  it("keeps a failing creation listener away from the request", async () => {
    const cse = await startCSE()
    cse.events.onResourceCreated(() => {
      throw new Error("listener broke")
    })
    const result = await createContainer(cse, "cse-in", "box", admin)
    expect(result.rsc).to.equal(M2MStatusCode.CREATED)
    expect(cse.storage.hasResource(undefined, "cse-in/box")).to.equal(true)
    expect(cse.storage.hasResource(undefined, "cse-in/box/la")).to.equal(true)
  })

  it("keeps a failing deletion listener away from the request", async () => {
    const cse = await startCSE()
    await createContainer(cse, "cse-in", "box", admin)
    await createInstance(cse, "cse-in/box", "first", admin, { rn: "r1" })
    await createInstance(cse, "cse-in/box", "second", admin, { rn: "r2" })
    cse.events.onResourceDeleted(() => {
      throw new Error("listener broke")
    })
    const childRemoved = sinon.spy(CNT.prototype, "childRemoved")
    const result = await cse.delete("cse-in/box/la", admin)
    expect(result.rsc).to.equal(M2MStatusCode.DELETED)
    expect(contentOf(result, "m2m:cin").rn).to.equal("r2")
    expect(childRemoved.calledOnce).to.equal(true)
    const box = contentOf(await cse.retrieve("cse-in/box", admin), "m2m:cnt")
    expect(box).to.include({ cni: 1, cbs: 5 })
  })
})

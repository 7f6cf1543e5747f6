import { expect } from "chai"
import { describe, it } from "mocha"

import { M2MError } from "../src/onem2m/m2m_base"
import { M2MStatusCode } from "../src/onem2m/m2m_rsp"
import { M2MType } from "../src/onem2m/m2m_type"
import { CNT } from "../src/cse/resources/cnt"
import { CNT_LA } from "../src/cse/resources/cnt_la_ol"
import { resourceFromPayload, resourceFromRecord } from "../src/cse/resources/factory"
import { fixedNow, fixedTimestamp } from "./helpers"

const creation = { now: fixedNow, expirationDelta: 60 }

function thrown(fn: () => unknown): M2MError {
  try {
    fn()
  } catch (err) {
    if (err instanceof M2MError) {
      return err
    }
    throw err
  }
  throw new Error("nothing thrown")
}

describe("resourceFromPayload", () => {
  it("builds a new resource below its parent", () => {
    const resource = resourceFromPayload(
      M2MType.Container,
      { "m2m:cnt": { rn: "box", mni: 3 } },
      "id-in",
      creation
    )
    expect(resource).to.be.instanceOf(CNT)
    expect(resource.ri).to.match(/^cnt/)
    expect(resource.publicAttributes()).to.include({
      rn: "box",
      pi: "id-in",
      ty: M2MType.Container,
      mni: 3,
      ct: fixedTimestamp,
      lt: fixedTimestamp,
      et: "20240301T120100",
      cni: 0,
      cbs: 0,
      st: 0,
    })
  })

  it("names resources without rn after their type", () => {
    const resource = resourceFromPayload(
      M2MType.ContentInstance,
      { "m2m:cin": { con: "42" } },
      "cnt1",
      creation
    )
    expect(resource.rn).to.match(/^cin_/)
    expect(resource.getNumber("cs")).to.equal(2)
  })

  it("refuses types a client cannot create", () => {
    expect(thrown(() => resourceFromPayload(99, {}, "id-in", creation))).to.include({
      message: "resource type 99 cannot be created",
      responseCode: M2MStatusCode.BAD_REQUEST,
    })
    expect(
      thrown(() => resourceFromPayload(M2MType.ContainerLatest, { "m2m:la": {} }, "cnt1", creation))
        .message
    ).to.equal("resource type -20001 cannot be created")
  })

  it("requires the root key to match the type", () => {
    const error = thrown(() =>
      resourceFromPayload(M2MType.Container, { "m2m:cin": { con: "x" } }, "id-in", creation)
    )
    expect(error.message).to.equal("malformed content or resource type mismatch")
    expect(
      thrown(() =>
        resourceFromPayload(M2MType.Container, { "m2m:cnt": { ty: 4 } }, "id-in", creation)
      ).message
    ).to.equal("malformed content or resource type mismatch")
  })

  it("refuses attributes assigned by the CSE", () => {
    expect(
      thrown(() =>
        resourceFromPayload(M2MType.Container, { "m2m:cnt": { ri: "mine" } }, "id-in", creation)
      ).message
    ).to.equal("attribute ri is assigned by the CSE")
  })

  it("reports the first schema violation", () => {
    expect(
      thrown(() =>
        resourceFromPayload(M2MType.ApplicationEntity, { "m2m:ae": { rr: true } }, "id-in", creation)
      ).message
    ).to.equal("malformed content or resource type mismatch: api Required")
  })
})

describe("resourceFromRecord", () => {
  it("restores the class of a stored record", () => {
    const resource = resourceFromRecord({ ty: M2MType.ContainerLatest, ri: "la1", rn: "la", pi: "cnt1" })
    expect(resource).to.be.instanceOf(CNT_LA)
    expect(resource.pi).to.equal("cnt1")
    expect(resource.isVirtual).to.equal(true)
  })

  it("rejects an unknown type", () => {
    expect(thrown(() => resourceFromRecord({ ty: 12345 })).message).to.equal(
      "unknown resource type in record: 12345"
    )
  })
})

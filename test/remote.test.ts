import { expect } from "chai"
import { afterEach, describe, it } from "mocha"
import sinon from "sinon"

import { M2MOperation, parseContentType } from "../src/onem2m/m2m_header"
import {
  buildHttpRequest,
  buildMqttRequest,
  convertHttpStatus,
  createTransport,
  HTTPTransport,
  M2MTransport,
  MQTTTransport,
  parseMqttResponse,
  RequestOptions,
  ResponsePair,
} from "../src/onem2m/m2m_protocol"
import { M2MStatusCode } from "../src/onem2m/m2m_rsp"
import { M2MType } from "../src/onem2m/m2m_type"
import { CSE } from "../src/cse"
import { admin, startCSE } from "./helpers"

class FakeTransport extends M2MTransport {
  public readonly urlHeader = "fake"
  public readonly requests: RequestOptions[] = []
  public reply: ResponsePair = {
    statusCode: M2MStatusCode.OK,
    response: { "m2m:cnt": { rn: "box" } },
  }

  public constructor() {
    super("mn.example.com", 8080)
  }
  public async connect() {
    return true
  }
  public async request(options: RequestOptions) {
    this.requests.push(options)
    return this.reply
  }
  public async close() {
    // nothing to release
  }
}

async function registerRemote(cse: CSE, poa = "http://mn.example.com:8080") {
  return cse.create("cse-in", "/id-mn", M2MType.RemoteCSE, {
    "m2m:csr": { rn: "id-mn", csi: "/id-mn", cb: "/id-mn/cse-mn", poa: [poa] },
  })
}

async function withRemote() {
  const transport = new FakeTransport()
  const cse = await startCSE({ transportFactory: () => transport })
  const registered = await registerRemote(cse)
  expect(registered.rsc).to.equal(M2MStatusCode.CREATED)
  return { cse, transport }
}

describe("Transit requests", () => {
  afterEach(() => {
    sinon.restore()
  })

  it("forward a structured path to the registered CSE", async () => {
    const { cse, transport } = await withRemote()
    const result = await cse.processRequest({
      op: M2MOperation.RETRIEVE,
      to: "~/id-mn/cse-mn/box",
      fr: admin,
      rqi: "req-transit",
      query: { rcn: "1" },
    })
    expect(result).to.deep.equal({ rsc: M2MStatusCode.OK, pc: { "m2m:cnt": { rn: "box" } } })
    expect(transport.requests).to.have.length(1)
    expect(transport.requests[0]).to.include({
      opcode: M2MOperation.RETRIEVE,
      target: "/id-mn/cse-mn/box",
      originator: admin,
      requestId: "req-transit",
    })
    expect(transport.requests[0].urlOptions).to.deep.equal({ rcn: "1" })
  })

  it("forward an unstructured id and the remote CSEBase id", async () => {
    const { cse, transport } = await withRemote()
    await cse.retrieve("~/id-mn/cnt99", admin)
    await cse.retrieve("~/id-mn/id-mn", admin)
    expect(transport.requests.map((request) => request.target)).to.deep.equal([
      "/id-mn/cnt99",
      "/id-mn",
    ])
  })

  it("pass the remote status through", async () => {
    const { cse, transport } = await withRemote()
    transport.reply = { statusCode: M2MStatusCode.NOT_FOUND }
    expect(await cse.delete("~/id-mn/cse-mn/gone", admin)).to.deep.equal({
      rsc: M2MStatusCode.NOT_FOUND,
    })
    expect(transport.requests[0].opcode).to.equal(M2MOperation.DELETE)
  })

  it("are refused when disabled", async () => {
    const cse = await startCSE({ enableTransitRequests: false })
    expect(await cse.retrieve("~/id-mn/cse-mn/cnt", admin)).to.deep.equal({
      rsc: M2MStatusCode.OPERATION_NOT_ALLOWED,
      dbg: "transit requests are disabled",
    })
  })

  it("fail without a remoteCSE", async () => {
    const cse = await startCSE()
    expect(await cse.retrieve("~/id-xx/cse-xx/cnt", admin)).to.deep.equal({
      rsc: M2MStatusCode.TARGET_NOT_REACHABLE,
      dbg: "no remoteCSE for /id-xx",
    })
    expect(await cse.retrieve("~/id-xx/cnt99", admin)).to.deep.equal({
      rsc: M2MStatusCode.TARGET_NOT_REACHABLE,
      dbg: "no remoteCSE for /id-xx",
    })
  })

  it("fail without a usable point of access", async () => {
    const cse = await startCSE()
    await registerRemote(cse, "ftp://mn.example.com")
    expect(await cse.retrieve("~/id-mn/cse-mn/cnt", admin)).to.deep.equal({
      rsc: M2MStatusCode.TARGET_NOT_REACHABLE,
      dbg: "no usable pointOfAccess for /id-mn",
    })
  })

  it("report a failing transport and close it", async () => {
    const { cse, transport } = await withRemote()
    sinon.stub(transport, "request").rejects(new Error("connection refused"))
    const close = sinon.spy(transport, "close")
    expect(await cse.retrieve("~/id-mn/cse-mn/cnt", admin)).to.deep.equal({
      rsc: M2MStatusCode.TARGET_NOT_REACHABLE,
      dbg: "remote CSE is not reachable: Error: connection refused",
    })
    expect(close.calledOnce).to.equal(true)
  })
})

describe("Remote CSE registration", () => {
  it("indexes the CSE-ID of the new remoteCSE", async () => {
    const { cse } = await withRemote()
    expect(cse.storage.resolveCseId("/id-mn")).to.equal("id-mn")
    expect(cse.storage.retrieveResourceBySrn("cse-in/id-mn")?.ri).to.equal("id-mn")
  })

  it("requires the CSE-ID to be the originator", async () => {
    const cse = await startCSE()
    const result = await cse.create("cse-in", "/id-other", M2MType.RemoteCSE, {
      "m2m:csr": { rn: "id-mn", csi: "/id-mn" },
    })
    expect(result).to.deep.equal({
      rsc: M2MStatusCode.BAD_REQUEST,
      dbg: "csi must equal the originator",
    })
  })

  it("refuses the own CSE-ID and a second registration", async () => {
    const { cse } = await withRemote()
    expect(
      await cse.create("cse-in", "/id-in", M2MType.RemoteCSE, {
        "m2m:csr": { rn: "self", csi: "/id-in" },
      })
    ).to.deep.equal({ rsc: M2MStatusCode.BAD_REQUEST, dbg: "a CSE cannot register itself" })
    expect(
      await cse.create("cse-in", "/id-mn", M2MType.RemoteCSE, {
        "m2m:csr": { rn: "again", csi: "/id-mn" },
      })
    ).to.deep.equal({
      rsc: M2MStatusCode.ORIGINATOR_HAS_ALREADY_REGISTERED,
      dbg: "CSE /id-mn has already registered",
    })
  })
})

describe("Protocol bindings", () => {
  const create: RequestOptions = {
    opcode: M2MOperation.CREATE,
    target: "/id-mn/cse-mn",
    originator: "Cabc",
    requestId: "req1",
    resType: M2MType.Container,
    body: { "m2m:cnt": { rn: "box" } },
    urlOptions: { rcn: "1" },
  }

  it("builds an HTTP request", () => {
    expect(buildHttpRequest("http://mn.example.com:8080", create)).to.deep.equal({
      url: "http://mn.example.com:8080/~/id-mn/cse-mn?rcn=1",
      method: "POST",
      headers: {
        Accept: "application/json",
        "X-M2M-RI": "req1",
        "X-M2M-Origin": "Cabc",
        "Content-Type": "application/json;ty=3",
      },
      json: { "m2m:cnt": { rn: "box" } },
    })
  })

  it("sends no body for a retrieve", () => {
    const request = buildHttpRequest("http://mn.example.com:8080", {
      opcode: M2MOperation.RETRIEVE,
      target: "/id-mn/cse-mn/box",
      originator: "Cabc",
      requestId: "req2",
    })
    expect(request.url).to.equal("http://mn.example.com:8080/~/id-mn/cse-mn/box")
    expect(request.method).to.equal("GET")
    expect(request.json).to.equal(undefined)
    expect(request.headers).to.not.have.property("Content-Type")
  })

  it("builds an MQTT request", () => {
    const request = buildMqttRequest({
      opcode: M2MOperation.RETRIEVE,
      target: "/id-mn/cse-mn/box",
      originator: "/id-in",
      requestId: "req3",
    })
    expect(request.topic).to.equal("/oneM2M/req/id-in/id-mn/json")
    expect(request.responseTopic).to.equal("/oneM2M/resp/id-in/id-mn/json")
    expect(JSON.parse(request.payload)).to.deep.equal({
      "m2m:rqp": { fr: "/id-in", to: "/id-mn/cse-mn/box", op: 2, rqi: "req3" },
    })
  })

  it("reads MQTT responses and ignores malformed messages", () => {
    const raw = Buffer.from(JSON.stringify({ rsc: 2000, rqi: "req3", pc: {} }), "utf8")
    expect(parseMqttResponse(raw)).to.deep.equal({ rsc: 2000, rqi: "req3", pc: {} })
    expect(parseMqttResponse(Buffer.from("{not json", "utf8"))).to.equal(undefined)
    expect(parseMqttResponse(Buffer.from('{"rqi":"req3"}', "utf8"))).to.equal(undefined)
  })

  it("reads the resource type from a content type", () => {
    expect(parseContentType("application/vnd.onem2m-res+json; ty=3")).to.deep.equal({
      ct: "application/vnd.onem2m-res+json",
      ty: 3,
    })
    expect(parseContentType("application/json")).to.deep.equal({ ct: "application/json" })
    expect(parseContentType("text/plain;ty=3")).to.deep.equal({})
    expect(parseContentType(undefined)).to.deep.equal({})
  })

  it("maps HTTP status codes", () => {
    expect(convertHttpStatus(201)).to.equal(M2MStatusCode.CREATED)
    expect(convertHttpStatus(404)).to.equal(M2MStatusCode.NOT_FOUND)
    expect(convertHttpStatus(418)).to.equal(M2MStatusCode.INTERNAL_SERVER_ERROR)
  })

  it("picks a transport by scheme", () => {
    const http = createTransport("http://mn.example.com:8080")
    expect(http).to.be.instanceOf(HTTPTransport)
    expect(http?.getBaseURL()).to.equal("http://mn.example.com:8080")
    expect(createTransport("https://mn.example.com")?.getBaseURL()).to.equal(
      "https://mn.example.com:443"
    )
    const mqtt = createTransport("mqtts://broker.example.com")
    expect(mqtt).to.be.instanceOf(MQTTTransport)
    expect(mqtt?.getBaseURL()).to.equal("mqtts://broker.example.com:8883")
    expect(createTransport("ftp://mn.example.com")).to.equal(undefined)
    expect(createTransport("not a url")).to.equal(undefined)
  })
})

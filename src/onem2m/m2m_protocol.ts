import Chalk from "chalk"
import debug from "debug"
import got, { Response } from "got"
import colorJson from "json-colorizer"
import { connect, MqttClient } from "mqtt"
import queryString from "query-string"

import { isJSONObject, JSONObject } from "./m2m_base"
import { M2MKeys, M2MOperation } from "./m2m_header"
import { M2M_RSP, M2MStatusCode } from "./m2m_rsp"

/**
 * Outbound transport towards another CSE (transit requests)
 */
export abstract class M2MTransport {
  public abstract readonly urlHeader: string
  public readonly host: string
  public readonly port: number
  public secure: boolean
  public constructor(_host: string, _port: number, _secure?: boolean) {
    this.host = _host
    this.secure = _secure ?? false
    this.port = _port
  }
  public getBaseURL() {
    return `${this.urlHeader}://${this.host}:${this.port}`
  }
  public abstract connect(): Promise<boolean>
  public abstract request(options: RequestOptions): Promise<ResponsePair>
  public abstract close(): Promise<void>
}

const methodNames: Readonly<
  Record<M2MOperation, "POST" | "GET" | "PUT" | "DELETE">
> = {
  [M2MOperation.CREATE]: "POST",
  [M2MOperation.RETRIEVE]: "GET",
  [M2MOperation.UPDATE]: "PUT",
  [M2MOperation.DELETE]: "DELETE",
  [M2MOperation.NOTIFY]: "POST",
  [M2MOperation.DISCOVERY]: "GET",
}

/**
 * HTTP Transport
 */
const debugHttp = debug("CSE:remote:http")
export class HTTPTransport extends M2MTransport {
  public readonly urlHeader: string
  public constructor(_host: string, _port: number, _secure?: boolean) {
    super(_host, _port, _secure)
    this.urlHeader = `http${this.secure ? "s" : ""}`
  }
  public async connect() {
    // http
    debugHttp(
      `${Chalk.gray("[HTTP]")} ${Chalk.green(this.getBaseURL())} configured.`
    )
    return true
  }
  public async close() {
    // stateless
  }
  public async request(options: RequestOptions): Promise<ResponsePair> {
    const { url, method, headers, json } = buildHttpRequest(
      this.getBaseURL(),
      options
    )
    const response: Response<unknown> = await got(url, {
      method,
      headers,
      json,
      responseType: "json",
      throwHttpErrors: false,
    })
    const resBody = isJSONObject(response.body) ? response.body : undefined
    let debugMsg = `${Chalk.gray("[HTTP]")} ${Chalk.green(
      url
    )} ${Chalk.blueBright(method)} ${colorJson(JSON.stringify(headers))}`
    debugMsg += `\n${Chalk.gray("[HTTP]")}  └ Request: ${colorJson(
      JSON.stringify(json ?? {})
    )}`
    debugMsg += `\n${Chalk.gray("[HTTP]")}  └ Response: ${Chalk.blueBright(
      response.statusCode
    )} ${colorJson(JSON.stringify(resBody ?? {}))}`
    debugHttp(debugMsg)
    const rscHeader = response.headers["x-m2m-rsc"]
    const rsc =
      typeof rscHeader === "string" && /^\d+$/.test(rscHeader)
        ? Number.parseInt(rscHeader, 10)
        : convertHttpStatus(response.statusCode)
    return {
      statusCode: rsc,
      response: resBody,
    }
  }
}

/**
 * Map a plain HTTP status to a response status code,
 * for peers that do not send `X-M2M-RSC`.
 */
export function convertHttpStatus(status: number): number {
  switch (status) {
    case 200:
      return M2MStatusCode.OK
    case 201:
      return M2MStatusCode.CREATED
    case 202:
      return M2MStatusCode.DELETED
    case 204:
      return M2MStatusCode.CHANGED
    case 400:
      return M2MStatusCode.BAD_REQUEST
    case 403:
      return M2MStatusCode.ORIGINATOR_HAS_NO_PRIVILEGE
    case 404:
      return M2MStatusCode.NOT_FOUND
    case 405:
      return M2MStatusCode.OPERATION_NOT_ALLOWED
    case 409:
      return M2MStatusCode.CONFLICT
    case 501:
      return M2MStatusCode.NOT_IMPLEMENTED
  }
  return M2MStatusCode.INTERNAL_SERVER_ERROR
}

/**
 * Build the HTTP binding of a request primitive.
 *
 * The SP-relative target `/id-mn/cse-mn/cnt` maps to `<base>/~/id-mn/cse-mn/cnt`.
 */
export function buildHttpRequest(baseURL: string, options: RequestOptions) {
  let postParams = ""
  if (options.urlOptions != null && Object.keys(options.urlOptions).length > 0) {
    postParams = "?" + queryString.stringify(options.urlOptions)
  }
  const url = `${baseURL}/~${options.target}${postParams}`
  const headers: Record<string, string> = {
    Accept: "application/json",
    "X-M2M-RI": options.requestId,
    "X-M2M-Origin": options.originator,
  }
  let json: JSONObject | undefined
  if (
    options.opcode === M2MOperation.CREATE ||
    options.opcode === M2MOperation.UPDATE ||
    options.opcode === M2MOperation.NOTIFY
  ) {
    json = options.body ?? {}
    headers["Content-Type"] =
      options.resType != null
        ? `application/json;ty=${options.resType}`
        : "application/json"
  }
  const method = methodNames[options.opcode]
  return { url, method, headers, json }
}

const debugMqtt = debug("CSE:remote:mqtt")
const mqttResponseTimeout = 5000
/**
 * MQTT Transport
 *
 * from: https://wiki.eclipse.org/OM2M/one/MQTT_Binding
 */
export class MQTTTransport extends M2MTransport {
  public readonly urlHeader: string
  protected client?: MqttClient
  public constructor(_host: string, _port: number, _secure?: boolean) {
    super(_host, _port, _secure)
    this.urlHeader = `mqtt${this.secure ? "s" : ""}`
  }
  public async connect() {
    const client = connect(this.getBaseURL())
    this.client = client
    await new Promise<void>((res, rej) => {
      const timeout = setTimeout(() => {
        client.end(true)
        rej(new Error("Timeout"))
      }, mqttResponseTimeout)
      client.once("connect", () => {
        clearTimeout(timeout)
        debugMqtt(
          `${Chalk.gray("[MQTT]")} ${Chalk.green(
            this.getBaseURL()
          )} is connected.`
        )
        res()
      })
    })
    return true
  }
  public async close() {
    const client = this.client
    this.client = undefined
    if (client != null) {
      await new Promise<void>((res) => client.end(false, {}, () => res()))
    }
  }
  public async request(options: RequestOptions): Promise<ResponsePair> {
    if (this.client == null) {
      await this.connect()
    }
    const client = this.client
    if (client == null) {
      throw new Error("MQTT client isn't connected.")
    }
    const { topic, responseTopic, payload } = buildMqttRequest(options)
    debugMqtt(
      `${Chalk.gray("[MQTT]")} Request ${Chalk.green(
        topic
      )} ${Chalk.blueBright(methodNames[options.opcode])} ${colorJson(
        payload
      )}`
    )
    const response = await new Promise<M2M_RSP<unknown>>((res, rej) => {
      client.subscribe(responseTopic)
      const timeout = setTimeout(() => {
        client.off("message", listener)
        client.unsubscribe(responseTopic)
        rej(new Error("MQTT Timeout"))
      }, mqttResponseTimeout)
      const listener = (topic: string, rawMsg: Buffer) => {
        if (topic !== responseTopic) {
          return
        }
        const resp = parseMqttResponse(rawMsg)
        if (resp != null && resp.rqi === options.requestId) {
          client.off("message", listener)
          client.unsubscribe(responseTopic)
          clearTimeout(timeout)
          res(resp)
        }
      }
      client.on("message", listener)
      client.publish(topic, payload, {})
    })
    debugMqtt(
      `${Chalk.gray("[MQTT]")} Response ${Chalk.green(
        responseTopic
      )} ${colorJson(JSON.stringify(response))}`
    )
    return {
      statusCode: response.rsc,
      response: isJSONObject(response.pc) ? response.pc : undefined,
    }
  }
}

function isMqttResponse(value: unknown): value is M2M_RSP<unknown> {
  return isJSONObject(value) && typeof value.rsc === "number"
}

/**
 * Response primitive from an MQTT message, `undefined` for anything else
 */
export function parseMqttResponse(rawMsg: Buffer): M2M_RSP<unknown> | undefined {
  let value: unknown
  try {
    value = JSON.parse(rawMsg.toString("utf8"))
  } catch (err) {
    debugMqtt(`${Chalk.redBright("[MQTT]")} Ignored malformed message: ${String(err)}`)
    return undefined
  }
  return isMqttResponse(value) ? value : undefined
}

/**
 * Build the MQTT binding of a request primitive.
 *
 * Topics carry the originator and the target CSE-ID without the leading `/`.
 */
export function buildMqttRequest(options: RequestOptions) {
  const toTopicId = (id: string) =>
    (id.startsWith("/") ? id.substring(1) : id).replace(/\//g, ":")
  const targetCsi = options.target.split("/")[1] ?? ""
  const originator = toTopicId(options.originator)
  let postParams = ""
  if (options.urlOptions != null && Object.keys(options.urlOptions).length > 0) {
    postParams = "?" + queryString.stringify(options.urlOptions)
  }
  const requestObj: JSONObject = {
    fr: options.originator,
    to: `${options.target}${postParams}`,
    op: options.opcode,
    rqi: options.requestId,
    ty: options.resType ?? undefined,
    pc: options.body ?? undefined,
  }
  return {
    topic: `/oneM2M/req/${originator}/${targetCsi}/json`,
    responseTopic: `/oneM2M/resp/${originator}/${targetCsi}/json`,
    payload: JSON.stringify({ [M2MKeys.requestPrimitive]: requestObj }),
  }
}

const debugTransport = debug("CSE:remote")
/**
 * Pick a transport for a point of access (`http://host:port`, `mqtt://host:port`)
 */
export function createTransport(poa: string): M2MTransport | undefined {
  let url: URL
  try {
    url = new URL(poa)
  } catch (err) {
    debugTransport(
      `${Chalk.yellow("invalid pointOfAccess")} ${poa}: ${String(err)}`
    )
    return undefined
  }
  const secure = url.protocol.endsWith("s:")
  switch (url.protocol) {
    case "http:":
    case "https:":
      return new HTTPTransport(
        url.hostname,
        url.port !== "" ? Number(url.port) : secure ? 443 : 80,
        secure
      )
    case "mqtt:":
    case "mqtts:":
      return new MQTTTransport(
        url.hostname,
        url.port !== "" ? Number(url.port) : secure ? 8883 : 1883,
        secure
      )
  }
  return undefined
}

export interface RequestOptions {
  opcode: M2MOperation
  /**
   * SP-relative target (`/id-mn/cse-mn/cnt`)
   */
  target: string
  originator: string
  requestId: string
  resType?: number
  urlOptions?: Record<string, string | string[]>
  body?: JSONObject
}

export interface ResponsePair {
  statusCode: M2MStatusCode | number
  response?: JSONObject
}

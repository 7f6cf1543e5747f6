import Chalk from "chalk"
import Debug from "debug"

import { targetNotReachable } from "../onem2m/m2m_debug"
import type { M2MRequest } from "../onem2m/m2m_header"
import { createTransport, M2MTransport } from "../onem2m/m2m_protocol"
import { M2MResult, M2MStatusCode } from "../onem2m/m2m_rsp"
import type { M2MAddress } from "./address"
import { bareCsi, CSEConfig } from "./config"
import { CSR } from "./resources/csr"
import { randomID } from "./resources/resource"
import type { ResourceStorage } from "./storage"

const debugRemote = Debug("CSE:remote")

export type TransportFactory = (poa: string) => M2MTransport | undefined

/**
 * Forwarding of requests that target another CSE
 */
export class RemoteCSEManager {
  public constructor(
    private readonly config: CSEConfig,
    private readonly storage: ResourceStorage,
    private readonly transportFactory: TransportFactory = createTransport
  ) {}

  /**
   * Whether a CSE-ID (without `/`) names another CSE
   */
  public isTransitTarget(csi?: string): csi is string {
    return csi != null && csi !== bareCsi(this.config)
  }

  /**
   * Send a request to the remoteCSE registered under `address.csi`.
   *
   * The remote status and content come back unchanged.
   */
  public async forward(
    request: M2MRequest,
    address: M2MAddress,
    originator: string
  ): Promise<M2MResult> {
    const csi = address.csi ?? ""
    const ri = this.storage.resolveCseId(`/${csi}`)
    const csr = ri != null ? this.storage.retrieveResource(ri) : undefined
    if (!(csr instanceof CSR)) {
      return this.unreachable(`no remoteCSE for /${csi}`)
    }
    const poa = csr.poa[0]
    const transport = poa != null ? this.transportFactory(poa) : undefined
    if (transport == null) {
      return this.unreachable(`no usable pointOfAccess for /${csi}`)
    }
    // `~/<csi>/<csi>` names the remote CSEBase itself
    const rest =
      address.srn != null
        ? `/${address.srn}`
        : address.ri != null && address.ri !== csr.ri
        ? `/${address.ri}`
        : ""
    const target = `/${csi}${rest}`
    debugRemote(
      `${Chalk.blueBright("forward")} ${request.op} ${Chalk.green(target)} via ${transport.getBaseURL()}`
    )
    try {
      await transport.connect()
      const response = await transport.request({
        opcode: request.op,
        target,
        originator,
        requestId: request.rqi ?? randomID(),
        resType: request.ty,
        urlOptions: request.query,
        body: request.pc,
      })
      return response.response != null
        ? { rsc: response.statusCode, pc: response.response }
        : { rsc: response.statusCode }
    } catch (err) {
      return this.unreachable(`${targetNotReachable}: ${String(err)}`)
    } finally {
      await transport.close()
    }
  }

  private unreachable(dbg: string): M2MResult {
    debugRemote(`${Chalk.redBright("unreachable")} ${dbg}`)
    return { rsc: M2MStatusCode.TARGET_NOT_REACHABLE, dbg }
  }
}

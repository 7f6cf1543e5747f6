import Chalk from "chalk"
import Debug from "debug"

import { JSONObject, M2MError } from "./onem2m/m2m_base"
import { M2MOperation, M2MRequest } from "./onem2m/m2m_header"
import { M2MResult, M2MStatusCode } from "./onem2m/m2m_rsp"
import { M2MType } from "./onem2m/m2m_type"
import { CSEConfig, CSEOptions, defineConfig } from "./cse/config"
import { Dispatcher } from "./cse/dispatcher"
import { EventManager } from "./cse/event"
import { ExpirationManager } from "./cse/expiration"
import { ReadWriteLock } from "./cse/lock"
import { RegistrationManager } from "./cse/registration"
import { RemoteCSEManager, TransportFactory } from "./cse/remote"
import { CSEBase } from "./cse/resources/cse_base"
import { resourceFromRecord } from "./cse/resources/factory"
import { randomID } from "./cse/resources/resource"
import { SecurityManager } from "./cse/security"
import { MemoryStorage, ResourceStorage } from "./cse/storage"

const debugMain = Debug("CSE:main")

export interface CSERuntimeOptions extends CSEOptions {
  /**
   * Store to use instead of a fresh in-memory one
   */
  storage?: ResourceStorage
  /**
   * Outbound transports for transit requests
   */
  transportFactory?: TransportFactory
}

type QueryOptions = Record<string, string | string[]>

/**
 * A CSE instance: configuration, resource tree and request dispatching
 */
export class CSE {
  public readonly config: CSEConfig
  public readonly storage: ResourceStorage
  public readonly security: SecurityManager
  public readonly registration: RegistrationManager
  public readonly remote: RemoteCSEManager
  public readonly events: EventManager
  public readonly lock: ReadWriteLock
  public readonly dispatcher: Dispatcher
  public readonly expiration: ExpirationManager

  public constructor(options: CSERuntimeOptions = {}) {
    const { storage, transportFactory, ...configOptions } = options
    this.config = defineConfig(configOptions)
    this.storage = storage ?? new MemoryStorage(resourceFromRecord)
    this.security = new SecurityManager(this.config, this.storage)
    this.registration = new RegistrationManager(this.config, this.storage)
    this.remote = new RemoteCSEManager(this.config, this.storage, transportFactory)
    this.events = new EventManager()
    this.lock = new ReadWriteLock()
    this.dispatcher = new Dispatcher({
      config: this.config,
      storage: this.storage,
      security: this.security,
      registration: this.registration,
      remote: this.remote,
      events: this.events,
      lock: this.lock,
    })
    this.expiration = new ExpirationManager(this.config, this.storage, this.dispatcher)
  }

  /**
   * Create the CSEBase unless the store has it already, then begin the
   * expiration sweeps
   */
  public async start(): Promise<CSEBase> {
    const cseBase = await this.createCSEBase()
    if (this.config.enableResourceExpiration) {
      this.expiration.start()
    }
    return cseBase
  }

  public stop() {
    this.expiration.stop()
    debugMain(`${Chalk.gray("stopped")} ${this.config.csi}`)
  }

  private createCSEBase(): Promise<CSEBase> {
    return this.lock.write(() => {
      const existing = this.cseBase
      if (existing != null) {
        debugMain(`${Chalk.gray("CSEBase present")} ${existing.ri}`)
        return existing
      }
      const cseBase = CSEBase.fromConfig(this.config)
      if (!this.storage.createResource(cseBase)) {
        throw new M2MError(
          `CSEBase ${this.config.ri} cannot be stored`,
          M2MStatusCode.INTERNAL_SERVER_ERROR
        )
      }
      debugMain(
        `${Chalk.green("started")} ${this.config.csi} ${Chalk.gray(
          `(${this.config.rn}, ${this.config.ri})`
        )}`
      )
      return cseBase
    })
  }

  public get cseBase(): CSEBase | undefined {
    const resource = this.storage.retrieveResource(this.config.ri)
    return resource instanceof CSEBase ? resource : undefined
  }

  public processRequest(request: M2MRequest): Promise<M2MResult> {
    return this.dispatcher.processRequest({
      ...request,
      rqi: request.rqi ?? `cse/${randomID()}`,
    })
  }

  public retrieve(to: string, originator: string, query?: QueryOptions) {
    return this.processRequest({ op: M2MOperation.RETRIEVE, to, fr: originator, query })
  }

  /**
   * Discovery below `to`, `rcn` defaults to child resource references
   */
  public discover(to: string, originator: string, query: QueryOptions = {}) {
    return this.processRequest({
      op: M2MOperation.DISCOVERY,
      to,
      fr: originator,
      query: { fu: "1", ...query },
    })
  }

  public create(to: string, originator: string, ty: M2MType, pc: JSONObject) {
    return this.processRequest({
      op: M2MOperation.CREATE,
      to,
      fr: originator,
      ty,
      ct: "application/json",
      pc,
    })
  }

  public update(to: string, originator: string, pc: JSONObject, query?: QueryOptions) {
    return this.processRequest({
      op: M2MOperation.UPDATE,
      to,
      fr: originator,
      ct: "application/json",
      pc,
      query,
    })
  }

  public delete(to: string, originator: string) {
    return this.processRequest({ op: M2MOperation.DELETE, to, fr: originator })
  }
}

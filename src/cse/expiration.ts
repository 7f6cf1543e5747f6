import Chalk from "chalk"
import Debug from "debug"

import { CSEConfig } from "./config"
import { Dispatcher } from "./dispatcher"
import { ResourceStorage } from "./storage"

const debugExpiration = Debug("CSE:expiration")

/**
 * Periodically removes resources whose expirationTime has passed
 */
export class ExpirationManager {
  private timer: ReturnType<typeof setInterval> | null = null

  public constructor(
    private readonly config: CSEConfig,
    private readonly storage: ResourceStorage,
    private readonly dispatcher: Dispatcher
  ) {}

  public get isRunning() {
    return this.timer != null
  }

  public start() {
    if (this.timer != null) {
      return
    }
    this.timer = setInterval(() => {
      this.expireResources().catch((err: unknown) => {
        debugExpiration(`${Chalk.redBright("sweep failed")} ${String(err)}`)
      })
    }, this.config.checkExpirationsInterval * 1000)
    this.timer.unref()
    debugExpiration(
      `${Chalk.gray("checking every")} ${this.config.checkExpirationsInterval}s`
    )
  }

  public stop() {
    if (this.timer == null) {
      return
    }
    clearInterval(this.timer)
    this.timer = null
  }

  /**
   * Delete every expired resource, children included. Returns how many
   * resources the sweep removed itself.
   */
  public expireResources(): Promise<number> {
    return this.dispatcher.lock.write(async () => {
      const now = this.config.clock()
      const expired = this.storage.queryDescendants(this.config.ri, {
        match: (resource) => resource.isExpired(now),
      })
      let count = 0
      for (const candidate of expired) {
        // an expired ancestor may have taken it already
        const resource = this.storage.retrieveResource(candidate.ri)
        if (resource == null) {
          continue
        }
        const result = await this.dispatcher.deleteResource(
          resource,
          this.config.adminOriginator,
          true
        )
        if (result.resource == null) {
          debugExpiration(
            `${Chalk.redBright("cannot expire")} ${resource.ri}: ${result.rsc} ${
              result.dbg ?? ""
            }`
          )
          continue
        }
        debugExpiration(`${Chalk.yellow("expired")} ${resource.ri}`)
        count += 1
      }
      return count
    })
  }
}

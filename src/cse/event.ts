import Chalk from "chalk"
import Debug from "debug"
import { EventEmitter } from "events"

import type { Resource } from "./resources/resource"

const debugEvent = Debug("CSE:event")

export type ResourceListener = (resource: Resource, originator: string) => void

/**
 * Fire-and-forget notifications about the resource tree
 *
 * Events: `resourceCreated`, `resourceDeleted`. A throwing listener is
 * logged and never reaches the request that caused the event.
 */
export class EventManager extends EventEmitter {
  public resourceCreated(resource: Resource, originator: string) {
    debugEvent(`${Chalk.green("created")} ${resource.ri}`)
    this.notify("resourceCreated", resource, originator)
  }

  public resourceDeleted(resource: Resource, originator: string) {
    debugEvent(`${Chalk.redBright("deleted")} ${resource.ri}`)
    this.notify("resourceDeleted", resource, originator)
  }

  public onResourceCreated(listener: ResourceListener) {
    return this.on("resourceCreated", listener)
  }

  public onResourceDeleted(listener: ResourceListener) {
    return this.on("resourceDeleted", listener)
  }

  private notify(event: string, resource: Resource, originator: string) {
    try {
      this.emit(event, resource, originator)
    } catch (err) {
      debugEvent(
        `${Chalk.redBright("listener failed")} ${event} ${resource.ri}: ${String(err)}`
      )
    }
  }
}

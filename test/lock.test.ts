import { expect } from "chai"
import { describe, it } from "mocha"

import { ReadWriteLock } from "../src/cse/lock"

function deferred() {
  let release = () => {}
  const promise = new Promise<void>((resolve) => {
    release = resolve
  })
  return { promise, release }
}

describe("ReadWriteLock", () => {
  it("lets readers share the lock", async () => {
    const lock = new ReadWriteLock()
    const gate = deferred()
    const first = lock.read(() => gate.promise)
    const second = lock.read(() => gate.promise)
    expect(lock.activeReaders).to.equal(2)
    gate.release()
    await Promise.all([first, second])
    expect(lock.activeReaders).to.equal(0)
  })

  it("runs writers alone and in order", async () => {
    const lock = new ReadWriteLock()
    const order: string[] = []
    const gate = deferred()
    const first = lock.write(async () => {
      order.push("w1 start")
      await gate.promise
      order.push("w1 end")
    })
    const second = lock.write(() => {
      order.push("w2")
    })
    expect(lock.isWriting).to.equal(true)
    gate.release()
    await Promise.all([first, second])
    expect(order).to.deep.equal(["w1 start", "w1 end", "w2"])
    expect(lock.isWriting).to.equal(false)
  })

  it("holds new readers back while a writer waits", async () => {
    const lock = new ReadWriteLock()
    const order: string[] = []
    const gate = deferred()
    const reader = lock.read(async () => {
      await gate.promise
      order.push("r1")
    })
    const writer = lock.write(() => {
      order.push("w")
    })
    const lateReader = lock.read(() => {
      order.push("r2")
    })
    gate.release()
    await Promise.all([reader, writer, lateReader])
    expect(order).to.deep.equal(["r1", "w", "r2"])
  })

  it("releases the lock when the operation throws", async () => {
    const lock = new ReadWriteLock()
    let error: unknown
    try {
      await lock.write(() => {
        throw new Error("boom")
      })
    } catch (err) {
      error = err
    }
    expect(error).to.be.instanceOf(Error)
    expect(lock.isWriting).to.equal(false)
    expect(await lock.read(() => 42)).to.equal(42)
  })
})

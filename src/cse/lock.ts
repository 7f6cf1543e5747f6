/**
 * Asynchronous read/write lock.
 *
 * Any number of readers, or a single writer. A waiting writer blocks new
 * readers; when a writer leaves, all waiting readers go first.
 */
export class ReadWriteLock {
  private readers = 0
  private writing = false
  private waitingReaders: Array<() => void> = []
  private readonly waitingWriters: Array<() => void> = []

  public async read<T>(operation: () => Promise<T> | T): Promise<T> {
    await this.acquireRead()
    try {
      return await operation()
    } finally {
      this.releaseRead()
    }
  }

  public async write<T>(operation: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite()
    try {
      return await operation()
    } finally {
      this.releaseWrite()
    }
  }

  public get activeReaders() {
    return this.readers
  }

  public get isWriting() {
    return this.writing
  }

  private acquireRead(): Promise<void> {
    if (!this.writing && this.waitingWriters.length === 0) {
      this.readers += 1
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      this.waitingReaders.push(() => {
        this.readers += 1
        resolve()
      })
    })
  }

  private releaseRead() {
    this.readers -= 1
    if (this.readers === 0) {
      this.wakeWriter()
    }
  }

  private acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      this.waitingWriters.push(() => {
        this.writing = true
        resolve()
      })
    })
  }

  private releaseWrite() {
    this.writing = false
    if (this.waitingReaders.length > 0) {
      const readers = this.waitingReaders
      this.waitingReaders = []
      for (const wake of readers) {
        wake()
      }
      return
    }
    this.wakeWriter()
  }

  private wakeWriter() {
    if (this.writing || this.readers > 0) {
      return
    }
    this.waitingWriters.shift()?.()
  }
}

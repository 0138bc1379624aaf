/**
 * Read/Write Lock
 *
 * FIFO-fair async lock. Writers run alone; readers share the lock with other
 * readers. A queued writer blocks readers that arrive after it, so a steady
 * stream of validations cannot starve a mutation.
 */

type Mode = 'read' | 'write'

type Waiter = {
  mode: Mode
  grant: () => void
}

export type ReadWriteLock = {
  read<T>(fn: () => Promise<T>): Promise<T>
  write<T>(fn: () => Promise<T>): Promise<T>
  /** Snapshot of the lock state, for tests. */
  state(): { readers: number; writing: boolean; queued: number }
}

export function createReadWriteLock(): ReadWriteLock {
  let readers = 0
  let writing = false
  const queue: Waiter[] = []

  function pump(): void {
    for (let next = queue[0]; next; next = queue[0]) {
      if (next.mode === 'write') {
        if (writing || readers > 0) return
        queue.shift()
        writing = true
        next.grant()
        return
      }
      if (writing) return
      queue.shift()
      readers++
      next.grant()
    }
  }

  function acquire(mode: Mode): Promise<void> {
    return new Promise<void>((resolve) => {
      queue.push({ mode, grant: resolve })
      pump()
    })
  }

  function release(mode: Mode): void {
    if (mode === 'write') writing = false
    else readers--
    pump()
  }

  async function run<T>(mode: Mode, fn: () => Promise<T>): Promise<T> {
    await acquire(mode)
    try {
      return await fn()
    } finally {
      release(mode)
    }
  }

  return {
    read: (fn) => run('read', fn),
    write: (fn) => run('write', fn),
    state: () => ({ readers, writing, queued: queue.length }),
  }
}

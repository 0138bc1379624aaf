/**
 * Segment 09: Read/Write Lock Tests
 *
 * Readers share, writers run alone, and a queued writer holds back later readers.
 */

import { describe, it, expect } from 'vitest'
import { createReadWriteLock } from '../src/internal/rw-lock'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

function tick(): Promise<void> {
  return new Promise((r) => setTimeout(r, 0))
}

describe('ReadWriteLock', () => {
  it('readers share the lock', async () => {
    const lock = createReadWriteLock()
    const gate = deferred()
    const r1 = lock.read(async () => { await gate.promise; return 1 })
    const r2 = lock.read(async () => { await gate.promise; return 2 })

    await tick()
    expect(lock.state()).toEqual({ readers: 2, writing: false, queued: 0 })

    gate.resolve()
    expect(await Promise.all([r1, r2])).toEqual([1, 2])
    expect(lock.state()).toEqual({ readers: 0, writing: false, queued: 0 })
  })

  it('a writer waits for readers and holds back later readers', async () => {
    const lock = createReadWriteLock()
    const gate = deferred()
    const log: string[] = []

    const r1 = lock.read(async () => { log.push('r1 start'); await gate.promise; log.push('r1 end') })
    const w = lock.write(async () => { log.push('w') })
    const r2 = lock.read(async () => { log.push('r2') })

    await tick()
    expect(log).toEqual(['r1 start'])
    expect(lock.state()).toEqual({ readers: 1, writing: false, queued: 2 })

    gate.resolve()
    await Promise.all([r1, w, r2])
    expect(log).toEqual(['r1 start', 'r1 end', 'w', 'r2'])
  })

  it('writers never interleave', async () => {
    const lock = createReadWriteLock()
    const log: string[] = []
    const write = (id: string) => lock.write(async () => {
      log.push(`${id} start`)
      await tick()
      log.push(`${id} end`)
    })

    await Promise.all([write('a'), write('b')])
    expect(log).toEqual(['a start', 'a end', 'b start', 'b end'])
  })

  it('a failing writer releases the lock', async () => {
    const lock = createReadWriteLock()
    await expect(lock.write(async () => { throw new Error('boom') })).rejects.toThrow('boom')
    expect(lock.state()).toEqual({ readers: 0, writing: false, queued: 0 })
    await expect(lock.read(async () => 'ok')).resolves.toBe('ok')
  })
})

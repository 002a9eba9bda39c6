import { readdir, readFile } from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { writeFileAtomic } from '../state/atomic.js'
import { createInitialState, StateStore } from '../state/StateStore.js'
import type { ConversionState } from '../state/types.js'
import { captureLogger, makeRequest, makeTempDir, removeDir, waitFor } from './helpers.js'

const FIXED_NOW = new Date('2024-05-06T07:08:09.000Z')

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => {}
    const promise = new Promise<void>(r => {
        resolve = r
    })
    return { promise, resolve }
}

async function readState(file: string): Promise<ConversionState> {
    return JSON.parse(await readFile(file, 'utf8'))
}

describe('createInitialState', () => {
    it('seeds the disks from source_disks', () => {
        const state = createInitialState(makeRequest({ source_disks: ['[ds1] vm1/vm1.vmdk'] }))
        expect(state).toEqual({
            started: false,
            disks: [{ path: '[ds1] vm1/vm1.vmdk', progress: 0 }],
            disk_count: 1,
            finished: false,
        })
        expect('failed' in state).toBe(false)
    })

    it('leaves disk_count unset without source disks', () => {
        const state = createInitialState(makeRequest())
        expect(state).toEqual({ started: false, disks: [], finished: false })
    })
})

describe('writeFileAtomic', () => {
    let dir: string

    beforeEach(async () => {
        dir = await makeTempDir('atomic-test')
    })

    afterEach(async () => {
        await removeDir(dir)
    })

    it('replaces the file and leaves no temporary behind', async () => {
        const file = path.join(dir, 'job.state')
        await writeFileAtomic(file, 'one\n')
        await writeFileAtomic(file, 'two\n')

        expect(await readFile(file, 'utf8')).toBe('two\n')
        expect(await readdir(dir)).toEqual(['job.state'])
    })

    it('rejects when the directory is missing', async () => {
        await expect(writeFileAtomic(path.join(dir, 'missing', 'job.state'), 'x')).rejects.toThrow()
        expect(await readdir(dir)).toEqual([])
    })
})

describe('StateStore', () => {
    let dir: string
    let file: string

    beforeEach(async () => {
        dir = await makeTempDir('state-test')
        file = path.join(dir, 'job.state')
    })

    afterEach(async () => {
        await removeDir(dir)
    })

    const newStore = (log = captureLogger(), write?: (file: string, text: string) => Promise<void>) =>
        new StateStore(file, createInitialState(makeRequest({ source_disks: ['[ds1] vm1/vm1.vmdk'] })), {
            log,
            write,
            now: () => FIXED_NOW,
        })

    it('persists the state as one JSON document', async () => {
        const store = newStore()
        store.markStarted(1234)

        await expect(store.persist()).resolves.toBe(true)
        expect(await readState(file)).toEqual({
            started: true,
            pid: 1234,
            disks: [{ path: '[ds1] vm1/vm1.vmdk', progress: 0 }],
            disk_count: 1,
            finished: false,
            started_at: '2024-05-06T07:08:09.000Z',
        })
    })

    it('never duplicates a disk path', () => {
        const store = newStore()
        expect(store.addDisk('[ds1] vm1/vm1.vmdk')).toBe(false)
        expect(store.addDisk('[ds1] vm1/vm1_1.vmdk')).toBe(true)
        expect(store.addDisk('[ds1] vm1/vm1_1.vmdk')).toBe(false)
        expect(store.snapshot().disks.map(d => d.path)).toEqual(['[ds1] vm1/vm1.vmdk', '[ds1] vm1/vm1_1.vmdk'])
        expect(store.trackedDisks).toBe(2)
    })

    it('floors and clamps progress', () => {
        const store = newStore()
        const progressAfter = (value: number) => {
            store.setDiskProgress('[ds1] vm1/vm1.vmdk', value)
            return store.snapshot().disks[0].progress
        }
        expect(progressAfter(42.9)).toBe(42)
        expect(progressAfter(150)).toBe(100)
        expect(progressAfter(-3)).toBe(0)
        expect(store.setDiskProgress('[ds1] vm1/other.vmdk', 10)).toBe(false)
    })

    it('writes failed only for a failed job', () => {
        const ok = newStore()
        ok.finalize({ failed: false, returnCode: 0 })
        expect(ok.snapshot()).toMatchObject({ finished: true, return_code: 0, finished_at: '2024-05-06T07:08:09.000Z' })
        expect('failed' in ok.snapshot()).toBe(false)

        const bad = newStore()
        bad.finalize({ failed: true, returnCode: 1, message: { message: 'boom', type: 'error' } })
        expect(bad.snapshot()).toMatchObject({
            finished: true,
            failed: true,
            return_code: 1,
            last_message: { message: 'boom', type: 'error' },
        })
    })

    it('ignores every mutation after finishing', () => {
        const log = captureLogger()
        const store = newStore(log)
        store.finalize({ failed: false, returnCode: 0 })
        const frozen = store.snapshot()

        store.markStarted(99)
        store.addDisk('[ds1] vm1/late.vmdk')
        store.setDiskProgress('[ds1] vm1/vm1.vmdk', 50)
        store.setDiskCount(4)
        store.setVmId('late')
        store.setLastMessage({ message: 'late', type: 'info' })
        store.finalize({ failed: true, returnCode: 1 })

        expect(store.snapshot()).toEqual(frozen)
        expect(log.messages('warn')).toHaveLength(7)
        expect(log.messages('warn')[0]).toBe('ignoring markStarted after the job finished')
    })

    it('snapshots the state when persist is called', async () => {
        const gate = deferred()
        const written: string[] = []
        const store = newStore(captureLogger(), async (_file, text) => {
            await gate.promise
            written.push(text)
        })

        const pending = store.persist()
        store.setDiskCount(3)
        gate.resolve()
        await pending

        expect(JSON.parse(written[0]).disk_count).toBe(1)
    })

    it('writes in call order and skips unchanged state', async () => {
        const written: number[] = []
        const store = newStore(captureLogger(), async (_file, text) => {
            written.push(JSON.parse(text).disk_count)
        })

        store.setDiskCount(2)
        const a = store.persist()
        store.setDiskCount(3)
        const b = store.persist()
        const c = store.persist()
        await Promise.all([a, b, c])

        expect(written).toEqual([2, 3])
    })

    it('queues a write behind a slow one', async () => {
        const gate = deferred()
        const order: string[] = []
        const store = newStore(captureLogger(), async (_file, text) => {
            const count = JSON.parse(text).disk_count
            order.push(`start:${count}`)
            if (count === 2) await gate.promise
            order.push(`end:${count}`)
        })

        store.setDiskCount(2)
        const slow = store.persist()
        store.setDiskCount(3)
        const fast = store.persist()
        await waitFor(() => (order.length > 0 ? true : undefined))
        await new Promise(resolve => setTimeout(resolve, 20))
        expect(order).toEqual(['start:2'])
        gate.resolve()
        await Promise.all([slow, fast])

        expect(order).toEqual(['start:2', 'end:2', 'start:3', 'end:3'])
    })

    it('keeps the queue going after a failed write', async () => {
        let calls = 0
        const store = newStore(captureLogger(), async () => {
            calls++
            if (calls <= 2) throw new Error('EIO')
        })

        await expect(store.persist()).resolves.toBe(false)
        store.setDiskCount(2)
        await expect(store.persist()).resolves.toBe(true)
        expect(calls).toBe(3)
    })

    it('always leaves a parseable state file for readers', async () => {
        const store = new StateStore(file, createInitialState(makeRequest()), { log: captureLogger() })
        await store.persist()

        let writing = true
        const writer = (async () => {
            for (let i = 1; i <= 200; i++) {
                store.setDiskCount(i)
                store.setLastMessage({ message: 'x'.repeat(i * 50), type: 'info' })
                await store.persist()
            }
            writing = false
        })()

        const seen: number[] = []
        while (writing) {
            // JSON.parse throws on a partially written file
            const state = await readState(file)
            seen.push(state.disk_count ?? 0)
        }
        await writer

        expect(seen.length).toBeGreaterThan(0)
        expect(seen).toEqual([...seen].sort((a, b) => a - b))
        expect(await readState(file)).toMatchObject({ disk_count: 200 })
    })

    it('retries a failed write once', async () => {
        const log = captureLogger()
        let calls = 0
        const store = newStore(log, async () => {
            calls++
            if (calls === 1) throw new Error('EIO')
        })

        await expect(store.persist()).resolves.toBe(true)
        expect(calls).toBe(2)
        expect(log.messages('warn')).toEqual([`Failed to write state file ${file}: EIO; retrying`])
    })

    it('gives up after the retry and logs a terminal failure as fatal', async () => {
        const log = captureLogger()
        const store = newStore(log, async () => {
            throw new Error('ENOSPC')
        })

        await expect(store.persist()).resolves.toBe(false)
        expect(log.messages('error')).toEqual([`Failed to write state file ${file}: ENOSPC`])

        store.finalize({ failed: true, returnCode: 1 })
        await expect(store.persist()).resolves.toBe(false)
        expect(log.messages('fatal')).toEqual([
            `could not persist the final state: Failed to write state file ${file}: ENOSPC`,
        ])
    })

    it('persists periodically while housekeeping runs', async () => {
        const store = new StateStore(file, createInitialState(makeRequest()), { log: captureLogger() })
        store.startHousekeeping(100)
        try {
            store.setVmId('abc')
            const state = await waitFor(async () => {
                try {
                    const s = await readState(file)
                    return s.vm_id === 'abc' ? s : undefined
                } catch {
                    return undefined
                }
            })
            expect(state.vm_id).toBe('abc')
        } finally {
            store.stopHousekeeping()
        }
    })
})

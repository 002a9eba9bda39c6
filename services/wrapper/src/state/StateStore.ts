import type { ChannelLogger } from '@v2v-wrapper/logging'

import { PersistenceError, toErrorShape } from '../core/errors.js'
import type { JobRequest } from '../request/schema.js'
import { writeFileAtomic } from './atomic.js'
import type { ConversionState, DiskProgress, LastMessage } from './types.js'

export function createInitialState(request: Pick<JobRequest, 'source_disks'>): ConversionState {
    const state: ConversionState = {
        started: false,
        disks: (request.source_disks ?? []).map(path => ({ path, progress: 0 })),
        finished: false,
    }
    if (request.source_disks !== undefined) {
        state.disk_count = request.source_disks.length
    }
    return state
}

export type Outcome = {
    failed: boolean
    returnCode?: number
    message?: LastMessage
}

export interface StateStoreDeps {
    log: ChannelLogger
    write?: (file: string, text: string) => Promise<void>
    now?: () => Date
}

/**
 * Owner of the job's ConversionState and of the state file it is mirrored to.
 *
 * All mutation happens on the event loop thread, so a snapshot taken by
 * `persist()` is always internally consistent. Once `finalize()` has run the
 * state is frozen: later mutators are dropped with a log line.
 */
export class StateStore {
    readonly file: string

    private readonly state: ConversionState
    private readonly log: ChannelLogger
    private readonly write: (file: string, text: string) => Promise<void>
    private readonly now: () => Date
    /** Tail of the write queue. Every link resolves; none rejects. */
    private tail: Promise<boolean> = Promise.resolve(true)

    private lastWritten: string | null = null
    private timer: NodeJS.Timeout | null = null

    constructor(file: string, initial: ConversionState, deps: StateStoreDeps) {
        this.file = file
        this.state = structuredClone(initial)
        this.log = deps.log
        this.write = deps.write ?? writeFileAtomic
        this.now = deps.now ?? (() => new Date())
    }

    snapshot(): ConversionState {
        return structuredClone(this.state)
    }

    get finished(): boolean {
        return this.state.finished
    }

    get trackedDisks(): number {
        return this.state.disks.length
    }

    /* ---------------------------------------------------------------------
       Mutators
    --------------------------------------------------------------------- */

    private guard(op: string): boolean {
        if (!this.state.finished) return true
        this.log.warn(`ignoring ${op} after the job finished`)
        return false
    }

    markStarted(pid: number): void {
        if (!this.guard('markStarted')) return
        this.state.started = true
        this.state.pid = pid
        this.state.started_at = this.now().toISOString()
    }

    /** Append `path` unless it is already tracked. Returns true when added. */
    addDisk(path: string): boolean {
        if (!this.guard('addDisk')) return false
        if (this.hasDisk(path)) return false
        this.state.disks.push({ path, progress: 0 })
        return true
    }

    hasDisk(path: string): boolean {
        return this.state.disks.some(d => d.path === path)
    }

    /** Whole percent, clamped to 0..100. Unknown paths are ignored. */
    setDiskProgress(path: string, progress: number): boolean {
        if (!this.guard('setDiskProgress')) return false
        const disk: DiskProgress | undefined = this.state.disks.find(d => d.path === path)
        if (!disk) return false
        disk.progress = Math.min(100, Math.max(0, Math.floor(progress)))
        return true
    }

    setDiskCount(count: number): void {
        if (!this.guard('setDiskCount')) return
        this.state.disk_count = count
    }

    setLastMessage(message: LastMessage): void {
        if (!this.guard('setLastMessage')) return
        this.state.last_message = { ...message }
    }

    setVmId(id: string): void {
        if (!this.guard('setVmId')) return
        this.state.vm_id = id
    }

    /**
     * Commit the terminal state. `failed` is written only on failure; its
     * absence is what tells the reader the job succeeded.
     */
    finalize(outcome: Outcome): void {
        if (!this.guard('finalize')) return
        if (outcome.returnCode !== undefined) this.state.return_code = outcome.returnCode
        if (outcome.failed) this.state.failed = true
        if (outcome.message) this.state.last_message = { ...outcome.message }
        this.state.finished = true
        this.state.finished_at = this.now().toISOString()
    }

    /* ---------------------------------------------------------------------
       Persistence
    --------------------------------------------------------------------- */

    /**
     * Write the current state. The snapshot is taken now; the write itself
     * queues behind any write still in flight. One retry, then the failure is
     * logged and `false` returned. Never rejects.
     */
    async persist(): Promise<boolean> {
        const text = JSON.stringify(this.state) + '\n'
        const terminal = this.state.finished

        const next = this.tail.then(() => this.writeText(text, terminal))
        this.tail = next
        return await next
    }

    private async writeText(text: string, terminal: boolean): Promise<boolean> {
        if (text === this.lastWritten) return true

        for (let attempt = 1; attempt <= 2; attempt++) {
            try {
                await this.write(this.file, text)
                this.lastWritten = text
                return true
            } catch (err) {
                const failure = new PersistenceError(this.file, { cause: err })
                if (attempt === 1) {
                    this.log.warn(`${failure.message}; retrying`, { err: toErrorShape(failure) })
                    continue
                }
                if (terminal) {
                    this.log.fatal(`could not persist the final state: ${failure.message}`, { err: toErrorShape(failure) })
                } else {
                    this.log.error(failure.message, { err: toErrorShape(failure) })
                }
            }
        }
        return false
    }

    /** Periodic write while the conversion runs. */
    startHousekeeping(intervalMs: number): void {
        if (this.timer) return
        this.timer = setInterval(() => {
            void this.persist()
        }, intervalMs)
        this.timer.unref()
    }

    stopHousekeeping(): void {
        if (!this.timer) return
        clearInterval(this.timer)
        this.timer = null
    }
}

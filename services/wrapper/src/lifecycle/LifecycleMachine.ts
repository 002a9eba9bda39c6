import type { ChannelLogger } from '@v2v-wrapper/logging'

import { LifecycleError } from '../core/errors.js'
import type { StateStore } from '../state/StateStore.js'
import type { ExitClassification } from './classify.js'

export type Phase =
    | 'initializing'
    | 'detached'
    | 'started'
    | 'running'
    | 'finished-success'
    | 'finished-failure'

const NEXT: Record<Phase, readonly Phase[]> = {
    // `started` directly: a foreground job never detaches
    'initializing': ['detached', 'started', 'finished-failure'],
    'detached': ['started', 'finished-failure'],
    'started': ['running', 'finished-success', 'finished-failure'],
    'running': ['finished-success', 'finished-failure'],
    'finished-success': [],
    'finished-failure': [],
}

export function isTerminal(phase: Phase): boolean {
    return NEXT[phase].length === 0
}

/**
 * Forward-only job lifecycle. Each transition that readers must see
 * (started, finished) is persisted right away; progress in between is left to
 * the store's periodic write.
 */
export class LifecycleMachine {
    private current: Phase
    private readonly store: StateStore
    private readonly log: ChannelLogger

    constructor(store: StateStore, log: ChannelLogger, initial: Phase = 'initializing') {
        this.store = store
        this.log = log
        this.current = initial
    }

    get phase(): Phase {
        return this.current
    }

    private transition(to: Phase): void {
        const from = this.current
        if (!NEXT[from].includes(to)) {
            throw new LifecycleError(`Illegal lifecycle transition ${from} -> ${to}`)
        }
        this.current = to
        this.log.info(`phase ${from} -> ${to}`)
    }

    detached(): void {
        this.transition('detached')
    }

    /** Returns once the state file holds the pid. */
    async started(pid: number): Promise<boolean> {
        this.transition('started')
        this.store.markStarted(pid)
        return await this.store.persist()
    }

    /** First output from the subprocess. Idempotent. */
    running(): void {
        if (this.current === 'running') return
        this.transition('running')
    }

    async finish(result: ExitClassification): Promise<boolean> {
        if (result.outcome === 'success') {
            this.transition('finished-success')
            this.store.finalize({ failed: false, returnCode: result.returnCode })
        } else {
            this.transition('finished-failure')
            this.log.error(`conversion failed (${result.reason}): ${result.message}`)
            this.store.finalize({
                failed: true,
                returnCode: result.returnCode,
                message: { message: result.message, type: 'error' },
            })
        }
        this.store.stopHousekeeping()
        return await this.store.persist()
    }

    /** Failure with no exit status: the subprocess or the worker never ran. */
    async fail(message: string): Promise<boolean> {
        this.transition('finished-failure')
        this.log.error(`job failed: ${message}`)
        this.store.finalize({ failed: true, message: { message, type: 'error' } })
        this.store.stopHousekeeping()
        return await this.store.persist()
    }
}

import type { ChannelLogger } from '@v2v-wrapper/logging'

import { LifecycleError } from '../core/errors.js'
import type { BootstrapInfo } from './paths.js'
import { encodeWorkerPayload, type WorkerLauncher, type WorkerPayload } from './worker.js'

export interface DaemonizerDeps {
    log: ChannelLogger
    /** Where the bootstrap line goes. */
    out: NodeJS.WritableStream
    launch: WorkerLauncher
}

/**
 * Foreground half of the hand-off: print where the job's files are, then
 * pass the job to a detached worker. Each step happens at most once.
 */
export class Daemonizer {
    private readonly log: ChannelLogger
    private readonly out: NodeJS.WritableStream
    private readonly launch: WorkerLauncher

    private announced = false
    private detachAttempted = false

    constructor(deps: DaemonizerDeps) {
        this.log = deps.log
        this.out = deps.out
        this.launch = deps.launch
    }

    /** Writes the bootstrap line and waits until it is flushed. */
    async announce(info: BootstrapInfo): Promise<void> {
        if (this.announced) {
            throw new LifecycleError('Bootstrap line already written')
        }
        this.announced = true

        const line = JSON.stringify(info) + '\n'
        await new Promise<void>((resolve, reject) => {
            this.out.write(line, err => {
                if (err) reject(err)
                else resolve()
            })
        })
        this.log.info('bootstrap line written', { ...info })
    }

    async detach(payload: WorkerPayload): Promise<number> {
        if (!this.announced) {
            throw new LifecycleError('Cannot detach before the bootstrap line is written')
        }
        if (this.detachAttempted) {
            throw new LifecycleError('Detach already attempted')
        }
        this.detachAttempted = true

        const pid = await this.launch(encodeWorkerPayload(payload))
        this.log.info(`worker detached pid=${pid}`)
        return pid
    }
}

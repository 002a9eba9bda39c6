import { spawn } from 'node:child_process'
import { z } from 'zod'

import { SpawnError, ValidationError } from '../core/errors.js'
import { formatIssues, validateJobRequest } from '../request/loader.js'
import type { JobRequest } from '../request/schema.js'
import type { JobPaths } from './paths.js'

/** What the foreground hands the detached worker over its stdin. */
export type WorkerPayload = {
    request: JobRequest
    paths: JobPaths
}

const payloadSchema = z.object({
    request: z.unknown(),
    paths: z.object({
        wrapperLog: z.string().min(1),
        v2vLog: z.string().min(1),
        stateFile: z.string().min(1),
    }),
})

/**
 * Paths of a payload that does not decode as a whole, so the worker can still
 * finalize the state file the caller was promised.
 */
export function payloadPaths(text: string): JobPaths | undefined {
    let value: unknown
    try {
        value = JSON.parse(text)
    } catch {
        return undefined
    }
    const parsed = payloadSchema.pick({ paths: true }).safeParse(value)
    return parsed.success ? parsed.data.paths : undefined
}

export function encodeWorkerPayload(payload: WorkerPayload): string {
    return JSON.stringify(payload)
}

export function decodeWorkerPayload(text: string): WorkerPayload {
    let value: unknown
    try {
        value = JSON.parse(text)
    } catch (err) {
        throw new ValidationError(['(root): Worker payload is not valid JSON'], { cause: err })
    }

    const parsed = payloadSchema.safeParse(value)
    if (!parsed.success) {
        throw new ValidationError(formatIssues(parsed.error), { cause: parsed.error })
    }
    return {
        request: validateJobRequest(parsed.data.request),
        paths: parsed.data.paths,
    }
}

/** Starts the worker, hands it the payload and returns its pid. */
export type WorkerLauncher = (payload: string) => Promise<number>

export type LaunchOptions = {
    execPath?: string
    execArgv?: string[]
    /** Entry script of the worker. Defaults to the running script. */
    script?: string
    cwd?: string
    env?: NodeJS.ProcessEnv
}

/**
 * Re-executes the wrapper as a detached session leader running in worker
 * mode. The child gets the payload on stdin and nothing else: its stdout and
 * stderr go to /dev/null and it does not keep the parent's event loop alive.
 */
export function launchDetachedWorker(opts: LaunchOptions = {}): WorkerLauncher {
    return async (payload) => {
        const script = opts.script ?? process.argv[1]
        if (script === undefined) {
            throw new SpawnError('Cannot determine the wrapper entry script')
        }

        const child = spawn(
            opts.execPath ?? process.execPath,
            [...(opts.execArgv ?? process.execArgv), script, '--worker'],
            {
                detached: true,
                stdio: ['pipe', 'ignore', 'ignore'],
                cwd: opts.cwd ?? '/',
                env: opts.env ?? process.env,
            }
        )

        const pid = await new Promise<number>((resolve, reject) => {
            child.once('spawn', () => {
                if (child.pid === undefined) reject(new SpawnError('Worker started without a pid'))
                else resolve(child.pid)
            })
            child.once('error', err => {
                reject(new SpawnError(`Failed to start the worker: ${err.message}`, { cause: err }))
            })
        })

        await new Promise<void>((resolve, reject) => {
            child.stdin.once('error', err => {
                reject(new SpawnError(`Failed to hand the job to the worker: ${err.message}`, { cause: err }))
            })
            child.stdin.end(payload, () => resolve())
        })

        child.unref()
        return pid
    }
}

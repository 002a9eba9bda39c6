import { spawn } from 'node:child_process'
import { createWriteStream, promises as fs, type WriteStream } from 'node:fs'
import path from 'node:path'
import type { ChannelLogger } from '@v2v-wrapper/logging'

import { SpawnError, toErrorShape } from '../core/errors.js'
import type { OutputStream } from '../progress/ProgressParser.js'
import type { V2vCommand } from './command.js'
import { LineSplitter } from './LineSplitter.js'

export type ExitStatus = {
    code: number | null
    signal: NodeJS.Signals | null
}

export interface SupervisorHooks {
    /** The subprocess exists and has a pid. */
    onSpawn(pid: number): void
    /** One complete, non-empty output line. */
    onLine(line: string, stream: OutputStream): void
}

function spawnConversion(command: V2vCommand) {
    return spawn(command.binary, command.args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: command.env,
    })
}

function closeStream(stream: WriteStream): Promise<void> {
    return new Promise(resolve => {
        if (stream.closed || stream.destroyed) {
            resolve()
            return
        }
        stream.end(() => resolve())
    })
}

/**
 * Runs one virt-v2v process to completion.
 *
 * Output is copied verbatim to the conversion log and, line by line, to
 * `onLine`. The returned promise settles once: with the exit status after
 * both output streams have drained, or with a SpawnError if the process
 * never started.
 */
export class ConversionSupervisor {
    private readonly log: ChannelLogger
    private readonly hooks: SupervisorHooks

    constructor(log: ChannelLogger, hooks: SupervisorHooks) {
        this.log = log
        this.hooks = hooks
    }

    async run(command: V2vCommand, v2vLogFile: string): Promise<ExitStatus> {
        await fs.mkdir(path.dirname(v2vLogFile), { recursive: true })
        const out = createWriteStream(v2vLogFile, { flags: 'a', mode: 0o644 })
        out.on('error', err => {
            this.log.error(`cannot write conversion log ${v2vLogFile}`, { err: toErrorShape(err) })
        })

        try {
            return await this.spawnAndWait(command, out)
        } finally {
            await closeStream(out)
        }
    }

    private spawnAndWait(command: V2vCommand, out: WriteStream): Promise<ExitStatus> {
        return new Promise<ExitStatus>((resolve, reject) => {
            let settled = false
            let spawned = false

            const fail = (err: unknown): void => {
                if (settled) return
                settled = true
                const reason = err instanceof Error ? err.message : String(err)
                reject(new SpawnError(`Failed to start ${command.binary}: ${reason}`, { cause: err }))
            }

            let child: ReturnType<typeof spawnConversion>
            try {
                child = spawnConversion(command)
            } catch (err) {
                fail(err)
                return
            }

            const splitters: Record<OutputStream, LineSplitter> = {
                stdout: new LineSplitter(),
                stderr: new LineSplitter(),
            }

            const emit = (lines: string[], stream: OutputStream): void => {
                for (const line of lines) {
                    if (line.length === 0) continue
                    this.hooks.onLine(line, stream)
                }
            }

            const pump = (stream: OutputStream) => (chunk: string): void => {
                if (out.writable) out.write(chunk)
                emit(splitters[stream].push(chunk), stream)
            }

            child.stdout.setEncoding('utf8')
            child.stderr.setEncoding('utf8')
            child.stdout.on('data', pump('stdout'))
            child.stderr.on('data', pump('stderr'))

            child.once('spawn', () => {
                spawned = true
                if (child.pid !== undefined) {
                    this.log.info(`virt-v2v started pid=${child.pid}`)
                    this.hooks.onSpawn(child.pid)
                }
            })

            child.on('error', err => {
                if (!spawned) {
                    fail(err)
                    return
                }
                this.log.error('virt-v2v process error', { err: toErrorShape(err) })
            })

            // 'close' fires after 'exit' and after stdio has ended
            child.once('close', (code, signal) => {
                if (settled) return
                settled = true
                emit(splitters.stdout.flush(), 'stdout')
                emit(splitters.stderr.flush(), 'stderr')
                this.log.info(`virt-v2v exited code=${code} signal=${signal}`)
                resolve({ code, signal })
            })
        })
    }
}

import { spawn } from 'node:child_process'
import type { ChannelLogger } from '@v2v-wrapper/logging'

import { SpawnError } from '../core/errors.js'

const SOCK_RE = /^SSH_AUTH_SOCK=([^;]+);/m
const PID_RE = /^echo Agent pid (\d+);/m

export type SshAgentOptions = {
    agentPath: string
    addPath: string
    /** Private key to load. Without one ssh-add loads the keys from ~/.ssh. */
    keyFile?: string
    log: ChannelLogger
    env?: NodeJS.ProcessEnv
}

/**
 * Run a command and capture its stdout. stdout and stderr are both read to
 * the end, so `close` fires only once every holder of the pipes is gone.
 */
function runCommand(cmd: string, args: string[], env: NodeJS.ProcessEnv): Promise<string> {
    return new Promise((resolve, reject) => {
        const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'], env })

        let stdout = ''
        let stderr = ''

        child.stdout.setEncoding('utf8')
        child.stdout.on('data', (chunk) => {
            stdout += String(chunk)
        })

        child.stderr.setEncoding('utf8')
        child.stderr.on('data', (chunk) => {
            stderr += String(chunk)
        })

        child.on('error', (err) => {
            reject(err)
        })

        child.on('close', (code) => {
            if (code === 0) resolve(stdout)
            else reject(new Error(`${cmd} exited with code ${code}: ${stderr.trim()}`))
        })
    })
}

/**
 * ssh-agent serving the key of one ssh conversion. It runs as whoever runs
 * the wrapper, which by now is the conversion identity.
 */
export class SshAgent {
    readonly pid: number
    readonly socket: string
    private readonly log: ChannelLogger
    private stopped = false

    private constructor(pid: number, socket: string, log: ChannelLogger) {
        this.pid = pid
        this.socket = socket
        this.log = log
    }

    static async start(opts: SshAgentOptions): Promise<SshAgent> {
        const env = opts.env ?? process.env

        let out: string
        try {
            out = await runCommand(opts.agentPath, [], env)
        } catch (err) {
            throw new SpawnError(`Failed to start ssh-agent: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
        }

        const sock = SOCK_RE.exec(out)
        const pid = PID_RE.exec(out)
        if (!sock || !pid) {
            throw new SpawnError(`Unexpected ssh-agent output: ${JSON.stringify(out)}`)
        }

        const agent = new SshAgent(Number.parseInt(pid[1], 10), sock[1], opts.log)
        opts.log.info(`ssh-agent started pid=${agent.pid}`)

        const args = opts.keyFile !== undefined ? [opts.keyFile] : []
        opts.log.info(opts.keyFile !== undefined ? 'loading the job ssh key' : 'loading ssh keys from ~/.ssh')
        try {
            await runCommand(opts.addPath, args, { ...env, SSH_AUTH_SOCK: agent.socket })
        } catch (err) {
            agent.stop()
            throw new SpawnError(`Failed to load the ssh key: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
        }
        return agent
    }

    stop(): void {
        if (this.stopped) return
        this.stopped = true
        try {
            process.kill(this.pid, 'SIGTERM')
            this.log.info(`ssh-agent pid=${this.pid} stopped`)
        } catch (err) {
            this.log.warn(`failed to stop ssh-agent pid=${this.pid}: ${err instanceof Error ? err.message : String(err)}`)
        }
    }
}

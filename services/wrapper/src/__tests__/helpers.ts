import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { ChannelLogger, LogLevel } from '@v2v-wrapper/logging'

import type { WrapperConfig } from '../core/config.js'
import { validateJobRequest } from '../request/loader.js'
import type { JobRequest, JobRequestInput } from '../request/schema.js'

export const FINGERPRINT = Array.from({ length: 20 }, () => 'AB').join(':')

export const VDDK_INPUT: JobRequestInput = {
    vm_name: 'vm1',
    transport_method: 'vddk',
    vmware_uri: 'esx://root@esx1.example.test?no_verify=1',
    vmware_password: 'test-secret',
    vmware_fingerprint: FINGERPRINT,
    export_domain: 'nfs.example.test:/export/domain',
}

export function makeRequest(overrides: Partial<JobRequestInput> = {}): JobRequest {
    return validateJobRequest({ ...VDDK_INPUT, ...overrides })
}

export function testConfig(dir: string, overrides: Partial<WrapperConfig> = {}): WrapperConfig {
    return {
        stateDir: path.join(dir, 'state'),
        logDir: path.join(dir, 'log'),
        virtV2vPath: '/usr/bin/virt-v2v',
        vddkLibDir: '/opt/vmware-vix-disklib-distrib',
        defaultBridge: 'ovirtmgmt',
        rhvCaFile: '/etc/pki/vdsm/certs/cacert.pem',
        sshAgentPath: '/usr/bin/ssh-agent',
        sshAddPath: '/usr/bin/ssh-add',
        privileges: { drop: true, user: 'vdsm', group: 'kvm' },
        stateIntervalMs: 5_000,
        ...overrides,
    }
}

export type LogEntry = {
    level: LogLevel
    msg: string
    extra?: Record<string, unknown>
}

export type CapturingLogger = ChannelLogger & {
    entries: LogEntry[]
    messages(level: LogLevel): string[]
}

export function captureLogger(): CapturingLogger {
    const entries: LogEntry[] = []
    const at = (level: LogLevel) => (msg: string, extra?: Record<string, unknown>): void => {
        entries.push({ level, msg, extra })
    }
    return {
        entries,
        messages: level => entries.filter(e => e.level === level).map(e => e.msg),
        debug: at('debug'),
        info: at('info'),
        warn: at('warn'),
        error: at('error'),
        fatal: at('fatal'),
    }
}

export async function makeTempDir(prefix: string): Promise<string> {
    return await mkdtemp(path.join(os.tmpdir(), `${prefix}-`))
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true })
}

export async function waitFor<T>(probe: () => Promise<T | undefined> | T | undefined, timeoutMs = 5_000): Promise<T> {
    const deadline = Date.now() + timeoutMs
    for (;;) {
        const value = await probe()
        if (value !== undefined) return value
        if (Date.now() > deadline) throw new Error('condition not met in time')
        await new Promise(resolve => setTimeout(resolve, 25))
    }
}

/** Executable shell script at `file` running `body`. */
export async function writeScript(file: string, body: string): Promise<string> {
    await writeFile(file, `#!/bin/sh\n${body}\n`)
    await chmod(file, 0o755)
    return file
}

/**
 * Install a stand-in for virt-v2v: a shell script that runs `body` under
 * the current Node binary with the real argument vector.
 */
export async function fakeVirtV2v(dir: string, body: string): Promise<string> {
    const js = path.join(dir, 'fake-virt-v2v.mjs')
    await writeFile(js, body)
    return await writeScript(path.join(dir, 'fake-virt-v2v'), `exec "${process.execPath}" "${js}" "$@"`)
}

export type FakeSshAgent = {
    agentPath: string
    addPath: string
    /** Socket path the agent announces. */
    socket: string
    /** Written by ssh-add: the socket it was given and the key it loaded. */
    addedSocketFile: string
    addedKeyFile: string
    /** Appears once the agent has received SIGTERM. */
    stoppedFile: string
}

/**
 * Stand-ins for ssh-agent and ssh-add. The agent leaves a background shell
 * behind that records its own termination.
 */
export async function fakeSshAgent(dir: string, addBody?: string): Promise<FakeSshAgent> {
    const socket = path.join(dir, 'agent.sock')
    const addedSocketFile = path.join(dir, 'ssh-add.sock')
    const addedKeyFile = path.join(dir, 'ssh-add.key')
    const stoppedFile = path.join(dir, 'agent.stopped')

    const agentPath = await writeScript(path.join(dir, 'fake-ssh-agent'), [
        `(trap 'echo stopped > "${stoppedFile}"; exit 0' TERM; while :; do sleep 1; done) >/dev/null 2>&1 &`,
        `echo "SSH_AUTH_SOCK=${socket}; export SSH_AUTH_SOCK;"`,
        'echo "SSH_AGENT_PID=$!; export SSH_AGENT_PID;"',
        'echo "echo Agent pid $!;"',
    ].join('\n'))
    const addPath = await writeScript(path.join(dir, 'fake-ssh-add'), addBody ?? [
        `printf '%s' "$SSH_AUTH_SOCK" > "${addedSocketFile}"`,
        `if [ $# -gt 0 ]; then cat "$1" > "${addedKeyFile}"; else printf 'none' > "${addedKeyFile}"; fi`,
    ].join('\n'))

    return { agentPath, addPath, socket, addedSocketFile, addedKeyFile, stoppedFile }
}

import { readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { SpawnError } from '../core/errors.js'
import { SshAgent } from '../conversion/sshAgent.js'
import { captureLogger, fakeSshAgent, makeTempDir, removeDir, waitFor, writeScript } from './helpers.js'

async function readIfPresent(file: string): Promise<string | undefined> {
    try {
        return await readFile(file, 'utf8')
    } catch {
        return undefined
    }
}

describe('SshAgent', () => {
    let dir: string

    beforeEach(async () => {
        dir = await makeTempDir('ssh-agent-test')
    })

    afterEach(async () => {
        await removeDir(dir)
    })

    it('starts the agent, loads the key and stops the agent', async () => {
        const fake = await fakeSshAgent(dir)
        const keyFile = path.join(dir, 'key')
        await writeFile(keyFile, 'test-key\n')

        const log = captureLogger()
        const agent = await SshAgent.start({ agentPath: fake.agentPath, addPath: fake.addPath, keyFile, log })

        expect(agent.socket).toBe(fake.socket)
        expect(agent.pid).toBeGreaterThan(0)
        expect(await readFile(fake.addedSocketFile, 'utf8')).toBe(fake.socket)
        expect(await readFile(fake.addedKeyFile, 'utf8')).toBe('test-key\n')

        agent.stop()
        agent.stop()
        expect(await waitFor(() => readIfPresent(fake.stoppedFile))).toBe('stopped\n')
        expect(log.messages('info')).toEqual([
            `ssh-agent started pid=${agent.pid}`,
            'loading the job ssh key',
            `ssh-agent pid=${agent.pid} stopped`,
        ])
    })

    it('loads the default keys without a key file', async () => {
        const fake = await fakeSshAgent(dir)
        const agent = await SshAgent.start({ agentPath: fake.agentPath, addPath: fake.addPath, log: captureLogger() })
        try {
            expect(await readFile(fake.addedKeyFile, 'utf8')).toBe('none')
        } finally {
            agent.stop()
        }
    })

    it('stops the agent when the key cannot be loaded', async () => {
        const fake = await fakeSshAgent(dir, 'echo "Error loading key" >&2\nexit 1')

        const started = SshAgent.start({ agentPath: fake.agentPath, addPath: fake.addPath, log: captureLogger() })
        await expect(started).rejects.toBeInstanceOf(SpawnError)
        await expect(started).rejects.toThrow(
            `Failed to load the ssh key: ${fake.addPath} exited with code 1: Error loading key`
        )
        expect(await waitFor(() => readIfPresent(fake.stoppedFile))).toBe('stopped\n')
    })

    it('rejects output it cannot read', async () => {
        const agentPath = await writeScript(path.join(dir, 'odd-agent'), 'echo nonsense')
        await expect(
            SshAgent.start({ agentPath, addPath: '/bin/true', log: captureLogger() })
        ).rejects.toThrow('Unexpected ssh-agent output: "nonsense\\n"')
    })

    it('reports an agent that cannot be started', async () => {
        await expect(
            SshAgent.start({ agentPath: path.join(dir, 'no-such-agent'), addPath: '/bin/true', log: captureLogger() })
        ).rejects.toThrow(/^Failed to start ssh-agent: /)
    })
})

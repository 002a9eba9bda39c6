import { afterEach, describe, expect, it, vi } from 'vitest'

import { main } from '../app.js'
import { parseArgs, usage } from '../cli.js'

describe('parseArgs', () => {
    it('runs a job by default', () => {
        expect(parseArgs([])).toEqual({ command: 'run', unknown: [] })
    })

    it('recognizes the flags', () => {
        expect(parseArgs(['--version']).command).toBe('version')
        expect(parseArgs(['-h']).command).toBe('help')
        expect(parseArgs(['--worker']).command).toBe('worker')
    })

    it('lets help win over the other flags', () => {
        expect(parseArgs(['--version', '--help']).command).toBe('help')
        expect(parseArgs(['--help', '--version', '--worker']).command).toBe('help')
    })

    it('collects unknown arguments', () => {
        expect(parseArgs(['--verbose', 'job.json'])).toEqual({ command: 'run', unknown: ['--verbose', 'job.json'] })
    })

    it('names the program in the usage text', () => {
        expect(usage('v2v-wrapper').split('\n')[0]).toBe('Usage: v2v-wrapper [--help] [--version]')
    })
})

describe('main', () => {
    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('prints the version', async () => {
        const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
        await expect(main(['--version'])).resolves.toBe(0)
        expect(out).toHaveBeenCalledWith('v2v-wrapper 0.1.0\n')
    })

    it('exits 1 on an unknown argument', async () => {
        const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
        await expect(main(['--bogus'])).resolves.toBe(1)
        expect(String(err.mock.calls[0][0]).startsWith('v2v-wrapper: unknown argument(s): --bogus\n')).toBe(true)
    })
})

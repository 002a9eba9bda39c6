import { LogChannel, type LoggerBundle } from '@v2v-wrapper/logging'

import type { WrapperConfig } from './core/config.js'
import { toErrorShape } from './core/errors.js'
import { buildV2vCommand, redactCommand, type SecretPaths } from './conversion/command.js'
import { ConversionSupervisor } from './conversion/ConversionSupervisor.js'
import { SecretFiles } from './conversion/secrets.js'
import { SshAgent } from './conversion/sshAgent.js'
import type { JobPaths } from './daemon/paths.js'
import { classifyExit } from './lifecycle/classify.js'
import { isTerminal, LifecycleMachine, type Phase } from './lifecycle/LifecycleMachine.js'
import { ProgressParser } from './progress/ProgressParser.js'
import type { JobRequest } from './request/schema.js'
import { createInitialState, StateStore } from './state/StateStore.js'
import type { ConversionState } from './state/types.js'

export interface JobContext {
    config: WrapperConfig
    request: JobRequest
    paths: JobPaths
    logger: LoggerBundle
    store: StateStore
    machine: LifecycleMachine
    /** Parent directory of the password files. Defaults to the OS temp dir. */
    secretsParent?: string
}

export type JobResult = {
    failed: boolean
    state: ConversionState
}

export type OpenJobOptions = Omit<JobContext, 'store' | 'machine'> & {
    phase?: Phase
}

/** Wire a store and a lifecycle machine to a job's state file. */
export function openJob(opts: OpenJobOptions): JobContext {
    const store = new StateStore(opts.paths.stateFile, createInitialState(opts.request), {
        log: opts.logger.channel(LogChannel.state),
    })
    const machine = new LifecycleMachine(store, opts.logger.channel(LogChannel.lifecycle), opts.phase)
    return { ...opts, store, machine }
}

type JobSecrets = SecretPaths & { sshKeyFile?: string }

async function writeSecrets(secrets: SecretFiles, request: JobRequest): Promise<JobSecrets> {
    const paths: JobSecrets = {}
    if (request.vmware_password !== undefined) {
        paths.vmwarePasswordFile = await secrets.write('vmware_password', request.vmware_password)
    }
    if (request.rhv_password !== undefined) {
        paths.rhvPasswordFile = await secrets.write('rhv_password', request.rhv_password)
    }
    if (request.ssh_key !== undefined) {
        // ssh-add rejects a key without its final newline
        const key = request.ssh_key.endsWith('\n') ? request.ssh_key : `${request.ssh_key}\n`
        paths.sshKeyFile = await secrets.write('ssh_key', key)
    }
    return paths
}

/**
 * Run virt-v2v for one job and leave the state file finalized, whatever
 * happens. Resolves once the terminal state has been written (or the write
 * has failed and been logged).
 */
export async function runConversionJob(ctx: JobContext): Promise<JobResult> {
    const { config, request, paths, logger, store, machine } = ctx
    const log = logger.channel(LogChannel.wrapper)
    const supLog = logger.channel(LogChannel.supervisor)

    const parser = new ProgressParser(store, {
        log: logger.channel(LogChannel.parser),
        raw: logger.channel(LogChannel.v2v),
    })

    let secrets: SecretFiles | null = null
    let agent: SshAgent | null = null
    try {
        secrets = await SecretFiles.create(ctx.secretsParent)
        const secretPaths = await writeSecrets(secrets, request)
        if (request.transport_method === 'ssh') {
            agent = await SshAgent.start({
                agentPath: config.sshAgentPath,
                addPath: config.sshAddPath,
                keyFile: secretPaths.sshKeyFile,
                log: supLog,
            })
        }
        const command = buildV2vCommand(request, config, secretPaths, { sshAuthSock: agent?.socket })
        supLog.info('starting virt-v2v', { command: redactCommand(command), grammar: parser.grammarVersion })

        store.startHousekeeping(config.stateIntervalMs)

        const supervisor = new ConversionSupervisor(supLog, {
            onSpawn: pid => {
                // persist() logs its own failures and never rejects
                void machine.started(pid)
            },
            onLine: (line, stream) => {
                if (machine.phase === 'started') machine.running()
                parser.feed(line, stream)
            },
        })

        const status = await supervisor.run(command, paths.v2vLog)
        await machine.finish(classifyExit(status, parser.fatalMessage))
    } catch (err) {
        log.error('conversion job aborted', { err: toErrorShape(err) })
        if (!isTerminal(machine.phase)) {
            await machine.fail(err instanceof Error ? err.message : String(err))
        }
    } finally {
        store.stopHousekeeping()
        agent?.stop()
        if (secrets) {
            try {
                await secrets.dispose()
            } catch (err) {
                log.error(`failed to remove password files in ${secrets.dir}`, { err: toErrorShape(err) })
            }
        }
    }

    const state = store.snapshot()
    log.info(`job finished ${state.failed ? 'with failure' : 'successfully'}`, {
        return_code: state.return_code,
    })
    return { failed: state.failed === true, state }
}

import { promises as fs } from 'node:fs'
import path from 'node:path'
import { createLogger, createSilentLogger, LogChannel, type LoggerBundle } from '@v2v-wrapper/logging'

import { parseArgs, usage } from './cli.js'
import { buildWrapperConfigFromEnv, loadEnvFiles, type WrapperConfig } from './core/config.js'
import { toErrorShape, ValidationError } from './core/errors.js'
import { Daemonizer } from './daemon/Daemonizer.js'
import { computeJobPaths, makeJobTag, toBootstrapInfo, type JobPaths } from './daemon/paths.js'
import { decodeWorkerPayload, launchDetachedWorker, payloadPaths, type WorkerLauncher, type WorkerPayload } from './daemon/worker.js'
import { LifecycleMachine } from './lifecycle/LifecycleMachine.js'
import { PrivilegeManager } from './privilege/PrivilegeManager.js'
import { loadJobRequest, readAll, redactRequest } from './request/loader.js'
import { createInitialState, StateStore } from './state/StateStore.js'
import { NAME, VERSION } from './version.js'
import { openJob, runConversionJob } from './wrapper.js'

const SERVICE = NAME

export interface MainDeps {
    stdin?: NodeJS.ReadableStream
    stdout?: NodeJS.WritableStream
    stderr?: NodeJS.WritableStream
    /** Environment the configuration is read from. Defaults to process.env. */
    env?: NodeJS.ProcessEnv
    /** Directory holding the .env files. */
    cwd?: string
    /** Starts the detached worker. Defaults to re-executing this script. */
    launch?: WorkerLauncher
}

type Io = {
    stdin: NodeJS.ReadableStream
    stdout: NodeJS.WritableStream
    stderr: NodeJS.WritableStream
    launch: WorkerLauncher
}

export function describeError(err: unknown): string {
    if (err instanceof ValidationError) {
        return ['Invalid job request:', ...err.issues.map(i => `  ${i}`)].join('\n')
    }
    return err instanceof Error ? err.message : String(err)
}

/**
 * Foreground phase. Everything that can fail synchronously fails here, with a
 * message on stderr and exit code 1, before the caller is promised a state
 * file.
 */
async function runForeground(config: WrapperConfig, io: Io): Promise<number> {
    const request = await loadJobRequest(io.stdin)

    const privileges = new PrivilegeManager(config.privileges)
    const decision = await privileges.assumeIdentity(request)

    const paths = computeJobPaths(config, makeJobTag())
    await fs.mkdir(config.logDir, { recursive: true })
    await fs.mkdir(path.dirname(paths.stateFile), { recursive: true })

    const logger = createLogger(SERVICE, { destination: paths.wrapperLog })
    const log = logger.channel(LogChannel.wrapper)
    log.info(`${NAME} ${VERSION} starting`, { daemonize: request.daemonize })
    logger.channel(LogChannel.loader).info('job request loaded', { request: redactRequest(request) })
    logger.channel(LogChannel.privilege).info(`privilege decision: ${decision.action} (${decision.reason})`)

    const job = openJob({ config, request, paths, logger })

    if (!(await job.store.persist())) {
        throw new Error(`Cannot write the initial state file ${paths.stateFile}`)
    }

    const daemonizer = new Daemonizer({
        log: logger.channel(LogChannel.daemon),
        out: io.stdout,
        launch: io.launch,
    })
    await daemonizer.announce(toBootstrapInfo(paths))

    if (!request.daemonize) {
        const result = await runConversionJob(job)
        return result.failed ? 2 : 0
    }

    try {
        await daemonizer.detach({ request, paths })
        job.machine.detached()
    } catch (err) {
        // The caller already holds the state file path: the failure goes there
        log.error('hand-off to the worker failed', { err: toErrorShape(err) })
        await job.machine.fail(`Failed to start the conversion: ${describeError(err)}`)
        io.stderr.write(`${NAME}: ${describeError(err)}\n`)
        return 1
    }
    return 0
}

/** Record a job the worker could not run in the state file it was handed. */
async function failDetachedJob(paths: JobPaths, logger: LoggerBundle, message: string): Promise<void> {
    const store = new StateStore(paths.stateFile, createInitialState({}), { log: logger.channel(LogChannel.state) })
    await new LifecycleMachine(store, logger.channel(LogChannel.lifecycle), 'detached').fail(message)
}

/**
 * Detached phase. stdout and stderr lead nowhere; all reporting goes to the
 * wrapper log and the state file.
 */
async function runWorker(config: WrapperConfig, io: Io): Promise<number> {
    const text = await readAll(io.stdin)

    let payload: WorkerPayload
    try {
        payload = decodeWorkerPayload(text)
    } catch (err) {
        const paths = payloadPaths(text)
        if (paths === undefined) throw err
        await failDetachedJob(paths, createSilentLogger(), `Invalid worker payload: ${describeError(err)}`)
        return 1
    }

    let logger: LoggerBundle
    try {
        logger = createLogger(SERVICE, { destination: payload.paths.wrapperLog })
    } catch (err) {
        await failDetachedJob(payload.paths, createSilentLogger(), `Cannot open the wrapper log: ${describeError(err)}`)
        return 1
    }
    logger.channel(LogChannel.daemon).info(`worker running pid=${process.pid}`)

    const job = openJob({
        config,
        request: payload.request,
        paths: payload.paths,
        logger,
        phase: 'detached',
    })
    const result = await runConversionJob(job)
    return result.failed ? 1 : 0
}

export async function main(argv: string[] = process.argv.slice(2), deps: MainDeps = {}): Promise<number> {
    const env = deps.env ?? process.env
    const io: Io = {
        stdin: deps.stdin ?? process.stdin,
        stdout: deps.stdout ?? process.stdout,
        stderr: deps.stderr ?? process.stderr,
        launch: deps.launch ?? launchDetachedWorker({ env }),
    }
    const cli = parseArgs(argv)

    if (cli.unknown.length > 0) {
        io.stderr.write(`${NAME}: unknown argument(s): ${cli.unknown.join(' ')}\n${usage(NAME)}`)
        return 1
    }
    if (cli.command === 'help') {
        io.stdout.write(usage(NAME))
        return 0
    }
    if (cli.command === 'version') {
        io.stdout.write(`${NAME} ${VERSION}\n`)
        return 0
    }

    // The worker inherits the environment the foreground already loaded
    if (cli.command === 'worker') {
        return await runWorker(buildWrapperConfigFromEnv(env), io)
    }

    loadEnvFiles(deps.cwd ?? process.cwd(), env)
    const config = buildWrapperConfigFromEnv(env)

    try {
        return await runForeground(config, io)
    } catch (err) {
        io.stderr.write(`${NAME}: ${describeError(err)}\n`)
        return 1
    }
}

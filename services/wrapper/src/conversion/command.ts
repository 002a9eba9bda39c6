import type { WrapperConfig } from '../core/config.js'
import { SpawnError } from '../core/errors.js'
import type { JobRequest } from '../request/schema.js'

export type V2vCommand = {
    binary: string
    args: string[]
    env: NodeJS.ProcessEnv
}

/** Password files written for this job. */
export type SecretPaths = {
    vmwarePasswordFile?: string
    rhvPasswordFile?: string
}

export type CommandOptions = {
    /** Environment the conversion inherits. Defaults to process.env. */
    baseEnv?: NodeJS.ProcessEnv
    /** Effective uid virt-v2v runs under. Defaults to the wrapper's own. */
    euid?: number
    /** Agent socket holding the key for ssh transports. */
    sshAuthSock?: string
}

const MASK = '*****'
const SECRET_ARG_RE = /([^=]*password[^=]*)=(.*)/i
const SECRET_ENV_RE = /password/i

function requireFile(file: string | undefined, what: string): string {
    if (file === undefined) {
        throw new SpawnError(`No ${what} password file prepared for the conversion`)
    }
    return file
}

function sourceArgs(request: JobRequest, config: WrapperConfig, secrets: SecretPaths): string[] {
    switch (request.transport_method) {
        case 'vddk':
            return [
                '-i', 'libvirt',
                '-ic', request.vmware_uri ?? '',
                '-it', 'vddk',
                '-io', `vddk-libdir=${config.vddkLibDir}`,
                '-io', `vddk-thumbprint=${request.vmware_fingerprint ?? ''}`,
                '--password-file', requireFile(secrets.vmwarePasswordFile, 'VMware'),
            ]
        case 'ssh':
            return ['-i', 'vmx', '-it', 'ssh']
    }
}

function networkArgs(request: JobRequest, config: WrapperConfig): string[] {
    if (request.network_mappings.length === 0) {
        return ['--bridge', config.defaultBridge]
    }
    return request.network_mappings.flatMap(m =>
        m.mac_address !== undefined
            ? ['--mac', `${m.mac_address}:bridge:${m.destination}`]
            : ['--bridge', `${m.source}:${m.destination}`]
    )
}

function outputArgs(request: JobRequest, config: WrapperConfig, secrets: SecretPaths): string[] {
    const args = ['-of', request.output_format]
    if (request.allocation !== undefined) {
        args.push('-oa', request.allocation)
    }

    if (request.rhv_url !== undefined) {
        args.push(
            '-o', 'rhv-upload',
            '-oc', request.rhv_url,
            '-os', request.rhv_storage ?? '',
            '-op', requireFile(secrets.rhvPasswordFile, 'RHV'),
            '-oo', `rhv-cafile=${request.rhv_cafile ?? config.rhvCaFile}`,
            '-oo', `rhv-cluster=${request.rhv_cluster ?? ''}`,
            '-oo', 'rhv-direct',
        )
        if (request.insecure_connection) {
            args.push('-oo', 'rhv-verifypeer=false')
        }
    } else if (request.export_domain !== undefined) {
        args.push('-o', 'rhv', '-os', request.export_domain)
    }
    return args
}

/**
 * Argument vector and environment for one virt-v2v run.
 *
 * Passwords are never put on the command line; `secrets` names the files
 * holding them.
 */
export function buildV2vCommand(
    request: JobRequest,
    config: WrapperConfig,
    secrets: SecretPaths,
    opts: CommandOptions = {}
): V2vCommand {
    // For ssh the input is the vmx URI; for libvirt it is the domain name.
    const input = request.transport_method === 'ssh' && request.vmware_uri !== undefined
        ? request.vmware_uri
        : request.vm_name

    const args = [
        '-v', '-x',
        input,
        '--root', 'first',
        ...sourceArgs(request, config, secrets),
        ...networkArgs(request, config),
        ...outputArgs(request, config, secrets),
    ]

    const env: NodeJS.ProcessEnv = { ...(opts.baseEnv ?? process.env) }
    env.LANG = 'C'
    env.LIBGUESTFS_BACKEND = 'direct'
    if (request.install_drivers && request.virtio_win !== undefined) {
        env.VIRTIO_WIN = request.virtio_win
    }
    if (opts.sshAuthSock !== undefined) {
        env.SSH_AUTH_SOCK = opts.sshAuthSock
    }
    if ((opts.euid ?? process.geteuid?.() ?? 0) !== 0) {
        // May belong to another user; libguestfs would try to use it
        delete env.XDG_RUNTIME_DIR
    }

    return { binary: config.virtV2vPath, args, env }
}

/** Copy of `cmd` safe to log. */
export function redactCommand(cmd: V2vCommand): { binary: string; args: string[]; env: Record<string, string> } {
    const args = cmd.args.map(a => a.replace(SECRET_ARG_RE, `$1=${MASK}`))
    const env: Record<string, string> = {}
    for (const [key, value] of Object.entries(cmd.env)) {
        if (value === undefined) continue
        env[key] = SECRET_ENV_RE.test(key) ? MASK : value
    }
    return { binary: cmd.binary, args, env }
}

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseDotenv } from 'dotenv'

export type WrapperConfig = {
    /** Directory holding the polled state files. */
    stateDir: string
    /** Directory holding the wrapper and conversion logs. */
    logDir: string

    virtV2vPath: string
    vddkLibDir: string
    /** Bridge used when the request carries no network mappings. */
    defaultBridge: string
    /** CA bundle for rhv-upload when the request names none. */
    rhvCaFile: string
    /** Binaries of the agent holding the key for ssh transports. */
    sshAgentPath: string
    sshAddPath: string

    privileges: {
        drop: boolean
        user: string
        group: string
    }

    /** Cadence of the housekeeping state write while the conversion runs. */
    stateIntervalMs: number
}

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
export function loadEnvFiles(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
    const mode = String(env.NODE_ENV || 'production')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${mode}`),
        path.resolve(cwd, '.env.local')
    ]

    const loaded: string[] = []
    for (const file of files) {
        if (!fs.existsSync(file)) continue
        const vars = parseDotenv(fs.readFileSync(file))
        for (const [key, value] of Object.entries(vars)) {
            env[key] = value
        }
        loaded.push(file)
    }
    return loaded
}

function parseBool(v: string | undefined, def: boolean): boolean {
    if (v === undefined) return def
    const n = v.trim().toLowerCase()
    if (n === 'true' || n === '1' || n === 'yes') return true
    if (n === 'false' || n === '0' || n === 'no') return false
    return def
}

function parseIntSafe(v: string | undefined, def: number): number {
    if (v === undefined) return def
    const n = Number.parseInt(v, 10)
    return Number.isFinite(n) ? n : def
}

function clampInt(n: number, min: number, max: number): number {
    if (!Number.isFinite(n)) return min
    if (n < min) return min
    if (n > max) return max
    return n
}

function str(v: string | undefined, def: string): string {
    const t = (v ?? '').trim()
    return t.length > 0 ? t : def
}

export function buildWrapperConfigFromEnv(env: NodeJS.ProcessEnv = process.env): WrapperConfig {
    return {
        stateDir: path.resolve(str(env.V2V_WRAPPER_STATE_DIR, '/tmp')),
        logDir: path.resolve(str(env.V2V_WRAPPER_LOG_DIR, '/var/log/vdsm/import')),
        virtV2vPath: str(env.V2V_WRAPPER_VIRT_V2V, '/usr/bin/virt-v2v'),
        vddkLibDir: str(env.V2V_WRAPPER_VDDK_LIBDIR, '/opt/vmware-vix-disklib-distrib'),
        defaultBridge: str(env.V2V_WRAPPER_BRIDGE, 'ovirtmgmt'),
        rhvCaFile: str(env.V2V_WRAPPER_RHV_CAFILE, '/etc/pki/vdsm/certs/cacert.pem'),
        sshAgentPath: str(env.V2V_WRAPPER_SSH_AGENT, '/usr/bin/ssh-agent'),
        sshAddPath: str(env.V2V_WRAPPER_SSH_ADD, '/usr/bin/ssh-add'),
        privileges: {
            drop: parseBool(env.V2V_WRAPPER_DROP_PRIVILEGES, true),
            user: str(env.V2V_WRAPPER_SERVICE_USER, 'vdsm'),
            group: str(env.V2V_WRAPPER_SERVICE_GROUP, 'kvm'),
        },
        stateIntervalMs: clampInt(parseIntSafe(env.V2V_WRAPPER_STATE_INTERVAL_MS, 5_000), 100, 60_000),
    }
}

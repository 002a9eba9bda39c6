import path from 'node:path'

import type { WrapperConfig } from '../core/config.js'

export type JobPaths = {
    wrapperLog: string
    v2vLog: string
    stateFile: string
}

/** The single line printed on stdout before the wrapper detaches. */
export type BootstrapInfo = {
    wrapper_log: string
    v2v_log: string
    state_file: string
}

const pad = (n: number): string => String(n).padStart(2, '0')

/** `YYYYMMDDTHHMMSS-<pid>`, local time. */
export function makeJobTag(now: Date = new Date(), pid: number = process.pid): string {
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
    return `${date}T${time}-${pid}`
}

export function computeJobPaths(config: Pick<WrapperConfig, 'logDir' | 'stateDir'>, tag: string): JobPaths {
    return {
        wrapperLog: path.join(config.logDir, `v2v-import-${tag}-wrapper.log`),
        v2vLog: path.join(config.logDir, `v2v-import-${tag}.log`),
        stateFile: path.join(config.stateDir, `v2v-import-${tag}.state`),
    }
}

export function toBootstrapInfo(paths: JobPaths): BootstrapInfo {
    return {
        wrapper_log: paths.wrapperLog,
        v2v_log: paths.v2vLog,
        state_file: paths.stateFile,
    }
}

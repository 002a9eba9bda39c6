// services/wrapper/src/state/types.ts

/** One source disk. `path` is unique within a job. */
export interface DiskProgress {
    path: string
    /** Whole percent, 0..100. */
    progress: number
}

export type MessageType = 'error' | 'warning' | 'info'

export interface LastMessage {
    message: string
    type: MessageType
}

/**
 * Shape of the state file polled by the orchestrator.
 *
 * `failed` is present (and true) only for a failed job; readers test for the
 * key, not its value. `disk_count` is whatever virt-v2v last reported and may
 * differ from `disks.length`.
 */
export interface ConversionState {
    started: boolean
    pid?: number
    disks: DiskProgress[]
    disk_count?: number
    return_code?: number
    finished: boolean
    failed?: true
    last_message?: LastMessage
    vm_id?: string
    started_at?: string
    finished_at?: string
}

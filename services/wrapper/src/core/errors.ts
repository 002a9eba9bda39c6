// services/wrapper/src/core/errors.ts

export type WrapperErrorCode = 'VALIDATION' | 'PRIVILEGE' | 'SPAWN' | 'PERSISTENCE' | 'LIFECYCLE'

export abstract class WrapperError extends Error {
    abstract readonly code: WrapperErrorCode
    readonly retryable: boolean = false

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
    }
}

/** Bad or missing job input. Raised before anything is written to disk. */
export class ValidationError extends WrapperError {
    readonly code = 'VALIDATION'
    readonly issues: string[]

    constructor(issues: string[], options?: { cause?: unknown }) {
        super(`Invalid job request: ${issues.join('; ')}`, options)
        this.issues = issues
    }
}

/** The conversion identity could not be assumed. */
export class PrivilegeError extends WrapperError {
    readonly code = 'PRIVILEGE'
}

/** The conversion subprocess (or the detached worker) never started. */
export class SpawnError extends WrapperError {
    readonly code = 'SPAWN'
}

/** A state-file write failed. */
export class PersistenceError extends WrapperError {
    readonly code = 'PERSISTENCE'
    override readonly retryable = true
    readonly file: string

    constructor(file: string, options?: { cause?: unknown }) {
        super(`Failed to write state file ${file}: ${describeCause(options?.cause)}`, options)
        this.file = file
    }
}

/** A step was attempted out of order: an illegal phase change, a second detach. */
export class LifecycleError extends WrapperError {
    readonly code = 'LIFECYCLE'
}

function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message
    return cause === undefined ? 'unknown error' : String(cause)
}

export type ErrorShape = {
    message: string
    code?: string
    retryable?: boolean
}

export function toErrorShape(err: unknown): ErrorShape {
    if (err instanceof WrapperError) {
        return { message: err.message, code: err.code, retryable: err.retryable }
    }
    if (err instanceof Error) {
        // Node system errors (ENOENT, EACCES, ...) carry a string code
        const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined
        return { message: err.message, code }
    }
    return { message: String(err) }
}

import os from 'node:os'

import type { ExitStatus } from '../conversion/ConversionSupervisor.js'

export type FailureReason = 'signal' | 'exit-code' | 'fatal-error'

export type ExitClassification =
    | { outcome: 'success'; returnCode: 0 }
    | { outcome: 'failure'; reason: FailureReason; returnCode: number; message: string }

export function signalNumber(signal: string): number | undefined {
    for (const [name, num] of Object.entries(os.constants.signals)) {
        if (name === signal && typeof num === 'number') return num
    }
    return undefined
}

/**
 * Decide whether a finished virt-v2v run converted the VM. A clean exit code
 * is not enough: virt-v2v has been seen to print a fatal error and still
 * exit 0.
 *
 * A run killed by a signal reports the negated signal number as its return
 * code (-9 for SIGKILL).
 */
export function classifyExit(status: ExitStatus, fatalMessage: string | null): ExitClassification {
    if (status.signal !== null) {
        return {
            outcome: 'failure',
            reason: 'signal',
            returnCode: -(signalNumber(status.signal) ?? 1),
            message: `virt-v2v was terminated by ${status.signal}`,
        }
    }

    const code = status.code ?? -1
    if (code !== 0) {
        return {
            outcome: 'failure',
            reason: 'exit-code',
            returnCode: code,
            message: fatalMessage ?? `virt-v2v exited with code ${code}`,
        }
    }

    if (fatalMessage !== null) {
        return { outcome: 'failure', reason: 'fatal-error', returnCode: 0, message: fatalMessage }
    }

    return { outcome: 'success', returnCode: 0 }
}

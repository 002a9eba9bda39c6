import type { ZodError } from 'zod'
import { SECRET_KEYS } from '@v2v-wrapper/logging'

import { ValidationError } from '../core/errors.js'
import { jobRequestSchema, type JobRequest } from './schema.js'

/**
 * Read the whole of a readable stream as UTF-8 text.
 */
export async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
    const chunks: Buffer[] = []
    for await (const chunk of stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)
    }
    return Buffer.concat(chunks).toString('utf8')
}

export function formatIssues(err: ZodError): string[] {
    return err.issues.map(issue => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
        return `${where}: ${issue.message}`
    })
}

/**
 * Validate an already-decoded value against the job request schema.
 */
export function validateJobRequest(value: unknown): JobRequest {
    const parsed = jobRequestSchema.safeParse(value)
    if (!parsed.success) {
        throw new ValidationError(formatIssues(parsed.error), { cause: parsed.error })
    }
    return parsed.data
}

/**
 * Parse exactly one JSON document. Anything but a single JSON object is
 * rejected before schema validation runs.
 */
export function parseJobRequest(text: string): JobRequest {
    if (text.trim().length === 0) {
        throw new ValidationError(['(root): No input received on stdin'])
    }

    let value: unknown
    try {
        value = JSON.parse(text)
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err)
        throw new ValidationError([`(root): Input is not valid JSON (${reason})`], { cause: err })
    }

    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
        throw new ValidationError(['(root): Expected a JSON object'])
    }

    return validateJobRequest(value)
}

export async function loadJobRequest(input: NodeJS.ReadableStream = process.stdin): Promise<JobRequest> {
    return parseJobRequest(await readAll(input))
}

/**
 * Copy of the request that is safe to log: every credential is masked.
 */
export function redactRequest(request: JobRequest): Record<string, unknown> {
    const copy: Record<string, unknown> = { ...request }
    for (const key of SECRET_KEYS) {
        if (copy[key] !== undefined) copy[key] = '*****'
    }
    return copy
}

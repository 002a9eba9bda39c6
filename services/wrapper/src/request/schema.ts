import path from 'node:path'
import { z } from 'zod'

/**
 * Job request schema.
 *
 * The orchestrator sends one JSON document on stdin. Keys are snake_case on
 * the wire and stay that way in memory so that logs and the request line up.
 */

export const OUTPUT_FORMATS = ['raw', 'qcow2'] as const
export const TRANSPORT_METHODS = ['vddk', 'ssh'] as const

// SHA-1 thumbprint as printed by ESXi, colon separated
const FINGERPRINT_RE = /^([0-9A-Fa-f]{2}:){19}[0-9A-Fa-f]{2}$/
const MAC_RE = /^([0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/

const networkMappingSchema = z.object({
    source: z.string().min(1),
    destination: z.string().min(1),
    mac_address: z.string().regex(MAC_RE, 'Invalid MAC address').optional(),
})

const absolutePath = z.string().min(1).refine(p => path.isAbsolute(p), 'Must be an absolute path')

const baseSchema = z.object({
    vm_name: z.string().min(1),
    output_format: z.enum(OUTPUT_FORMATS).default('raw'),
    transport_method: z.enum(TRANSPORT_METHODS),

    // Source connection
    vmware_uri: z.string().min(1).optional(),
    vmware_password: z.string().min(1).optional(),
    vmware_fingerprint: z.string().regex(FINGERPRINT_RE, 'Invalid certificate fingerprint').optional(),
    ssh_key: z.string().min(1).optional(),

    // Target: export domain ...
    export_domain: z.string().min(1).optional(),
    // ... or rhv-upload
    rhv_url: z.string().url().optional(),
    rhv_cluster: z.string().min(1).optional(),
    rhv_storage: z.string().min(1).optional(),
    rhv_password: z.string().min(1).optional(),
    rhv_cafile: absolutePath.optional(),
    insecure_connection: z.boolean().default(false),
    allocation: z.enum(['sparse', 'preallocated']).optional(),

    source_disks: z.array(z.string().min(1)).optional(),
    network_mappings: z.array(networkMappingSchema).default([]),

    virtio_win: absolutePath.optional(),
    install_drivers: z.boolean().optional(),

    daemonize: z.boolean().default(true),
    run_as_root: z.boolean().default(false),
})

type BaseRequest = z.output<typeof baseSchema>

function requireKeys(
    data: BaseRequest,
    keys: readonly (keyof BaseRequest)[],
    why: string,
    ctx: z.RefinementCtx
): void {
    for (const k of keys) {
        if (data[k] === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: [k], message: `Required ${why}` })
        }
    }
}

export const jobRequestSchema = baseSchema
    .superRefine((data, ctx) => {
        if (data.transport_method === 'vddk') {
            requireKeys(data, ['vmware_uri', 'vmware_password', 'vmware_fingerprint'], 'for transport "vddk"', ctx)
        }

        const hasExport = data.export_domain !== undefined
        const hasUpload = data.rhv_url !== undefined
        if (hasExport && hasUpload) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['rhv_url'],
                message: 'Only one target may be given (export_domain or rhv_url)',
            })
        } else if (!hasExport && !hasUpload) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['export_domain'],
                message: 'No target specified (export_domain or rhv_url)',
            })
        } else if (hasUpload) {
            requireKeys(data, ['rhv_cluster', 'rhv_storage', 'rhv_password'], 'for target "rhv_url"', ctx)
        }

        if (data.source_disks) {
            const seen = new Set<string>()
            data.source_disks.forEach((d, i) => {
                if (seen.has(d)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: ['source_disks', i],
                        message: `Duplicate disk path "${d}"`,
                    })
                }
                seen.add(d)
            })
        }
    })
    .transform(data => ({
        ...data,
        // Supplying a driver ISO implies installing from it
        install_drivers: data.install_drivers ?? data.virtio_win !== undefined,
    }))

export type JobRequest = Readonly<z.output<typeof jobRequestSchema>>
export type JobRequestInput = z.input<typeof jobRequestSchema>

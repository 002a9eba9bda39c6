// services/wrapper/src/progress/grammar.ts

/**
 * Line grammar for virt-v2v's verbose (`-v -x`) output.
 *
 * A rule recognizes one kind of line and turns it into a ParsedLine; it never
 * touches job state. Rules are tried in order and the first match wins.
 */

export type ParsedLine =
    | { kind: 'copy-disk'; disk: number; count: number }
    | { kind: 'disk-path'; path: string }
    | { kind: 'disk-progress'; percent: number }
    | { kind: 'vm-id'; id: string }
    | { kind: 'fatal-error'; message: string }
    | { kind: 'warning'; message: string }

export interface LineRule {
    readonly name: string
    match(line: string): ParsedLine | null
}

export interface ProgressGrammar {
    readonly version: string
    readonly rules: readonly LineRule[]
}

const COPY_DISK_RE = /Copying disk (\d+)\/(\d+) to/
const NBDKIT_OPEN_RE = /^nbdkit: debug: Opening file (.*) \(.*\)/
const OVERLAY_SOURCE_RE = /^ *overlay source qemu URI: json:.*"file\.path": ?"([^"]+)"/
const DISK_PROGRESS_RE = /^\s+\((\d+\.\d+)\/100%\)/
const VM_ID_RE = /<VirtualSystem ovf:id='([a-fA-F0-9-]*)'>/
const FATAL_RE = /^virt-v2v: error: (.*)$/
const WARNING_RE = /^virt-v2v: warning: (.*)$/

const VMFS_PATH_RE = /\/vmfs\/volumes\/([^/]*)\/([^/]*)\/(.*?)(-flat)?\.vmdk$/

/**
 * `/vmfs/volumes/<store>/<vm>/<disk>[-flat].vmdk` → `[<store>] <vm>/<disk>.vmdk`,
 * the form the orchestrator uses in `source_disks`. Other paths pass through.
 */
export function toDatastorePath(path: string): string {
    return path.replace(VMFS_PATH_RE, '[$1] $2/$3.vmdk')
}

export const fatalErrorRule: LineRule = {
    name: 'fatal-error',
    match(line) {
        const m = FATAL_RE.exec(line)
        return m ? { kind: 'fatal-error', message: m[1] } : null
    },
}

export const warningRule: LineRule = {
    name: 'warning',
    match(line) {
        const m = WARNING_RE.exec(line)
        return m ? { kind: 'warning', message: m[1] } : null
    },
}

export const copyDiskRule: LineRule = {
    name: 'copy-disk',
    match(line) {
        const m = COPY_DISK_RE.exec(line)
        if (!m) return null
        return { kind: 'copy-disk', disk: Number.parseInt(m[1], 10), count: Number.parseInt(m[2], 10) }
    },
}

// vddk: nbdkit names the file it opens
export const diskPathRule: LineRule = {
    name: 'disk-path',
    match(line) {
        const m = NBDKIT_OPEN_RE.exec(line)
        return m ? { kind: 'disk-path', path: m[1] } : null
    },
}

// ssh: the overlay's backing file is the remote vmdk
export const overlaySourceRule: LineRule = {
    name: 'overlay-source',
    match(line) {
        const m = OVERLAY_SOURCE_RE.exec(line)
        return m ? { kind: 'disk-path', path: toDatastorePath(m[1]) } : null
    },
}

export const diskProgressRule: LineRule = {
    name: 'disk-progress',
    match(line) {
        const m = DISK_PROGRESS_RE.exec(line)
        return m ? { kind: 'disk-progress', percent: Number.parseFloat(m[1]) } : null
    },
}

export const vmIdRule: LineRule = {
    name: 'vm-id',
    match(line) {
        const m = VM_ID_RE.exec(line)
        return m ? { kind: 'vm-id', id: m[1] } : null
    },
}

export const VIRT_V2V_GRAMMAR: ProgressGrammar = {
    version: 'virt-v2v/1',
    rules: [
        fatalErrorRule,
        warningRule,
        copyDiskRule,
        diskPathRule,
        overlaySourceRule,
        diskProgressRule,
        vmIdRule,
    ],
}

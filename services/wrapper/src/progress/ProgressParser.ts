import type { ChannelLogger } from '@v2v-wrapper/logging'

import { toErrorShape } from '../core/errors.js'
import type { StateStore } from '../state/StateStore.js'
import { VIRT_V2V_GRAMMAR, type ParsedLine, type ProgressGrammar } from './grammar.js'

export type OutputStream = 'stdout' | 'stderr'

export interface ProgressParserDeps {
    /** Parser's own diagnostics. */
    log: ChannelLogger
    /** Lines no rule recognized, verbatim. */
    raw: ChannelLogger
    grammar?: ProgressGrammar
}

/**
 * Turns virt-v2v output lines into state updates.
 *
 * Forward-only: the parser keeps the disk being copied and the path most
 * recently opened, and applies progress lines to that path. Both output
 * streams feed one parser instance.
 */
export class ProgressParser {
    private readonly store: StateStore
    private readonly log: ChannelLogger
    private readonly raw: ChannelLogger
    private readonly grammar: ProgressGrammar

    private currentDisk: number | null = null
    private currentPath: string | null = null
    private fatal: string | null = null

    constructor(store: StateStore, deps: ProgressParserDeps) {
        this.store = store
        this.log = deps.log
        this.raw = deps.raw
        this.grammar = deps.grammar ?? VIRT_V2V_GRAMMAR
    }

    get grammarVersion(): string {
        return this.grammar.version
    }

    get fatalMessage(): string | null {
        return this.fatal
    }

    feed(line: string, stream: OutputStream = 'stdout'): ParsedLine | null {
        for (const rule of this.grammar.rules) {
            let parsed: ParsedLine | null = null
            try {
                parsed = rule.match(line)
                if (parsed) this.apply(parsed)
            } catch (err) {
                this.log.error(`rule ${rule.name} failed; line skipped`, { err: toErrorShape(err), line })
                return null
            }
            if (parsed) return parsed
        }

        this.raw.debug(line, { stream })
        return null
    }

    private apply(parsed: ParsedLine): void {
        switch (parsed.kind) {
            case 'copy-disk': {
                this.currentDisk = parsed.disk
                this.currentPath = null
                this.store.setDiskCount(parsed.count)
                this.log.info(`copying disk ${parsed.disk}/${parsed.count}`)

                const known = this.store.trackedDisks
                if (known !== parsed.count) {
                    this.log.warn(
                        `number of supplied disk paths (${known}) does not match number of disks in VM (${parsed.count})`
                    )
                }
                return
            }

            case 'disk-path': {
                this.currentPath = parsed.path
                if (this.currentDisk === null) return
                if (this.store.addDisk(parsed.path)) {
                    this.log.info(`copying new path: ${parsed.path}`)
                } else {
                    this.log.info(`copying path: ${parsed.path}`)
                }
                return
            }

            case 'disk-progress': {
                const path = this.currentPath
                if (path === null || this.currentDisk === null || !this.store.hasDisk(path)) {
                    this.log.debug('skipping progress update for unknown disk')
                    return
                }
                this.store.setDiskProgress(path, parsed.percent)
                return
            }

            case 'vm-id':
                this.store.setVmId(parsed.id)
                this.log.info(`created VM with id=${parsed.id}`)
                return

            case 'fatal-error':
                this.fatal = parsed.message
                this.store.setLastMessage({ message: parsed.message, type: 'error' })
                this.log.error(`virt-v2v error: ${parsed.message}`)
                return

            case 'warning':
                this.store.setLastMessage({ message: parsed.message, type: 'warning' })
                this.log.warn(`virt-v2v warning: ${parsed.message}`)
                return
        }
    }
}

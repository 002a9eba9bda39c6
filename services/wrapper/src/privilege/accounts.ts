import { promises as fsp } from 'node:fs'

import { PrivilegeError } from '../core/errors.js'
import type { ServiceAccount } from './types.js'

export type AccountFiles = {
    passwd: string
    group: string
}

export const SYSTEM_ACCOUNT_FILES: AccountFiles = {
    passwd: '/etc/passwd',
    group: '/etc/group',
}

/**
 * Find the numeric id of `name` in a passwd(5) or group(5) formatted text.
 * Both formats keep the name in field 0 and the id in field 2.
 */
export function findNumericId(text: string, name: string): number | undefined {
    for (const raw of text.split('\n')) {
        const line = raw.trim()
        if (!line || line.startsWith('#')) continue

        const fields = line.split(':')
        if (fields.length < 3 || fields[0] !== name) continue

        const id = Number.parseInt(fields[2], 10)
        return Number.isNaN(id) ? undefined : id
    }
    return undefined
}

async function readAccountFile(file: string): Promise<string> {
    try {
        return await fsp.readFile(file, 'utf8')
    } catch (err) {
        throw new PrivilegeError(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
    }
}

export async function resolveServiceAccount(
    user: string,
    group: string,
    files: AccountFiles = SYSTEM_ACCOUNT_FILES
): Promise<ServiceAccount> {
    const [passwd, groups] = await Promise.all([readAccountFile(files.passwd), readAccountFile(files.group)])

    const uid = findNumericId(passwd, user)
    if (uid === undefined) {
        throw new PrivilegeError(`Service account "${user}" does not exist`)
    }

    const gid = findNumericId(groups, group)
    if (gid === undefined) {
        throw new PrivilegeError(`Service group "${group}" does not exist`)
    }

    return { user, uid, group, gid }
}

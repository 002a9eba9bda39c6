import type { WrapperConfig } from '../core/config.js'
import { PrivilegeError } from '../core/errors.js'
import type { JobRequest } from '../request/schema.js'
import { resolveServiceAccount, SYSTEM_ACCOUNT_FILES, type AccountFiles } from './accounts.js'
import type { IdentityOps, PrivilegeDecision, ServiceAccount } from './types.js'

export type PrivilegeInputs = {
    request: Pick<JobRequest, 'transport_method' | 'export_domain' | 'run_as_root'>
    policy: WrapperConfig['privileges']
    currentUid: number
    /** uid of the service account, when it could be resolved. */
    serviceUid?: number
}

/**
 * Decide which identity the conversion runs under. No I/O.
 *
 * Writing to an export domain means mounting an NFS share, which only root
 * may do; every other target converts as the service account. The transport
 * does not change the identity: both vddk and ssh read their credentials
 * from files owned by whoever runs the conversion.
 */
export function decidePrivileges(inputs: PrivilegeInputs): PrivilegeDecision {
    const { request, policy, currentUid, serviceUid } = inputs

    if (!policy.drop) {
        return { action: 'stay', reason: 'privilege drop disabled by configuration' }
    }
    if (request.run_as_root) {
        if (currentUid !== 0) {
            return { action: 'refuse', reason: 'run_as_root requested but the wrapper is not running as root' }
        }
        return { action: 'stay', reason: 'run_as_root requested' }
    }
    if (request.export_domain !== undefined) {
        if (currentUid !== 0) {
            return { action: 'refuse', reason: 'export domain target requires root to mount the NFS share' }
        }
        return { action: 'stay', reason: 'export domain target requires root' }
    }
    if (serviceUid !== undefined && currentUid === serviceUid) {
        return { action: 'stay', reason: `already running as ${policy.user}` }
    }
    if (currentUid === 0) {
        return {
            action: 'drop',
            user: policy.user,
            group: policy.group,
            reason: `${request.transport_method} conversion runs as ${policy.user}`,
        }
    }
    return { action: 'refuse', reason: `must run as ${policy.user} or root (uid=${currentUid})` }
}

function processIdentityOps(): IdentityOps {
    const getuid = process.getuid?.bind(process)
    const geteuid = process.geteuid?.bind(process)
    const getgid = process.getgid?.bind(process)
    const getegid = process.getegid?.bind(process)
    const setgroups = process.setgroups?.bind(process)
    const setgid = process.setgid?.bind(process)
    const setuid = process.setuid?.bind(process)
    if (!getuid || !geteuid || !getgid || !getegid || !setgroups || !setgid || !setuid) {
        throw new PrivilegeError('Changing process identity is not supported on this platform')
    }
    return {
        getuid: () => getuid(),
        geteuid: () => geteuid(),
        getgid: () => getgid(),
        getegid: () => getegid(),
        setgroups: groups => setgroups(groups),
        setgid: id => setgid(id),
        setuid: id => setuid(id),
    }
}

export interface PrivilegeManagerDeps {
    ops?: IdentityOps
    accountFiles?: AccountFiles
}

/**
 * Applies the decision in the foreground, before the bootstrap line and before
 * any log or state file is created, so every file the job writes is owned by
 * the conversion identity. A failure here is reported on stderr.
 */
export class PrivilegeManager {
    private readonly policy: WrapperConfig['privileges']
    private readonly accountFiles: AccountFiles
    private readonly opsOverride?: IdentityOps

    constructor(policy: WrapperConfig['privileges'], deps: PrivilegeManagerDeps = {}) {
        this.policy = policy
        this.accountFiles = deps.accountFiles ?? SYSTEM_ACCOUNT_FILES
        this.opsOverride = deps.ops
    }

    async assumeIdentity(request: PrivilegeInputs['request']): Promise<PrivilegeDecision> {
        const ops = this.opsOverride ?? processIdentityOps()
        const currentUid = ops.geteuid()

        const needsAccount = this.policy.drop && !request.run_as_root && request.export_domain === undefined
        let account: ServiceAccount | undefined
        if (needsAccount) {
            account = await resolveServiceAccount(this.policy.user, this.policy.group, this.accountFiles)
        }

        const decision = decidePrivileges({
            request,
            policy: this.policy,
            currentUid,
            serviceUid: account?.uid,
        })
        if (decision.action === 'refuse') {
            throw new PrivilegeError(decision.reason)
        }
        if (decision.action === 'drop' && account) {
            this.drop(ops, account)
        }
        return decision
    }

    private drop(ops: IdentityOps, account: ServiceAccount): void {
        try {
            // Supplementary groups and gid must go first: once the uid is
            // dropped we no longer have the right to change them.
            ops.setgroups([account.gid])
            ops.setgid(account.gid)
            ops.setuid(account.uid)
        } catch (err) {
            throw new PrivilegeError(
                `Failed to switch to ${account.user}:${account.group}: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err }
            )
        }

        const actual = {
            uid: ops.getuid(),
            euid: ops.geteuid(),
            gid: ops.getgid(),
            egid: ops.getegid(),
        }
        if (
            actual.uid !== account.uid || actual.euid !== account.uid ||
            actual.gid !== account.gid || actual.egid !== account.gid
        ) {
            throw new PrivilegeError(
                `Partial privilege drop to ${account.user}:${account.group} ` +
                `(uid=${actual.uid} euid=${actual.euid} gid=${actual.gid} egid=${actual.egid})`
            )
        }
    }
}

// services/wrapper/src/privilege/types.ts

export interface ServiceAccount {
    user: string
    uid: number
    group: string
    gid: number
}

export type PrivilegeDecision =
    | { action: 'stay'; reason: string }
    | { action: 'drop'; user: string; group: string; reason: string }
    | { action: 'refuse'; reason: string }

/**
 * The slice of `process` the privilege drop needs. Injected so the drop can
 * be exercised without running as root.
 */
export interface IdentityOps {
    getuid(): number
    geteuid(): number
    getgid(): number
    getegid(): number
    setgroups(groups: number[]): void
    setgid(id: number): void
    setuid(id: number): void
}

import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'

/**
 * Private directory of credential files for one conversion. The directory is
 * 0700 and each file 0600, both owned by the identity the wrapper runs as.
 */
export class SecretFiles {
    readonly dir: string
    private disposed = false

    private constructor(dir: string) {
        this.dir = dir
    }

    static async create(parent: string = os.tmpdir()): Promise<SecretFiles> {
        const dir = await fs.mkdtemp(path.join(parent, 'v2v-wrapper-'))
        await fs.chmod(dir, 0o700)
        return new SecretFiles(dir)
    }

    async write(name: string, content: string): Promise<string> {
        if (this.disposed) throw new Error(`secret directory ${this.dir} already removed`)
        const file = path.join(this.dir, path.basename(name))
        await fs.writeFile(file, content, { encoding: 'utf8', mode: 0o600, flag: 'wx' })
        return file
    }

    async dispose(): Promise<void> {
        if (this.disposed) return
        this.disposed = true
        await fs.rm(this.dir, { recursive: true, force: true })
    }
}

import { promises as fs } from 'node:fs'
import path from 'node:path'
import { randomBytes } from 'node:crypto'

/**
 * Replace `file` with `text` so that a reader sees either the old or the new
 * content, never a partial write. The temporary file lives in the same
 * directory because rename(2) is only atomic within one filesystem.
 */
export async function writeFileAtomic(file: string, text: string, mode = 0o644): Promise<void> {
    const dir = path.dirname(file)
    const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`)

    try {
        await fs.writeFile(tmp, text, { encoding: 'utf8', mode })
        await fs.rename(tmp, file)
    } catch (err) {
        await fs.rm(tmp, { force: true })
        throw err
    }
}

/**
 * Incremental line splitter for subprocess output.
 *
 * virt-v2v redraws its progress bar with bare carriage returns, so `\r`,
 * `\n` and `\r\n` all end a line. A `\r\n` pair split across two chunks still
 * counts as one terminator.
 */
export class LineSplitter {
    private buf = ''
    private pendingLf = false

    push(chunk: string): string[] {
        let text = chunk
        if (this.pendingLf) {
            this.pendingLf = false
            if (text.startsWith('\n')) text = text.slice(1)
        }

        this.buf += text
        const lines = this.buf.split(/\r\n|\r|\n/)
        this.buf = lines.pop() ?? ''

        if (lines.length > 0 && this.buf === '' && text.endsWith('\r')) {
            this.pendingLf = true
        }
        return lines
    }

    /** Whatever is left once the stream has ended. */
    flush(): string[] {
        const rest = this.buf
        this.buf = ''
        this.pendingLf = false
        return rest.length > 0 ? [rest] : []
    }
}
